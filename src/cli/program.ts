import { Command } from "commander";
import { createExtractCommand } from "./extract";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("promoterkit")
    .description("Promoter sequence extraction from BLAST hits, GFF3 annotations and assemblies")
    .version(VERSION);

  program.addCommand(createExtractCommand());

  return program;
}
