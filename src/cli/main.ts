#!/usr/bin/env -S npx tsx
import { formatError } from "../errors";
import { createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(1);
  });
