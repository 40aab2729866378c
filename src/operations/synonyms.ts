/**
 * Synonym table - maps BLAST subject identifiers onto annotation identifiers
 *
 * Built once from the synonym file; the forward (external id → entry) and
 * reverse (feature key → external id) maps are frozen after construction.
 */

import type { SynonymEntry } from "../formats/tabular";
import { readSynonymFile } from "../formats/tabular";
import type { IdentifierOptions } from "./types";

/**
 * Immutable two-way synonym lookup
 *
 * @example
 * ```typescript
 * const table = SynonymTable.fromEntries([
 *   { externalId: "Gene1v2", featureId: "Gene1", prefixId: "Tx1" },
 * ]);
 * table.resolve("Gene1v2", { usePrefix: true }); // "Tx1_Gene1"
 * table.externalIdFor("Tx1_Gene1");             // "Gene1v2"
 * ```
 */
export class SynonymTable {
  readonly forward: ReadonlyMap<string, SynonymEntry>;
  readonly reverse: ReadonlyMap<string, string>;

  private constructor(forward: Map<string, SynonymEntry>, reverse: Map<string, string>) {
    this.forward = forward;
    this.reverse = reverse;
  }

  /**
   * Build the table from parsed rows; a later row with the same external id
   * replaces an earlier one
   */
  static fromEntries(entries: Iterable<SynonymEntry>): SynonymTable {
    const forward = new Map<string, SynonymEntry>();
    const reverse = new Map<string, string>();

    for (const entry of entries) {
      forward.set(entry.externalId, entry);
      reverse.set(featureKey(entry), entry.externalId);
    }

    return new SynonymTable(forward, reverse);
  }

  /**
   * Load the table from a 2-3 column synonym file
   *
   * @throws {TabularParseError} On malformed rows or repeated external ids
   */
  static async load(path: string): Promise<SynonymTable> {
    return SynonymTable.fromEntries(await readSynonymFile(path));
  }

  get size(): number {
    return this.forward.size;
  }

  lookup(externalId: string): SynonymEntry | undefined {
    return this.forward.get(externalId);
  }

  /**
   * Map a BLAST subject id to the identifier used in the annotation
   *
   * Subject ids without an entry resolve to themselves. In prefix mode an
   * entry with a prefix resolves to `${prefixId}_${featureId}`.
   */
  resolve(subjectId: string, options: IdentifierOptions = {}): string {
    const entry = this.forward.get(subjectId);
    if (entry === undefined) {
      return subjectId;
    }
    return options.usePrefix === true ? featureKey(entry) : entry.featureId;
  }

  /**
   * External id recorded for a feature key (`featureId` or `prefix_featureId`)
   */
  externalIdFor(key: string): string | undefined {
    return this.reverse.get(key);
  }
}

/**
 * Resolve a subject id with an optional synonym table
 */
export function resolveSubjectId(
  subjectId: string,
  synonyms: SynonymTable | undefined,
  options: IdentifierOptions = {}
): string {
  return synonyms === undefined ? subjectId : synonyms.resolve(subjectId, options);
}

function featureKey(entry: SynonymEntry): string {
  return entry.prefixId === undefined ? entry.featureId : `${entry.prefixId}_${entry.featureId}`;
}
