/**
 * Feature table with parse-once locations
 *
 * Entries keep their raw location text as read from the record. The parsed
 * tree for an entry is produced on first request and stored in a slot
 * indexed by the entry's position in the table, so two features that share
 * identical location text still get their own tree. A filled slot is never
 * written again.
 *
 * @module features/feature-table
 */

import { FeatureLookupError, ValidationError } from "../errors";
import { parseLocation } from "../locations/parser";
import { type ResolveOptions, resolveLocation } from "../locations/resolver";
import type { Location } from "../locations/types";
import type { SequenceAccessor } from "../sequence/accessor";

/** Qualifier values; repeated qualifiers collect into arrays in file order */
export type Qualifiers = Readonly<Record<string, string | readonly string[]>>;

/**
 * Feature as produced by the feature block splitter
 */
export interface FeatureInput {
  /** Feature key, e.g. "gene", "CDS", "mRNA" */
  readonly key: string;
  /** Location text exactly as read */
  readonly location: string;
  readonly qualifiers?: Qualifiers;
  /** Line the feature key appeared on */
  readonly lineNumber?: number;
}

/**
 * One row of the table
 */
export interface FeatureEntry {
  /** Position in file order, starting at 0 */
  readonly index: number;
  readonly key: string;
  readonly rawLocation: string;
  readonly qualifiers: Qualifiers;
  readonly lineNumber?: number;
}

/**
 * First value of a qualifier, or undefined when absent
 *
 * @example
 * ```typescript
 * qualifierValue(entry, "gene"); // "lacZ"
 * ```
 */
export function qualifierValue(entry: FeatureEntry, name: string): string | undefined {
  if (!Object.hasOwn(entry.qualifiers, name)) return undefined;
  const value = entry.qualifiers[name];
  if (value === undefined) return undefined;
  return typeof value === "string" ? value : value[0];
}

export class FeatureTable implements Iterable<FeatureEntry> {
  private readonly rows: readonly FeatureEntry[];
  private readonly slots: (Location | undefined)[];
  private readonly byKeyIndex = new Map<string, FeatureEntry[]>();

  constructor(features: Iterable<FeatureInput>) {
    const rows: FeatureEntry[] = [];
    for (const feature of features) {
      const entry: FeatureEntry = Object.freeze({
        index: rows.length,
        key: feature.key,
        rawLocation: feature.location,
        qualifiers: Object.freeze({ ...feature.qualifiers }),
        ...(feature.lineNumber !== undefined && { lineNumber: feature.lineNumber }),
      });
      rows.push(entry);

      const sameKey = this.byKeyIndex.get(entry.key);
      if (sameKey === undefined) {
        this.byKeyIndex.set(entry.key, [entry]);
      } else {
        sameKey.push(entry);
      }
    }
    this.rows = Object.freeze(rows);
    this.slots = new Array<Location | undefined>(rows.length).fill(undefined);
  }

  /** Number of features */
  get size(): number {
    return this.rows.length;
  }

  [Symbol.iterator](): Iterator<FeatureEntry> {
    return this.rows[Symbol.iterator]();
  }

  /** All entries in file order */
  entries(): readonly FeatureEntry[] {
    return this.rows;
  }

  /** Distinct feature keys in order of first appearance */
  keys(): string[] {
    return [...this.byKeyIndex.keys()];
  }

  /** Entries with the given key, in file order */
  byKey(key: string): readonly FeatureEntry[] {
    return this.byKeyIndex.get(key) ?? [];
  }

  /**
   * Entry for the n-th occurrence of a key
   *
   * @throws {FeatureLookupError} When the key or occurrence is absent
   */
  entry(key: string, occurrence = 0): FeatureEntry {
    const matches = this.byKey(key);
    const found = Number.isInteger(occurrence) ? matches[occurrence] : undefined;
    if (found === undefined) {
      throw new FeatureLookupError(key, occurrence, matches.length);
    }
    return found;
  }

  /**
   * Parsed location of the n-th occurrence of a feature key
   *
   * Parses on first access; later calls return the same tree object.
   *
   * @throws {FeatureLookupError} When the key or occurrence is absent
   * @throws {LocationSyntaxError} When the location text is malformed
   */
  getLocation(key: string, occurrence = 0): Location {
    return this.locationOf(this.entry(key, occurrence));
  }

  /**
   * Parsed location of an entry from this table
   *
   * @throws {ValidationError} When the entry belongs to another table
   */
  locationOf(entry: FeatureEntry): Location {
    if (this.rows[entry.index] !== entry) {
      throw new ValidationError(
        `Feature '${entry.key}' #${entry.index} does not belong to this table`
      );
    }

    const cached = this.slots[entry.index];
    if (cached !== undefined) return cached;

    const parsed = parseLocation(entry.rawLocation, entry.lineNumber);
    this.slots[entry.index] = parsed;
    return parsed;
  }

  /** True once the entry's location has been parsed */
  isParsed(entry: FeatureEntry): boolean {
    return this.slots[entry.index] !== undefined && this.rows[entry.index] === entry;
  }

  /**
   * Parse every location now, in file order
   *
   * @throws {LocationSyntaxError} At the first malformed location
   */
  parseAll(): void {
    for (const entry of this.rows) {
      this.locationOf(entry);
    }
  }

  /**
   * Subsequence of the n-th occurrence of a feature key
   *
   * @throws {ResolutionError} When the location cannot be resolved
   */
  extract(
    key: string,
    occurrence: number,
    sequence: SequenceAccessor,
    options: ResolveOptions = {}
  ): string {
    return resolveLocation(this.getLocation(key, occurrence), sequence, options);
  }
}
