/**
 * Read-only view of a nucleotide sequence in GenBank coordinates
 *
 * Callers address bases 1-based and inclusive; the translation to string
 * offsets happens here and nowhere else.
 *
 * @module sequence/accessor
 */

import { OutOfBoundsError } from "../errors";

export interface SequenceAccessorOptions {
  /** Record accession or locus name, used in messages */
  readonly id?: string;
}

export class SequenceAccessor {
  readonly length: number;
  readonly id: string | undefined;

  constructor(
    private readonly bases: string,
    options: SequenceAccessorOptions = {}
  ) {
    this.length = bases.length;
    this.id = options.id;
  }

  /**
   * Base at a 1-based position
   *
   * @throws {OutOfBoundsError} When `position` is not in `1..length`
   */
  at(position: number): string {
    return this.slice(position, position);
  }

  /**
   * Inclusive 1-based slice `[start, end]`
   *
   * @throws {OutOfBoundsError} When `start < 1`, `end > length` or `start > end`
   *
   * @example
   * ```typescript
   * new SequenceAccessor("ACGTACGT").slice(2, 4); // "CGT"
   * ```
   */
  slice(start: number, end: number): string {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 1 ||
      end > this.length ||
      start > end
    ) {
      throw OutOfBoundsError.forRange(start, end, this.length);
    }
    return this.bases.slice(start - 1, end);
  }

  /** The whole sequence */
  toString(): string {
    return this.bases;
  }
}
