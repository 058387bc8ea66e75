/**
 * ORIGIN block unwrapping
 *
 * @module genbank/origin
 */

import { ParseError } from "../../errors";
import type { NumberedLine } from "./types";

const ORIGIN_LINE = /^\s*(\d+)(?:\s+(.*))?$/;

/**
 * Join ORIGIN lines into one flat sequence
 *
 * Each line is a base count followed by blocks of ten bases; the count and
 * all whitespace are dropped.
 *
 * @param lines - Origin section from {@link splitSections}
 * @param uppercase - Uppercase the bases (GenBank writes them lowercase)
 * @throws {ParseError} On a line that is not numbered
 *
 * @example
 * ```typescript
 * unwrapOrigin(numberLines("        1 gatcctccat atacaacggt\n       21 atctccacct"));
 * // "GATCCTCCATATACAACGGTATCTCCACCT"
 * ```
 */
export function unwrapOrigin(lines: readonly NumberedLine[], uppercase = true): string {
  const chunks: string[] = [];

  for (const { text, lineNumber } of lines) {
    if (text.trim() === "") continue;

    const match = ORIGIN_LINE.exec(text);
    if (match === null) {
      throw new ParseError("ORIGIN line must start with a base count", "GenBank", lineNumber, text);
    }
    chunks.push((match[2] ?? "").replace(/\s+/g, ""));
  }

  const bases = chunks.join("");
  return uppercase ? bases.toUpperCase() : bases;
}
