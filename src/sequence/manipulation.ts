/**
 * Strand transformations for resolved subsequences
 *
 * The default table maps only A, C, G and T. Anything else either passes
 * through unchanged or raises, depending on the caller's policy; the IUPAC
 * table is opt-in.
 *
 * @module sequence/manipulation
 */

import { UnmappedBaseError } from "../errors";

// =============================================================================
// CONSTANTS
// =============================================================================

const ACGT_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
};

/**
 * DNA complement mapping including IUPAC ambiguity codes
 *
 * Every pair is symmetric so complementing twice is the identity. U has no
 * entry: mapping it to A would come back as T.
 */
const IUPAC_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  ...ACGT_COMPLEMENT_MAP,
  R: "Y",
  Y: "R", // Purines <-> Pyrimidines
  S: "S",
  W: "W", // Self-complementary
  K: "M",
  M: "K", // Keto <-> Amino
  B: "V",
  V: "B", // Not A <-> Not T
  D: "H",
  H: "D", // Not C <-> Not G
  N: "N",
  "-": "-",
  ".": ".",
  "*": "*",
};

// =============================================================================
// TYPES
// =============================================================================

/** What to do with a character the complement table has no entry for */
export type UnmappedBasePolicy = "passthrough" | "error";

export interface ComplementOptions {
  /** Use the IUPAC ambiguity table instead of plain ACGT (default: false) */
  readonly iupac?: boolean;
  /** Handling of characters missing from the table (default: "passthrough") */
  readonly unmappedBases?: UnmappedBasePolicy;
}

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement a sequence base by base, preserving case
 *
 * @example
 * ```typescript
 * complement("ACgt"); // "TGca"
 * complement("ACNT"); // "TGNA"
 * complement("ACNT", { unmappedBases: "error" }); // throws UnmappedBaseError
 * ```
 *
 * @throws {UnmappedBaseError} Under the "error" policy
 */
export function complement(sequence: string, options: ComplementOptions = {}): string {
  const table = options.iupac === true ? IUPAC_COMPLEMENT_MAP : ACGT_COMPLEMENT_MAP;
  const strict = options.unmappedBases === "error";
  const result = new Array<string>(sequence.length);

  for (let i = 0; i < sequence.length; i++) {
    const original = sequence.charAt(i);
    const upper = original.toUpperCase();
    const comp = table[upper];

    if (comp === undefined) {
      if (strict) {
        throw new UnmappedBaseError(original, i);
      }
      result[i] = original;
    } else if (original !== upper) {
      result[i] = comp.toLowerCase();
    } else {
      result[i] = comp;
    }
  }

  return result.join("");
}

/**
 * Reverse a sequence (simple string reversal)
 *
 * @example
 * ```typescript
 * reverse("ATCG"); // "GCTA"
 * ```
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Reverse complement: the opposite strand read 5' to 3'
 *
 * @example
 * ```typescript
 * reverseComplement("AAGT"); // "ACTT"
 * ```
 */
export function reverseComplement(sequence: string, options: ComplementOptions = {}): string {
  return reverse(complement(sequence, options));
}
