/**
 * Sequence positions with GenBank fuzziness markers
 *
 * @module locations/position
 */

import { InvalidLocationError } from "../errors";

/**
 * How certain a position is
 *
 * `before` and `after` are the `<` and `>` markers of partial features;
 * `unknown` is written `?` and may carry an approximate coordinate.
 */
export const Fuzziness = {
  EXACT: "exact",
  BEFORE: "before",
  AFTER: "after",
  UNKNOWN: "unknown",
} as const;

export type Fuzziness = (typeof Fuzziness)[keyof typeof Fuzziness];

/** A position with a usable 1-based coordinate */
export interface KnownPosition {
  readonly coordinate: number;
  readonly fuzzy: "exact" | "before" | "after";
}

/** A position whose coordinate is unknown or only approximate */
export interface UnknownPosition {
  readonly coordinate?: number;
  readonly fuzzy: "unknown";
}

export type Position = KnownPosition | UnknownPosition;

function assertCoordinate(coordinate: number): void {
  if (!Number.isSafeInteger(coordinate) || coordinate < 1) {
    throw new InvalidLocationError(`Position coordinate must be an integer >= 1, got ${coordinate}`);
  }
}

function known(coordinate: number, fuzzy: KnownPosition["fuzzy"]): KnownPosition {
  assertCoordinate(coordinate);
  const position: KnownPosition = { coordinate, fuzzy };
  return Object.freeze(position);
}

export function exact(coordinate: number): KnownPosition {
  return known(coordinate, Fuzziness.EXACT);
}

/** `<n`: the feature starts somewhere before `n` */
export function before(coordinate: number): KnownPosition {
  return known(coordinate, Fuzziness.BEFORE);
}

/** `>n`: the feature ends somewhere after `n` */
export function after(coordinate: number): KnownPosition {
  return known(coordinate, Fuzziness.AFTER);
}

/**
 * Unknown position, optionally with an approximate coordinate (`?120`)
 */
export function unknown(coordinate?: number): UnknownPosition {
  if (coordinate !== undefined) {
    assertCoordinate(coordinate);
  }
  const position: UnknownPosition =
    coordinate === undefined ? { fuzzy: Fuzziness.UNKNOWN } : { coordinate, fuzzy: Fuzziness.UNKNOWN };
  return Object.freeze(position);
}

export function isExact(position: Position): position is KnownPosition {
  return position.fuzzy === Fuzziness.EXACT;
}

export function isKnown(position: Position): position is KnownPosition {
  return position.fuzzy !== Fuzziness.UNKNOWN;
}

/**
 * Render a position the way it appears in a feature table
 *
 * @example
 * ```typescript
 * formatPosition(before(1)); // "<1"
 * formatPosition(unknown()); // "?"
 * ```
 */
export function formatPosition(position: Position): string {
  switch (position.fuzzy) {
    case "exact":
      return String(position.coordinate);
    case "before":
      return `<${position.coordinate}`;
    case "after":
      return `>${position.coordinate}`;
    case "unknown":
      return position.coordinate === undefined ? "?" : `?${position.coordinate}`;
  }
}
