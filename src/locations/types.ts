/**
 * Location expression tree
 *
 * A feature location is a small recursive expression: leaves address bases
 * on the sequence, composite nodes complement or concatenate other
 * locations. Trees are immutable once built.
 *
 * @module locations/types
 */

import type { Position } from "./position";

/** One base, e.g. `467` */
export interface SingleLocation {
  readonly kind: "single";
  readonly position: Position;
}

/** Inclusive span, e.g. `<345..500` */
export interface RangeLocation {
  readonly kind: "range";
  readonly start: Position;
  readonly end: Position;
}

/**
 * Site between two adjacent bases, e.g. `123^124`, or between the last
 * and first base of a circular molecule, e.g. `5000^1`
 */
export interface BetweenLocation {
  readonly kind: "between";
  readonly left: number;
  readonly right: number;
}

/** Opposite strand of `inner` */
export interface ComplementLocation {
  readonly kind: "complement";
  readonly inner: Location;
}

/** Parts assembled 5' to 3' in declared order */
export interface JoinLocation {
  readonly kind: "join";
  readonly parts: readonly Location[];
}

/** Parts found in declared order, with no claim that they are joined */
export interface OrderLocation {
  readonly kind: "order";
  readonly parts: readonly Location[];
}

/** Location on another record, e.g. `J00194.1:100..202` */
export interface RemoteLocation {
  readonly kind: "remote";
  readonly accession: string;
  readonly inner: Location;
}

export type Location =
  | SingleLocation
  | RangeLocation
  | BetweenLocation
  | ComplementLocation
  | JoinLocation
  | OrderLocation
  | RemoteLocation;

export type LocationKind = Location["kind"];

/** Strand of a resolved segment */
export type Strand = "+" | "-";

/**
 * Contiguous stretch addressed by a leaf of the tree
 */
export interface Segment {
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
}
