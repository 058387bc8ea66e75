/**
 * Location expressions: model, grammar and resolution
 *
 * @example
 * ```typescript
 * import { parseLocation, resolveLocation } from "./locations";
 * import { SequenceAccessor } from "./sequence/accessor";
 *
 * const cds = parseLocation("join(1..2,5..6)");
 * resolveLocation(cds, new SequenceAccessor("ACGTACGT")); // "ACAC"
 * ```
 *
 * @module locations
 */

export { between, complement, isCircularSite, join, order, range, remote, single } from "./builders";
export {
  contains,
  gapBetween,
  isLeftOf,
  isRightOf,
  locationBounds,
  locationLength,
  segmentsOf,
  uncoveredRanges,
} from "./geometry";
export { type Token, type TokenType, tokenize } from "./lexer";
export { parseLocation } from "./parser";
export {
  after,
  before,
  exact,
  formatPosition,
  Fuzziness,
  isExact,
  isKnown,
  type KnownPosition,
  type Position,
  unknown,
  type UnknownPosition,
} from "./position";
export { type ResolveOptions, resolveLocation, resolveSegments } from "./resolver";
export { formatLocation } from "./serializer";
export type {
  BetweenLocation,
  ComplementLocation,
  JoinLocation,
  Location,
  LocationKind,
  OrderLocation,
  RangeLocation,
  RemoteLocation,
  Segment,
  SingleLocation,
  Strand,
} from "./types";
