/**
 * Coordinate queries over location trees
 *
 * These work on the leaf spans of a tree without touching sequence data,
 * e.g. to find where a feature starts or which stretches of a record lie
 * between its exons.
 *
 * @module locations/geometry
 */

import { FuzzyPositionError, InvalidLocationError, ValidationError } from "../errors";
import { range } from "./builders";
import { formatPosition, type Position } from "./position";
import type { Location, RangeLocation, Segment, Strand } from "./types";

function coordinateOf(position: Position): number {
  if (position.coordinate === undefined) {
    throw new FuzzyPositionError(position);
  }
  return position.coordinate;
}

function collect(location: Location, strand: Strand, out: Segment[]): void {
  switch (location.kind) {
    case "single": {
      const at = coordinateOf(location.position);
      out.push({ start: at, end: at, strand });
      return;
    }
    case "range": {
      const start = coordinateOf(location.start);
      const end = coordinateOf(location.end);
      // Fuzzy ends skip the builder's order check
      if (start > end) {
        throw new InvalidLocationError(
          `Range start ${start} is after end ${end}`,
          `${formatPosition(location.start)}..${formatPosition(location.end)}`
        );
      }
      out.push({ start, end, strand });
      return;
    }
    case "between":
      return;
    case "complement":
      collect(location.inner, strand === "+" ? "-" : "+", out);
      return;
    case "join":
    case "order":
      for (const part of location.parts) collect(part, strand, out);
      return;
    case "remote":
      // Lives on another record
      return;
  }
}

/**
 * Leaf spans in declared order with their strand
 *
 * Sites (`n^n+1`) and remote parts contribute no segment.
 *
 * @throws {FuzzyPositionError} On `?` positions without a coordinate
 * @throws {InvalidLocationError} On a fuzzy range whose start is after its end
 */
export function segmentsOf(location: Location): Segment[] {
  const segments: Segment[] = [];
  collect(location, "+", segments);
  return segments;
}

/**
 * Outermost coordinates covered by a location, or undefined when it
 * covers no bases on this record
 */
export function locationBounds(location: Location): { start: number; end: number } | undefined {
  const segments = segmentsOf(location);
  if (segments.length === 0) return undefined;

  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const segment of segments) {
    start = Math.min(start, segment.start);
    end = Math.max(end, segment.end);
  }
  return { start, end };
}

/**
 * Number of bases the location resolves to on this record
 */
export function locationLength(location: Location): number {
  return segmentsOf(location).reduce((total, s) => total + (s.end - s.start + 1), 0);
}

function boundsOrThrow(location: Location): { start: number; end: number } {
  const bounds = locationBounds(location);
  if (bounds === undefined) {
    throw new InvalidLocationError("Location covers no bases on this record");
  }
  return bounds;
}

/**
 * True when `inner` lies within the outer bounds of `outer` (inclusive)
 */
export function contains(outer: Location, inner: Location): boolean {
  const a = boundsOrThrow(outer);
  const b = boundsOrThrow(inner);
  return a.start <= b.start && b.end <= a.end;
}

/** True when `a` ends before `b` starts */
export function isLeftOf(a: Location, b: Location): boolean {
  return boundsOrThrow(a).end < boundsOrThrow(b).start;
}

/** True when `a` starts after `b` ends */
export function isRightOf(a: Location, b: Location): boolean {
  return isLeftOf(b, a);
}

/**
 * Bases strictly between two locations; 0 when they touch or overlap
 */
export function gapBetween(a: Location, b: Location): number {
  const x = boundsOrThrow(a);
  const y = boundsOrThrow(b);
  if (x.end < y.start) return y.start - x.end - 1;
  if (y.end < x.start) return x.start - y.end - 1;
  return 0;
}

/**
 * Stretches of `1..sequenceLength` not covered by any segment, ascending
 *
 * For a spliced feature these are the flanks and introns.
 *
 * @example
 * ```typescript
 * uncoveredRanges(parseLocation("join(3..5,8..9)"), 10);
 * // [1..2, 6..7, 10..10]
 * ```
 */
export function uncoveredRanges(location: Location, sequenceLength: number): RangeLocation[] {
  if (!Number.isInteger(sequenceLength) || sequenceLength < 1) {
    throw new ValidationError(`Sequence length must be a positive integer, got ${sequenceLength}`);
  }

  const sorted = segmentsOf(location).sort((x, y) => x.start - y.start);
  const gaps: RangeLocation[] = [];
  let next = 1;

  for (const segment of sorted) {
    if (segment.start > next) {
      gaps.push(range(next, Math.min(segment.start - 1, sequenceLength)));
    }
    next = Math.max(next, segment.end + 1);
    if (next > sequenceLength) break;
  }
  if (next <= sequenceLength) {
    gaps.push(range(next, sequenceLength));
  }
  return gaps;
}
