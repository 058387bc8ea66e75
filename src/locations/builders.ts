/**
 * Constructors for location trees
 *
 * Builders enforce the structural invariants so that every tree reachable
 * from the public API is well formed: exact ranges are ordered, joins are
 * non-empty and flat, and `^` sites name adjacent bases.
 *
 * @module locations/builders
 */

import { InvalidLocationError } from "../errors";
import { exact, formatPosition, isExact, type Position } from "./position";
import type {
  BetweenLocation,
  ComplementLocation,
  JoinLocation,
  Location,
  OrderLocation,
  RangeLocation,
  RemoteLocation,
  SingleLocation,
} from "./types";

function toPosition(value: Position | number): Position {
  return typeof value === "number" ? exact(value) : value;
}

export function single(position: Position | number): SingleLocation {
  const node: SingleLocation = { kind: "single", position: toPosition(position) };
  return Object.freeze(node);
}

/**
 * Inclusive range; numbers are taken as exact positions
 *
 * @throws {InvalidLocationError} When both ends are exact and start > end
 */
export function range(start: Position | number, end: Position | number): RangeLocation {
  const from = toPosition(start);
  const to = toPosition(end);

  if (isExact(from) && isExact(to) && from.coordinate > to.coordinate) {
    throw new InvalidLocationError(
      `Range start ${from.coordinate} is after end ${to.coordinate}`,
      `${formatPosition(from)}..${formatPosition(to)}`
    );
  }

  const node: RangeLocation = { kind: "range", start: from, end: to };
  return Object.freeze(node);
}

/**
 * Site between two bases
 *
 * @throws {InvalidLocationError} Unless right == left + 1 or right == 1
 */
export function between(left: number, right: number): BetweenLocation {
  for (const value of [left, right]) {
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new InvalidLocationError(`Site coordinate must be an integer >= 1, got ${value}`);
    }
  }
  if (right !== left + 1 && (right !== 1 || left === 1)) {
    throw new InvalidLocationError(
      `Site ${left}^${right} must name adjacent bases (n^n+1) or wrap a circular molecule (n^1)`,
      `${left}^${right}`
    );
  }
  const node: BetweenLocation = { kind: "between", left, right };
  return Object.freeze(node);
}

/**
 * True when a site wraps from the last base back to the first
 */
export function isCircularSite(location: BetweenLocation): boolean {
  return location.right === 1;
}

export function complement(inner: Location): ComplementLocation {
  const node: ComplementLocation = { kind: "complement", inner };
  return Object.freeze(node);
}

function flatten(kind: "join" | "order", parts: readonly Location[]): Location[] {
  const flat: Location[] = [];
  for (const part of parts) {
    if (part.kind === kind) {
      flat.push(...part.parts);
    } else {
      flat.push(part);
    }
  }
  return flat;
}

/**
 * Join in declared order; nested joins are spliced into the parent
 *
 * @throws {InvalidLocationError} When no parts are given
 */
export function join(parts: readonly Location[]): JoinLocation {
  if (parts.length === 0) {
    throw new InvalidLocationError("join requires at least one part");
  }
  const node: JoinLocation = { kind: "join", parts: Object.freeze(flatten("join", parts)) };
  return Object.freeze(node);
}

/**
 * Order in declared order; nested orders are spliced into the parent
 *
 * @throws {InvalidLocationError} When no parts are given
 */
export function order(parts: readonly Location[]): OrderLocation {
  if (parts.length === 0) {
    throw new InvalidLocationError("order requires at least one part");
  }
  const node: OrderLocation = { kind: "order", parts: Object.freeze(flatten("order", parts)) };
  return Object.freeze(node);
}

export function remote(accession: string, inner: Location): RemoteLocation {
  if (accession.trim() === "") {
    throw new InvalidLocationError("Remote location requires an accession");
  }
  const node: RemoteLocation = { kind: "remote", accession, inner };
  return Object.freeze(node);
}
