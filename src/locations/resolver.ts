/**
 * Evaluate location trees against a sequence
 *
 * Resolution is structural recursion over the tree: leaves slice the
 * sequence, complements reverse-complement their inner result and joins
 * concatenate their parts in declared order. Pure with respect to its
 * inputs.
 *
 * @module locations/resolver
 */

import { type } from "arktype";
import {
  FuzzyPositionError,
  MissingRemoteSequenceError,
  OutOfBoundsError,
  ResolutionError,
  type ResolutionFailure,
  UnmappedBaseError,
  ValidationError,
} from "../errors";
import type { SequenceAccessor } from "../sequence/accessor";
import { reverseComplement, type UnmappedBasePolicy } from "../sequence/manipulation";
import type { Position } from "./position";
import { formatLocation } from "./serializer";
import type { Location } from "./types";

/**
 * Resolver configuration
 */
export interface ResolveOptions {
  /** Resolve `?n` positions at their approximate coordinate (default: false) */
  readonly acceptApproximate?: boolean;
  /** Complement policy for characters outside the table (default: "passthrough") */
  readonly unmappedBases?: UnmappedBasePolicy;
  /** Complement IUPAC ambiguity codes (default: false) */
  readonly iupac?: boolean;
  /** Sequences of other records, keyed by accession, for remote locations */
  readonly remoteSequences?: ReadonlyMap<string, SequenceAccessor>;
}

const ResolveOptionsSchema = type({
  "acceptApproximate?": "boolean",
  "unmappedBases?": "'passthrough' | 'error'",
  "iupac?": "boolean",
});

interface Settings {
  readonly acceptApproximate: boolean;
  readonly unmappedBases: UnmappedBasePolicy;
  readonly iupac: boolean;
  readonly remoteSequences: ReadonlyMap<string, SequenceAccessor>;
}

const DEFAULT_SETTINGS: Settings = {
  acceptApproximate: false,
  unmappedBases: "passthrough",
  iupac: false,
  remoteSequences: new Map(),
};

function settingsFrom(options: ResolveOptions): Settings {
  const settings: Settings = {
    acceptApproximate: options.acceptApproximate ?? DEFAULT_SETTINGS.acceptApproximate,
    unmappedBases: options.unmappedBases ?? DEFAULT_SETTINGS.unmappedBases,
    iupac: options.iupac ?? DEFAULT_SETTINGS.iupac,
    remoteSequences: options.remoteSequences ?? DEFAULT_SETTINGS.remoteSequences,
  };

  const validation = ResolveOptionsSchema(settings);
  if (validation instanceof type.errors) {
    throw new ValidationError(
      `Invalid resolve options: ${validation.summary}`,
      undefined,
      "Location resolver configuration"
    );
  }
  return settings;
}

/**
 * Failure raised inside the recursion, carrying the path built so far
 */
class PartFailure {
  constructor(
    readonly reason: ResolutionFailure,
    readonly path: number[]
  ) {}
}

function coordinateOf(position: Position, settings: Settings): number {
  if (position.fuzzy !== "unknown") {
    return position.coordinate;
  }
  if (settings.acceptApproximate && position.coordinate !== undefined) {
    return position.coordinate;
  }
  throw new PartFailure(new FuzzyPositionError(position), []);
}

function slice(sequence: SequenceAccessor, start: number, end: number): string {
  try {
    return sequence.slice(start, end);
  } catch (error) {
    if (error instanceof OutOfBoundsError) {
      throw new PartFailure(error, []);
    }
    throw error;
  }
}

function resolveParts(
  parts: readonly Location[],
  sequence: SequenceAccessor,
  settings: Settings
): string[] {
  return parts.map((part, index) => {
    try {
      return resolveNode(part, sequence, settings);
    } catch (error) {
      if (error instanceof PartFailure) {
        throw new PartFailure(error.reason, [index, ...error.path]);
      }
      throw error;
    }
  });
}

function resolveNode(location: Location, sequence: SequenceAccessor, settings: Settings): string {
  switch (location.kind) {
    case "single": {
      const position = coordinateOf(location.position, settings);
      return slice(sequence, position, position);
    }

    case "range":
      return slice(
        sequence,
        coordinateOf(location.start, settings),
        coordinateOf(location.end, settings)
      );

    case "between":
      // Both flanking bases must exist; the site itself has no bases
      slice(sequence, location.left, location.left);
      slice(sequence, location.right, location.right);
      return "";

    case "complement": {
      const inner = resolveNode(location.inner, sequence, settings);
      try {
        return reverseComplement(inner, settings);
      } catch (error) {
        if (error instanceof UnmappedBaseError) {
          throw new PartFailure(error, []);
        }
        throw error;
      }
    }

    case "join":
    case "order":
      return resolveParts(location.parts, sequence, settings).join("");

    case "remote": {
      const target = settings.remoteSequences.get(location.accession);
      if (target === undefined) {
        throw new PartFailure(new MissingRemoteSequenceError(location.accession), []);
      }
      return resolveNode(location.inner, target, settings);
    }
  }
}

function run<T>(location: Location, evaluate: () => T): T {
  try {
    return evaluate();
  } catch (error) {
    if (error instanceof PartFailure) {
      throw new ResolutionError(error.reason, error.path, formatLocation(location));
    }
    throw error;
  }
}

/**
 * Extract the subsequence a location describes
 *
 * @param location - Parsed location tree
 * @param sequence - Sequence of the record the location belongs to
 * @param options - Fuzzy-position, complement and remote-record settings
 * @throws {ResolutionError} Wrapping the first failure; `path` names the
 *   failing join/order part
 * @throws {ValidationError} On invalid options
 *
 * @example
 * ```typescript
 * const seq = new SequenceAccessor("ACGTACGT");
 * resolveLocation(parseLocation("join(1..2,complement(3..4))"), seq); // "ACAC"
 * ```
 */
export function resolveLocation(
  location: Location,
  sequence: SequenceAccessor,
  options: ResolveOptions = {}
): string {
  const settings = settingsFrom(options);
  return run(location, () => resolveNode(location, sequence, settings));
}

/**
 * Resolve the parts of a top-level join or order separately
 *
 * Any other location yields a single-element array. Callers that need a
 * coordinate-sorted assembly sort these themselves.
 *
 * @throws {ResolutionError} As {@link resolveLocation}
 */
export function resolveSegments(
  location: Location,
  sequence: SequenceAccessor,
  options: ResolveOptions = {}
): string[] {
  const settings = settingsFrom(options);
  return run(location, () =>
    location.kind === "join" || location.kind === "order"
      ? resolveParts(location.parts, sequence, settings)
      : [resolveNode(location, sequence, settings)]
  );
}
