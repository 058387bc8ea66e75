/**
 * Error handling for GenBank parsing and location resolution
 *
 * Every error carries a stable code plus optional line and context details,
 * so callers can decide per feature whether to skip it or abort the record.
 */

import type { Position } from "./locations/position";

/**
 * Base error class for all library errors
 */
export class GenbankError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "GenbankError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed or invalid data
 */
export class ValidationError extends GenbankError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends GenbankError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Malformed location expression text
 *
 * `offset` is the 0-based character index into `input` where the problem
 * was found and `fragment` the offending substring.
 */
export class LocationSyntaxError extends ParseError {
  constructor(
    message: string,
    public readonly input: string,
    public readonly offset: number,
    public readonly fragment: string,
    lineNumber?: number
  ) {
    super(
      `${message} at offset ${offset} near '${fragment}'`,
      "LOCATION",
      lineNumber,
      `Location: ${input}`
    );
    this.name = "LocationSyntaxError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\n  ${this.input}`;
    msg += `\n  ${" ".repeat(this.offset)}^`;
    return msg;
  }
}

/**
 * A location tree that violates a structural invariant, such as an exact
 * range whose start lies after its end
 */
export class InvalidLocationError extends ValidationError {
  constructor(message: string, context?: string) {
    super(message, undefined, context);
    this.name = "InvalidLocationError";
  }
}

/**
 * Coordinates outside `1..length` or in the wrong order
 */
export class OutOfBoundsError extends ValidationError {
  constructor(
    message: string,
    public readonly start: number,
    public readonly end: number,
    public readonly sequenceLength: number
  ) {
    super(message, undefined, `Requested ${start}..${end} of a ${sequenceLength} bp sequence`);
    this.name = "OutOfBoundsError";
  }

  static forRange(start: number, end: number, sequenceLength: number): OutOfBoundsError {
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      return new OutOfBoundsError(
        `Coordinates must be integers, got ${start}..${end}`,
        start,
        end,
        sequenceLength
      );
    }
    if (start > end) {
      return new OutOfBoundsError(
        `Start ${start} is after end ${end}`,
        start,
        end,
        sequenceLength
      );
    }
    return new OutOfBoundsError(
      `Range ${start}..${end} is outside 1..${sequenceLength}`,
      start,
      end,
      sequenceLength
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nSuggestion: GenBank coordinates are 1-based and inclusive`;
    return msg;
  }
}

/**
 * Resolution requested on a position whose coordinate is unknown
 */
export class FuzzyPositionError extends ValidationError {
  constructor(public readonly position: Position) {
    super(
      position.coordinate === undefined
        ? "Cannot resolve an unknown position without a coordinate"
        : `Position ?${position.coordinate} is approximate; pass acceptApproximate to use it`
    );
    this.name = "FuzzyPositionError";
  }
}

/**
 * A character with no complement under the configured policy
 */
export class UnmappedBaseError extends ValidationError {
  constructor(
    public readonly base: string,
    public readonly offset: number
  ) {
    super(`No complement for base '${base}' at offset ${offset}`);
    this.name = "UnmappedBaseError";
  }
}

/**
 * A remote location refers to an accession the caller did not supply
 */
export class MissingRemoteSequenceError extends GenbankError {
  constructor(public readonly accession: string) {
    super(
      `No sequence supplied for remote accession '${accession}'`,
      "MISSING_REMOTE_SEQUENCE",
      undefined,
      "Pass the record through remoteSequences to resolve cross-record locations"
    );
    this.name = "MissingRemoteSequenceError";
  }
}

/**
 * Errors that can stop a resolution
 */
export type ResolutionFailure =
  | OutOfBoundsError
  | FuzzyPositionError
  | UnmappedBaseError
  | MissingRemoteSequenceError;

/**
 * Resolution failure annotated with the join/order part indices leading to
 * the failing leaf, outermost first
 */
export class ResolutionError extends GenbankError {
  constructor(
    public readonly reason: ResolutionFailure,
    public readonly path: readonly number[],
    public readonly location: string
  ) {
    const where = path.length > 0 ? ` in part ${path.join(".")}` : "";
    super(
      `Failed to resolve ${location}${where}: ${reason.message}`,
      "RESOLUTION_ERROR",
      undefined,
      reason.context
    );
    this.name = "ResolutionError";
  }

  /** Index of the failing part in the outermost join or order */
  get partIndex(): number | undefined {
    return this.path[0];
  }
}

/**
 * Feature key or occurrence not present in a feature table
 */
export class FeatureLookupError extends GenbankError {
  constructor(
    public readonly featureKey: string,
    public readonly occurrence: number,
    public readonly available: number
  ) {
    super(
      available === 0
        ? `No '${featureKey}' feature in table`
        : `Occurrence ${occurrence} of '${featureKey}' requested, but only ${available} present`,
      "FEATURE_LOOKUP_ERROR"
    );
    this.name = "FeatureLookupError";
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends GenbankError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check the path; GenBank downloads are usually named .gb, .gbk or .gbff";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "The file is not readable by this process";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path is a directory; pass a single flat file, or one per record set";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Parse files one at a time instead of opening them all at once";
    }

    return undefined;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends GenbankError {
  constructor(
    message: string,
    public readonly operation: "read" | "parse",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Common error messages with helpful suggestions
 */
export const ERROR_SUGGESTIONS = {
  LOCATION_SYNTAX:
    "Location expressions look like 100..200, complement(5..10) or join(1..10,20..30)",
  OUT_OF_BOUNDS: "Check that the location belongs to this record and that the ORIGIN is complete",
  FUZZY_POSITION: "Unknown positions can only be resolved with acceptApproximate and a coordinate",
  UNMAPPED_BASE: "Use unmappedBases: 'passthrough' or iupac: true for ambiguity codes",
  REMOTE_SEQUENCE: "Supply the referenced record through remoteSequences",
  MISSING_FEATURE: "Iterate the feature table to see which keys are present",
  MALFORMED_RECORD: "Check that the record has LOCUS, FEATURES and ORIGIN sections ending in //",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: GenbankError): string | undefined {
  const target = error instanceof ResolutionError ? error.reason : error;

  if (target instanceof LocationSyntaxError) return ERROR_SUGGESTIONS.LOCATION_SYNTAX;
  if (target instanceof OutOfBoundsError) return ERROR_SUGGESTIONS.OUT_OF_BOUNDS;
  if (target instanceof FuzzyPositionError) return ERROR_SUGGESTIONS.FUZZY_POSITION;
  if (target instanceof UnmappedBaseError) return ERROR_SUGGESTIONS.UNMAPPED_BASE;
  if (target instanceof MissingRemoteSequenceError) return ERROR_SUGGESTIONS.REMOTE_SEQUENCE;
  if (target instanceof FeatureLookupError) return ERROR_SUGGESTIONS.MISSING_FEATURE;
  if (target instanceof ParseError && target.format === "GenBank") {
    return ERROR_SUGGESTIONS.MALFORMED_RECORD;
  }

  return undefined;
}
