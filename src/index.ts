/**
 * GenBank location expressions and feature tables
 *
 * Parse location strings such as `complement(join(<1..200,300..>450))`
 * into typed trees, resolve them against a record's sequence, and read
 * GenBank flat files into metadata, lazily parsed feature tables and
 * sequences.
 *
 * @example
 * ```typescript
 * import { GenbankParser, resolveLocation } from "genbank-locations";
 *
 * for await (const record of new GenbankParser().parseFile("plasmid.gb")) {
 *   for (const entry of record.features.byKey("CDS")) {
 *     const location = record.features.locationOf(entry);
 *     console.log(entry.qualifiers.gene, resolveLocation(location, record.sequence));
 *   }
 * }
 * ```
 */

// Error types
export {
  ERROR_SUGGESTIONS,
  FeatureLookupError,
  FileError,
  FuzzyPositionError,
  GenbankError,
  getErrorSuggestion,
  InvalidLocationError,
  LocationSyntaxError,
  MissingRemoteSequenceError,
  OutOfBoundsError,
  ParseError,
  ResolutionError,
  type ResolutionFailure,
  StreamError,
  UnmappedBaseError,
  ValidationError,
} from "./errors";
// Feature tables
export {
  type FeatureEntry,
  type FeatureInput,
  FeatureTable,
  type Qualifiers,
  qualifierValue,
} from "./features/feature-table";
// GenBank format
export {
  GENBANK_LIMITS,
  type GenbankMetadata,
  GenbankParser,
  type GenbankParserOptions,
  type GenbankRecord,
  type GenbankReference,
  parseRecord,
} from "./formats/genbank";
// File I/O
export { createStream, exists, getSize, readToString } from "./io/file-reader";
export { processBuffer, readLines } from "./io/stream-utils";
// Location expressions
export * from "./locations";
// Sequences
export { SequenceAccessor, type SequenceAccessorOptions } from "./sequence/accessor";
export {
  type ComplementOptions,
  complement as complementSequence,
  reverse,
  reverseComplement,
  type UnmappedBasePolicy,
} from "./sequence/manipulation";
// Core types
export type { FilePath, FileReaderOptions, ParserOptions } from "./types";
