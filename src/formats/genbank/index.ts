/**
 * GenBank flat file reading
 *
 * @module genbank
 */

export { parseFeatureBlock } from "./features";
export { parseLocusLine, parseMetadata } from "./metadata";
export { unwrapOrigin } from "./origin";
export { GenbankParser, parseRecord } from "./parser";
export { numberLines, splitRecords, splitSections } from "./sections";
export {
  GENBANK_LIMITS,
  type GenbankMetadata,
  type GenbankParserOptions,
  type GenbankRecord,
  type GenbankReference,
  type NumberedLine,
  type RecordSections,
} from "./types";
