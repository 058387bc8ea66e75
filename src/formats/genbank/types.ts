/**
 * GenBank record type definitions
 *
 * @module genbank/types
 */

import type { FeatureTable } from "../../features/feature-table";
import type { SequenceAccessor } from "../../sequence/accessor";
import type { ParserOptions } from "../../types";

/**
 * One REFERENCE block
 */
export interface GenbankReference {
  /** REFERENCE line text, e.g. "1  (bases 1 to 5028)" */
  readonly reference: string;
  readonly authors?: string;
  readonly consortium?: string;
  readonly title?: string;
  readonly journal?: string;
  readonly pubmed?: string;
  readonly remark?: string;
}

/**
 * Header fields preceding the FEATURES section
 */
export interface GenbankMetadata {
  readonly locusName: string;
  /** Length declared on the LOCUS line */
  readonly sequenceLength: number;
  /** e.g. "DNA", "mRNA", "ss-RNA" */
  readonly moleculeType: string;
  /** "linear", "circular", or "" when the LOCUS line omits it */
  readonly topology: string;
  /** Three-letter division code, e.g. "PLN" */
  readonly division: string;
  /** Modification date as written, e.g. "21-JUN-1999" */
  readonly modificationDate: string;
  readonly definition: string;
  readonly accessions: readonly string[];
  readonly version: string;
  readonly dblink?: string;
  readonly keywords: string;
  readonly source: string;
  readonly organism: string;
  /** Lineage lines under ORGANISM, split on ";" */
  readonly taxonomy: readonly string[];
  readonly references: readonly GenbankReference[];
  readonly comment?: string;
}

/**
 * Parsed GenBank record
 */
export interface GenbankRecord {
  readonly metadata: GenbankMetadata;
  readonly features: FeatureTable;
  readonly sequence: SequenceAccessor;
  /** Line of the LOCUS keyword */
  readonly lineNumber?: number;
}

/**
 * Raw section lines of one record
 */
export interface RecordSections {
  readonly metadata: readonly NumberedLine[];
  readonly features: readonly NumberedLine[];
  readonly origin: readonly NumberedLine[];
}

export interface NumberedLine {
  readonly text: string;
  /** 1-based line in the source */
  readonly lineNumber: number;
}

/**
 * GenBank parser configuration options
 */
export interface GenbankParserOptions extends ParserOptions {
  /** Uppercase ORIGIN bases (default: true) */
  uppercaseSequence?: boolean;
  /** Parse every feature location while reading the record (default: false) */
  eagerLocations?: boolean;
}

/**
 * Column layout of GenBank flat files
 */
export const GENBANK_LIMITS = {
  /** Column where feature locations and qualifiers start */
  FEATURE_VALUE_COLUMN: 21,
  /** Column where header keyword values start */
  KEYWORD_VALUE_COLUMN: 12,
} as const;
