/**
 * Shared option types and validation schemas
 *
 * Parsers and readers take plain option objects merged over defaults;
 * arktype schemas check the merged values before use.
 */

import { type } from "arktype";

/**
 * Base parser configuration shared by every format parser
 */
export interface ParserOptions {
  /** Skip record consistency checks (LOCUS length against ORIGIN) */
  skipValidation?: boolean;
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to record source line numbers on parsed objects */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 65536) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "latin1";
  /** Maximum file size to prevent memory exhaustion (default: 1GB) */
  readonly maxFileSize?: number;
}

/**
 * Branded file path accepted by the I/O layer
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * File path validation
 */
export const FilePathSchema = type("string>0").pipe((path: string) => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": "'utf8' | 'latin1'",
  "maxFileSize?": "number>=0",
});

/**
 * Parser options validation schema (callbacks and signal are not checked)
 */
export const ParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
});
