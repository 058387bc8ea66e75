/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Format parsers supply their own defaults and parsing logic; this class
 * merges options over them and gives every parser the same AbortSignal
 * checks and default error and warning handlers.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

type BaseDefaults = Required<
  Pick<ParserOptions, "skipValidation" | "maxLineLength" | "trackLineNumbers" | "onError" | "onWarning">
>;

/**
 * Options after defaults are applied
 */
export type ResolvedOptions<TOptions extends ParserOptions> = BaseDefaults & Partial<TOptions> & TOptions;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: BaseDefaults = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing should stop; call between records
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "GenBank")
   */
  protected abstract getFormatName(): string;
}

class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }
}
