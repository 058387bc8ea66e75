/**
 * Streaming GenBank flat file parser
 *
 * Reads one record at a time: header metadata, the feature table with
 * unparsed location text, and the ORIGIN sequence. Locations are parsed
 * lazily by the feature table unless `eagerLocations` is set.
 *
 * @module genbank/parser
 */

import { type } from "arktype";
import { GenbankError, ParseError, ValidationError } from "../../errors";
import { FeatureTable, type FeatureInput } from "../../features/feature-table";
import { createStream } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import { SequenceAccessor } from "../../sequence/accessor";
import { type FileReaderOptions, ParserOptionsSchema } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { parseFeatureBlock } from "./features";
import { parseMetadata } from "./metadata";
import { unwrapOrigin } from "./origin";
import { numberLines, splitRecords, splitSections } from "./sections";
import type { GenbankParserOptions, GenbankRecord, NumberedLine } from "./types";

const GenbankParserOptionsSchema = ParserOptionsSchema.and({
  "uppercaseSequence?": "boolean",
  "eagerLocations?": "boolean",
});

/**
 * Streaming GenBank parser
 *
 * @example Basic usage
 * ```typescript
 * const parser = new GenbankParser();
 * for await (const record of parser.parseFile("plasmid.gb")) {
 *   const cds = record.features.extract("CDS", 0, record.sequence);
 *   console.log(`${record.metadata.locusName}: ${cds.length} bp CDS`);
 * }
 * ```
 *
 * @example Collecting warnings instead of logging them
 * ```typescript
 * const warnings: string[] = [];
 * const parser = new GenbankParser({ onWarning: (w) => warnings.push(w) });
 * ```
 */
export class GenbankParser extends AbstractParser<GenbankRecord, GenbankParserOptions> {
  protected getDefaultOptions(): Partial<GenbankParserOptions> {
    return {
      uppercaseSequence: true,
      eagerLocations: false,
    };
  }

  constructor(options: GenbankParserOptions = {}) {
    const validationResult = GenbankParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid GenBank parser options: ${validationResult.summary}`,
        undefined,
        "GenBank parser configuration"
      );
    }
    super(options);
  }

  protected getFormatName(): string {
    return "GenBank";
  }

  /**
   * Parse records from GenBank text
   *
   * @throws {ParseError} When a record is malformed
   */
  async *parseString(data: string): AsyncIterable<GenbankRecord> {
    yield* this.parseNumberedLines(numberLines(data));
  }

  /**
   * Parse records from a file, streaming line by line
   *
   * @throws {FileError} When the file cannot be opened
   * @throws {ParseError} When a record is malformed
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<GenbankRecord> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    try {
      const stream = await createStream(filePath, options);
      yield* this.parse(stream, options?.encoding);
    } catch (error) {
      if (error instanceof GenbankError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new ParseError(
          `Failed to parse GenBank file '${filePath}': ${error.message}`,
          "GenBank",
          undefined,
          error.stack
        );
      }
      throw error;
    }
  }

  /**
   * Parse records from a byte stream
   */
  async *parse(
    stream: ReadableStream<Uint8Array>,
    encoding: FileReaderOptions["encoding"] = "utf8"
  ): AsyncIterable<GenbankRecord> {
    yield* this.parseNumberedLines(numbered(readLines(stream, encoding)));
  }

  private async *parseNumberedLines(
    lines: AsyncIterable<NumberedLine> | Iterable<NumberedLine>
  ): AsyncIterable<GenbankRecord> {
    for await (const record of splitRecords(this.checkLineLengths(lines))) {
      this.checkAborted();
      yield this.buildRecord(record);
    }
  }

  private async *checkLineLengths(
    lines: AsyncIterable<NumberedLine> | Iterable<NumberedLine>
  ): AsyncIterable<NumberedLine> {
    const { maxLineLength, onError } = this.options;
    for await (const line of lines) {
      if (line.text.length > maxLineLength) {
        onError(
          `Line length ${line.text.length} exceeds maximum ${maxLineLength}`,
          line.lineNumber
        );
      }
      yield line;
    }
  }

  private buildRecord(lines: readonly NumberedLine[]): GenbankRecord {
    const { onWarning, skipValidation, trackLineNumbers } = this.options;
    const sections = splitSections(lines);

    const metadata = parseMetadata(sections.metadata, onWarning);
    const inputs = parseFeatureBlock(sections.features, onWarning);
    const features = new FeatureTable(
      trackLineNumbers ? inputs : inputs.map(withoutLineNumber)
    );
    const bases = unwrapOrigin(sections.origin, this.options.uppercaseSequence !== false);
    const sequence = new SequenceAccessor(bases, {
      id: metadata.version !== "" ? metadata.version : metadata.locusName,
    });

    const locusLine = sections.metadata[0]?.lineNumber;
    if (!skipValidation && bases.length !== metadata.sequenceLength) {
      onWarning(
        `LOCUS declares ${metadata.sequenceLength} bp but ORIGIN holds ${bases.length}`,
        locusLine
      );
    }

    if (this.options.eagerLocations === true) {
      features.parseAll();
    }

    return {
      metadata,
      features,
      sequence,
      ...(trackLineNumbers && locusLine !== undefined && { lineNumber: locusLine }),
    };
  }
}

function withoutLineNumber(input: FeatureInput): FeatureInput {
  return {
    key: input.key,
    location: input.location,
    ...(input.qualifiers !== undefined && { qualifiers: input.qualifiers }),
  };
}

async function* numbered(lines: AsyncIterable<string>): AsyncIterable<NumberedLine> {
  let lineNumber = 0;
  for await (const text of lines) {
    lineNumber++;
    yield { text, lineNumber };
  }
}

/**
 * Parse a single GenBank record from text
 *
 * @throws {ParseError} When the text holds no record or more than one
 */
export async function parseRecord(
  data: string,
  options: GenbankParserOptions = {}
): Promise<GenbankRecord> {
  const records: GenbankRecord[] = [];
  for await (const record of new GenbankParser(options).parseString(data)) {
    records.push(record);
  }

  const [record] = records;
  if (record === undefined || records.length > 1) {
    throw new ParseError(
      `Expected exactly one GenBank record, found ${records.length}`,
      "GenBank"
    );
  }
  return record;
}
