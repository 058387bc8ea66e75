/**
 * Split GenBank text into records and record sections
 *
 * @module genbank/sections
 */

import { ParseError } from "../../errors";
import type { NumberedLine, RecordSections } from "./types";

const RECORD_END = "//";

function isTopLevelKeyword(text: string, keyword: string): boolean {
  return text.startsWith(keyword) && (text.length === keyword.length || /\s/.test(text.charAt(keyword.length)));
}

/**
 * Group numbered lines into records terminated by `//`
 *
 * Blank lines outside records are dropped. A trailing record without a
 * terminator is still returned, so a truncated file surfaces as a parse
 * error in its sections.
 */
export async function* splitRecords(
  lines: AsyncIterable<NumberedLine> | Iterable<NumberedLine>
): AsyncGenerator<NumberedLine[]> {
  let current: NumberedLine[] = [];

  for await (const line of lines) {
    if (line.text.trimEnd() === RECORD_END) {
      if (current.length > 0) yield current;
      current = [];
      continue;
    }
    if (current.length === 0 && line.text.trim() === "") continue;
    current.push(line);
  }

  if (current.length > 0) yield current;
}

/**
 * Attach 1-based line numbers to raw text
 */
export function numberLines(data: string, firstLine = 1): NumberedLine[] {
  return data.split(/\r?\n/).map((text, i) => ({ text, lineNumber: firstLine + i }));
}

/**
 * Separate one record into header, feature table and ORIGIN lines
 *
 * The feature section excludes the `FEATURES` header line and stops at the
 * next top-level keyword (`BASE COUNT`, `CONTIG` or `ORIGIN`). The origin
 * section excludes the `ORIGIN` line.
 *
 * @throws {ParseError} When the record does not start with LOCUS
 */
export function splitSections(record: readonly NumberedLine[]): RecordSections {
  const first = record.find((line) => line.text.trim() !== "");
  if (first === undefined || !isTopLevelKeyword(first.text, "LOCUS")) {
    throw new ParseError(
      "Record does not start with a LOCUS line",
      "GenBank",
      first?.lineNumber,
      first?.text
    );
  }

  const metadata: NumberedLine[] = [];
  const features: NumberedLine[] = [];
  const origin: NumberedLine[] = [];
  let section: "metadata" | "features" | "other" | "origin" = "metadata";

  for (const line of record) {
    const text = line.text;
    const topLevel = text.length > 0 && !/\s/.test(text.charAt(0));

    if (topLevel && section !== "origin") {
      if (isTopLevelKeyword(text, "FEATURES")) {
        section = "features";
        continue;
      }
      if (isTopLevelKeyword(text, "ORIGIN")) {
        section = "origin";
        continue;
      }
      if (section === "features") {
        section = "other";
      }
    }

    if (section === "metadata") metadata.push(line);
    else if (section === "features") features.push(line);
    else if (section === "origin") origin.push(line);
  }

  return { metadata, features, origin };
}
