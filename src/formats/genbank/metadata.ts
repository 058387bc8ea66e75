/**
 * GenBank header (LOCUS through COMMENT) parsing
 *
 * Header lines carry a keyword in columns 1-12 and a value from column 13.
 * Lines whose first twelve columns are blank continue the previous keyword;
 * indented keywords (ORGANISM, AUTHORS, ...) belong to the preceding
 * top-level keyword.
 *
 * @module genbank/metadata
 */

import { ParseError } from "../../errors";
import type { GenbankMetadata, GenbankReference, NumberedLine } from "./types";
import { GENBANK_LIMITS } from "./types";

interface KeywordBlock {
  readonly keyword: string;
  readonly lineNumber: number;
  readonly lines: string[];
  readonly children: KeywordBlock[];
}

const KNOWN_KEYWORDS = new Set([
  "LOCUS",
  "DEFINITION",
  "ACCESSION",
  "VERSION",
  "DBLINK",
  "KEYWORDS",
  "SEGMENT",
  "SOURCE",
  "REFERENCE",
  "COMMENT",
  "PRIMARY",
  "PROJECT",
  "NID",
]);

/**
 * Group header lines into keyword blocks with their continuation lines
 */
function toBlocks(lines: readonly NumberedLine[]): KeywordBlock[] {
  const blocks: KeywordBlock[] = [];
  let current: KeywordBlock | undefined;

  for (const { text, lineNumber } of lines) {
    if (text.trim() === "") continue;

    const head = text.slice(0, GENBANK_LIMITS.KEYWORD_VALUE_COLUMN);
    const value = text.slice(GENBANK_LIMITS.KEYWORD_VALUE_COLUMN).trim();
    const keyword = head.trim();

    if (keyword === "") {
      if (current === undefined) {
        throw new ParseError("Continuation line before any keyword", "GenBank", lineNumber, text);
      }
      current.lines.push(value);
      continue;
    }

    const block: KeywordBlock = { keyword, lineNumber, lines: [value], children: [] };
    const parent = blocks[blocks.length - 1];
    if (/^\s/.test(head) && parent !== undefined) {
      parent.children.push(block);
    } else {
      blocks.push(block);
    }
    current = block;
  }

  return blocks;
}

function joined(block: KeywordBlock | undefined): string {
  return block === undefined ? "" : block.lines.filter((l) => l !== "").join(" ");
}

function child(block: KeywordBlock, keyword: string): KeywordBlock | undefined {
  return block.children.find((c) => c.keyword === keyword);
}

/**
 * Parse the LOCUS line fields
 *
 * @example
 * ```typescript
 * parseLocusLine("LOCUS       SCU49845     5028 bp    DNA             PLN       21-JUN-1999");
 * // { locusName: "SCU49845", sequenceLength: 5028, moleculeType: "DNA",
 * //   topology: "", division: "PLN", modificationDate: "21-JUN-1999" }
 * ```
 */
export function parseLocusLine(
  text: string,
  lineNumber?: number
): Pick<
  GenbankMetadata,
  "locusName" | "sequenceLength" | "moleculeType" | "topology" | "division" | "modificationDate"
> {
  const tokens = text.trim().split(/\s+/).slice(1);
  const [locusName, lengthText, unit, ...rest] = tokens;

  if (locusName === undefined || lengthText === undefined || unit === undefined || rest.length < 3) {
    throw new ParseError(
      "LOCUS line needs name, length, unit, molecule type, division and date",
      "GenBank",
      lineNumber,
      text
    );
  }

  const sequenceLength = Number(lengthText);
  if (!Number.isSafeInteger(sequenceLength) || sequenceLength < 0) {
    throw new ParseError(`Invalid LOCUS length '${lengthText}'`, "GenBank", lineNumber, text);
  }

  const [moleculeType = "", ...tail] = rest;
  const modificationDate = tail[tail.length - 1] ?? "";
  const division = tail[tail.length - 2] ?? "";
  const topology = tail.length > 2 ? (tail[0] ?? "") : "";

  return { locusName, sequenceLength, moleculeType, topology, division, modificationDate };
}

function parseReference(block: KeywordBlock): GenbankReference {
  const field = (keyword: string): string | undefined => {
    const found = child(block, keyword);
    return found === undefined ? undefined : joined(found);
  };

  const authors = field("AUTHORS");
  const consortium = field("CONSRTM");
  const title = field("TITLE");
  const journal = field("JOURNAL");
  const pubmed = field("PUBMED");
  const remark = field("REMARK");

  return {
    reference: joined(block),
    ...(authors !== undefined && { authors }),
    ...(consortium !== undefined && { consortium }),
    ...(title !== undefined && { title }),
    ...(journal !== undefined && { journal }),
    ...(pubmed !== undefined && { pubmed }),
    ...(remark !== undefined && { remark }),
  };
}

/**
 * Parse header lines into metadata
 *
 * @param lines - Header section from {@link splitSections}
 * @param onWarning - Receives unrecognised keywords
 * @throws {ParseError} When the LOCUS line is missing or malformed
 */
export function parseMetadata(
  lines: readonly NumberedLine[],
  onWarning: (warning: string, lineNumber?: number) => void = () => {}
): GenbankMetadata {
  const blocks = toBlocks(lines);
  const byKeyword = (keyword: string): KeywordBlock | undefined =>
    blocks.find((b) => b.keyword === keyword);

  const locus = byKeyword("LOCUS");
  if (locus === undefined) {
    throw new ParseError("Missing LOCUS line", "GenBank", lines[0]?.lineNumber);
  }

  for (const block of blocks) {
    if (!KNOWN_KEYWORDS.has(block.keyword)) {
      onWarning(`Unrecognised header keyword '${block.keyword}'`, block.lineNumber);
    }
  }

  const source = byKeyword("SOURCE");
  const organismBlock = source === undefined ? undefined : child(source, "ORGANISM");
  const [organism = "", ...lineage] = organismBlock?.lines ?? [];
  const taxonomy = lineage
    .join(" ")
    .split(";")
    .map((taxon) => taxon.trim().replace(/\.$/, ""))
    .filter((taxon) => taxon !== "");

  const dblink = byKeyword("DBLINK");
  const comment = byKeyword("COMMENT");

  return {
    ...parseLocusLine(`LOCUS ${joined(locus)}`, locus.lineNumber),
    definition: joined(byKeyword("DEFINITION")),
    accessions: joined(byKeyword("ACCESSION"))
      .split(/\s+/)
      .filter((a) => a !== ""),
    version: joined(byKeyword("VERSION")).split(/\s+/)[0] ?? "",
    ...(dblink !== undefined && { dblink: joined(dblink) }),
    keywords: joined(byKeyword("KEYWORDS")),
    source: joined(source),
    organism,
    taxonomy,
    references: blocks.filter((b) => b.keyword === "REFERENCE").map(parseReference),
    ...(comment !== undefined && { comment: comment.lines.join("\n") }),
  };
}
