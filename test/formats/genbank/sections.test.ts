/**
 * Tests for GenBank record and section splitting, header and ORIGIN parsing
 */

import { describe, expect, test } from "vitest";
import { ParseError } from "../../../src/errors";
import { parseLocusLine, parseMetadata } from "../../../src/formats/genbank/metadata";
import { unwrapOrigin } from "../../../src/formats/genbank/origin";
import { numberLines, splitRecords, splitSections } from "../../../src/formats/genbank/sections";
import { collect, thrown } from "../../helpers";

const HEADER = [
  "LOCUS       TESTSEQ2                  20 bp    DNA     circular BCT 02-FEB-2024",
  "DEFINITION  Small circular test molecule.",
  "ACCESSION   TS000002 TS000003",
  "VERSION     TS000002.3",
  "DBLINK      BioProject: PRJTEST1",
  "KEYWORDS    test; synthetic.",
  "SOURCE      test bacterium",
  "  ORGANISM  Testus bacterium",
  "            Bacteria; Testaceae;",
  "            Testus.",
  "REFERENCE   1  (bases 1 to 20)",
  "  CONSRTM   Test Consortium",
  "  TITLE     Direct",
  "            Submission",
  "  JOURNAL   Submitted (01-JAN-2024)",
  "  PUBMED    12345",
  "REFERENCE   2  (bases 5 to 10)",
  "  AUTHORS   Roe,R.",
  "COMMENT     Line one.",
  "            Line two.",
].join("\n");

describe("numberLines", () => {
  test("should number lines from one and strip CRLF", () => {
    expect(numberLines("a\r\nb\nc")).toEqual([
      { text: "a", lineNumber: 1 },
      { text: "b", lineNumber: 2 },
      { text: "c", lineNumber: 3 },
    ]);
    expect(numberLines("x", 7)).toEqual([{ text: "x", lineNumber: 7 }]);
  });
});

describe("splitRecords", () => {
  test("should split on // and drop blank lines between records", async () => {
    const records = await collect(splitRecords(numberLines("LOCUS a\n//\n\nLOCUS b\nX\n//\n")));
    expect(records.map((r) => r.map((l) => l.text))).toEqual([["LOCUS a"], ["LOCUS b", "X"]]);
    expect(records[1]?.[0]?.lineNumber).toBe(4);
  });

  test("should return an unterminated trailing record", async () => {
    const records = await collect(splitRecords(numberLines("LOCUS a\nORIGIN")));
    expect(records).toHaveLength(1);
  });
});

describe("splitSections", () => {
  test("should separate header, features and origin", () => {
    const sections = splitSections(
      numberLines(
        [
          "LOCUS       X 4 bp DNA PLN 01-JAN-2024",
          "FEATURES             Location/Qualifiers",
          "     gene            1..4",
          "BASE COUNT        1 a      1 c      1 g      1 t",
          "ORIGIN",
          "        1 acgt",
        ].join("\n")
      )
    );
    expect(sections.metadata.map((l) => l.lineNumber)).toEqual([1]);
    expect(sections.features.map((l) => l.text)).toEqual(["     gene            1..4"]);
    expect(sections.origin.map((l) => l.text)).toEqual(["        1 acgt"]);
  });

  test("should require a LOCUS line first", () => {
    const error = thrown(() => splitSections(numberLines("DEFINITION  x")), ParseError);
    expect(error.message).toBe("Record does not start with a LOCUS line");
    expect(error.lineNumber).toBe(1);
  });
});

describe("parseLocusLine", () => {
  test("should read fields without a topology", () => {
    expect(
      parseLocusLine("LOCUS       SCU49845     5028 bp    DNA             PLN       21-JUN-1999")
    ).toEqual({
      locusName: "SCU49845",
      sequenceLength: 5028,
      moleculeType: "DNA",
      topology: "",
      division: "PLN",
      modificationDate: "21-JUN-1999",
    });
  });

  test("should reject short or non-numeric LOCUS lines", () => {
    expect(() => parseLocusLine("LOCUS       X 10 bp", 3)).toThrow(ParseError);
    expect(() => parseLocusLine("LOCUS       X ten bp DNA PLN 01-JAN-2024")).toThrow(
      "Invalid LOCUS length 'ten'"
    );
  });
});

describe("parseMetadata", () => {
  test("should read header keywords", () => {
    const metadata = parseMetadata(numberLines(HEADER));

    expect(metadata).toMatchObject({
      locusName: "TESTSEQ2",
      sequenceLength: 20,
      moleculeType: "DNA",
      topology: "circular",
      division: "BCT",
      modificationDate: "02-FEB-2024",
      definition: "Small circular test molecule.",
      accessions: ["TS000002", "TS000003"],
      version: "TS000002.3",
      dblink: "BioProject: PRJTEST1",
      keywords: "test; synthetic.",
      source: "test bacterium",
      organism: "Testus bacterium",
      taxonomy: ["Bacteria", "Testaceae", "Testus"],
      comment: "Line one.\nLine two.",
    });
  });

  test("should read reference blocks", () => {
    const { references } = parseMetadata(numberLines(HEADER));
    expect(references).toEqual([
      {
        reference: "1  (bases 1 to 20)",
        consortium: "Test Consortium",
        title: "Direct Submission",
        journal: "Submitted (01-JAN-2024)",
        pubmed: "12345",
      },
      { reference: "2  (bases 5 to 10)", authors: "Roe,R." },
    ]);
  });

  test("should warn on unrecognised keywords", () => {
    const warnings: [string, number | undefined][] = [];
    parseMetadata(
      numberLines("LOCUS       X 4 bp DNA PLN 01-JAN-2024\nFROBNICATE  yes"),
      (warning, lineNumber) => warnings.push([warning, lineNumber])
    );
    expect(warnings).toEqual([["Unrecognised header keyword 'FROBNICATE'", 2]]);
  });
});

describe("unwrapOrigin", () => {
  const lines = numberLines("        1 gatcctccat atacaacggt\n       21 atctccacct\n");

  test("should drop counts and whitespace and uppercase", () => {
    expect(unwrapOrigin(lines)).toBe("GATCCTCCATATACAACGGTATCTCCACCT");
  });

  test("should keep case when asked", () => {
    expect(unwrapOrigin(lines, false)).toBe("gatcctccatatacaacggtatctccacct");
  });

  test("should reject unnumbered lines", () => {
    const error = thrown(() => unwrapOrigin(numberLines("acgt acgt")), ParseError);
    expect(error.message).toBe("ORIGIN line must start with a base count");
  });
});
