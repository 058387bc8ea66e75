/**
 * Tests for splitting the feature table block
 */

import { describe, expect, test } from "vitest";
import { parseFeatureBlock } from "../../../src/formats/genbank/features";
import { numberLines } from "../../../src/formats/genbank/sections";

const BLOCK = [
  "     gene            <1..>40",
  '                     /gene="tstA"',
  "     CDS             join(1..9,",
  "                     21..29)",
  '                     /note="spans two',
  '                     lines"',
  '                     /translation="MAB',
  '                     CD"',
  "                     /codon_start=1",
  '                     /db_xref="TestDB:1"',
  '                     /db_xref="TestDB:2"',
  "                     /pseudo",
  '                     /label="say ""hi"""',
].join("\n");

describe("parseFeatureBlock", () => {
  const features = parseFeatureBlock(numberLines(BLOCK, 20));

  test("should split features with keys and raw locations", () => {
    expect(features.map((f) => [f.key, f.location, f.lineNumber])).toEqual([
      ["gene", "<1..>40", 20],
      ["CDS", "join(1..9,21..29)", 22],
    ]);
  });

  test("should collect qualifiers", () => {
    expect(features[1]?.qualifiers).toEqual({
      note: "spans two lines",
      translation: "MABCD",
      codon_start: "1",
      db_xref: ["TestDB:1", "TestDB:2"],
      pseudo: "",
      label: 'say "hi"',
    });
  });

  test("should keep a wrapped feature key line inside a quoted value", () => {
    const [feature] = parseFeatureBlock(
      numberLines(
        [
          "     misc_feature    1..5",
          '                     /note="a value that wraps onto',
          '     an indented line"',
        ].join("\n")
      )
    );
    expect(feature?.qualifiers).toEqual({ note: "a value that wraps onto an indented line" });
  });

  test("should warn about lines before the first feature", () => {
    const warnings: string[] = [];
    const result = parseFeatureBlock(
      numberLines('                     /gene="orphan"\n     gene            1..2'),
      (warning) => warnings.push(warning)
    );
    expect(warnings).toEqual(['Feature table line outside any feature: /gene="orphan"']);
    expect(result).toHaveLength(1);
  });

  test("should accept qualifier names shared with object members", () => {
    const [feature] = parseFeatureBlock(
      numberLines(
        [
          "     misc_feature    1..2",
          '                     /constructor="x"',
          '                     /constructor="y"',
          '                     /toString="z"',
        ].join("\n")
      )
    );
    expect(feature?.qualifiers?.["constructor"]).toEqual(["x", "y"]);
    expect(feature?.qualifiers?.["toString"]).toBe("z");
    expect(Object.keys(feature?.qualifiers ?? {})).toEqual(["constructor", "toString"]);
  });
});
