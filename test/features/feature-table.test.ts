/**
 * Tests for the feature table and its parse-once locations
 */

import { describe, expect, test } from "vitest";
import {
  FeatureLookupError,
  LocationSyntaxError,
  ResolutionError,
  ValidationError,
} from "../../src/errors";
import { FeatureTable, type FeatureInput, qualifierValue } from "../../src/features/feature-table";
import { formatLocation } from "../../src/locations/serializer";
import { SequenceAccessor } from "../../src/sequence/accessor";
import { thrown } from "../helpers";

const inputs: FeatureInput[] = [
  { key: "gene", location: "1..8", qualifiers: { gene: "abc" }, lineNumber: 10 },
  {
    key: "CDS",
    location: "join(1..2,5..6)",
    qualifiers: { gene: "abc", note: ["one", "two"] },
    lineNumber: 12,
  },
  { key: "CDS", location: "complement(3..4)", lineNumber: 15 },
  { key: "gene", location: "1..8", lineNumber: 17 },
  { key: "misc_feature", location: "join(1..2", lineNumber: 19 },
];

const seq = new SequenceAccessor("ACGTACGT");

describe("FeatureTable", () => {
  describe("entries", () => {
    const table = new FeatureTable(inputs);

    test("should keep file order", () => {
      expect(table.size).toBe(5);
      expect([...table].map((e) => e.key)).toEqual(["gene", "CDS", "CDS", "gene", "misc_feature"]);
      expect(table.entries().map((e) => e.index)).toEqual([0, 1, 2, 3, 4]);
    });

    test("should list distinct keys in order of first appearance", () => {
      expect(table.keys()).toEqual(["gene", "CDS", "misc_feature"]);
    });

    test("should find entries by key and occurrence", () => {
      expect(table.byKey("CDS")).toHaveLength(2);
      expect(table.byKey("tRNA")).toEqual([]);
      expect(table.entry("CDS", 1).rawLocation).toBe("complement(3..4)");
      expect(table.entry("CDS").lineNumber).toBe(12);
    });

    test("should default missing qualifiers to an empty record", () => {
      expect(table.entry("CDS", 1).qualifiers).toEqual({});
    });

    test("should read first qualifier values", () => {
      const cds = table.entry("CDS");
      expect(qualifierValue(cds, "note")).toBe("one");
      expect(qualifierValue(cds, "gene")).toBe("abc");
      expect(qualifierValue(cds, "product")).toBeUndefined();
    });

    test("should report missing keys and occurrences", () => {
      expect(thrown(() => table.entry("tRNA"), FeatureLookupError).message).toBe(
        "No 'tRNA' feature in table"
      );
      expect(thrown(() => table.getLocation("CDS", 5), FeatureLookupError).message).toBe(
        "Occurrence 5 of 'CDS' requested, but only 2 present"
      );
    });
  });

  describe("locations", () => {
    test("should parse on first access and return the same tree afterwards", () => {
      const table = new FeatureTable(inputs);
      const entry = table.entry("CDS");

      expect(table.isParsed(entry)).toBe(false);
      const first = table.getLocation("CDS");
      expect(table.isParsed(entry)).toBe(true);
      expect(table.getLocation("CDS")).toBe(first);
      expect(table.locationOf(entry)).toBe(first);
      expect(formatLocation(first)).toBe("join(1..2,5..6)");
    });

    test("should keep separate trees for identical location text", () => {
      const table = new FeatureTable(inputs);
      const a = table.getLocation("gene", 0);
      const b = table.getLocation("gene", 1);
      expect(a).toEqual(b);
      expect(a).not.toBe(b);
    });

    test("should leave the slot empty when parsing fails", () => {
      const table = new FeatureTable(inputs);
      const error = thrown(() => table.getLocation("misc_feature"), LocationSyntaxError);
      expect(error.lineNumber).toBe(19);
      expect(table.isParsed(table.entry("misc_feature"))).toBe(false);
    });

    test("should refuse entries from another table", () => {
      const table = new FeatureTable(inputs);
      const other = new FeatureTable(inputs);
      expect(() => table.locationOf(other.entry("gene"))).toThrow(ValidationError);
      expect(table.isParsed(other.entry("gene"))).toBe(false);
    });

    test("should parse every location up to the first bad one", () => {
      const table = new FeatureTable(inputs);
      expect(() => table.parseAll()).toThrow(LocationSyntaxError);
      expect(table.entries().map((e) => table.isParsed(e))).toEqual([true, true, true, true, false]);
    });
  });

  describe("extract", () => {
    const table = new FeatureTable(inputs);

    test("should resolve a feature against the sequence", () => {
      expect(table.extract("CDS", 0, seq)).toBe("ACAC");
      expect(table.extract("CDS", 1, seq)).toBe("AC");
    });

    test("should surface resolution failures", () => {
      const short = new SequenceAccessor("ACGT");
      expect(() => table.extract("gene", 0, short)).toThrow(ResolutionError);
    });
  });
});
