/**
 * Tests for positions and location builders
 */

import { describe, expect, test } from "vitest";
import { InvalidLocationError } from "../../src/errors";
import {
  between,
  complement,
  join,
  order,
  range,
  remote,
  single,
} from "../../src/locations/builders";
import {
  after,
  before,
  exact,
  formatPosition,
  isExact,
  isKnown,
  unknown,
} from "../../src/locations/position";
import { formatLocation } from "../../src/locations/serializer";

describe("positions", () => {
  test("should format every fuzziness marker", () => {
    expect([exact(5), before(5), after(5), unknown(), unknown(5)].map(formatPosition)).toEqual([
      "5",
      "<5",
      ">5",
      "?",
      "?5",
    ]);
  });

  test("should classify positions", () => {
    expect(isExact(exact(1))).toBe(true);
    expect(isExact(before(1))).toBe(false);
    expect(isKnown(after(3))).toBe(true);
    expect(isKnown(unknown(3))).toBe(false);
  });

  test("should reject coordinates below 1 or fractional", () => {
    expect(() => exact(0)).toThrow(InvalidLocationError);
    expect(() => before(1.5)).toThrow("Position coordinate must be an integer >= 1, got 1.5");
    expect(() => unknown(-2)).toThrow(InvalidLocationError);
  });
});

describe("builders", () => {
  test("should take numbers as exact positions", () => {
    expect(single(3)).toEqual({ kind: "single", position: exact(3) });
    expect(range(1, 4)).toEqual({ kind: "range", start: exact(1), end: exact(4) });
  });

  test("should reject reversed exact ranges", () => {
    expect(() => range(5, 3)).toThrow("Range start 5 is after end 3");
  });

  test("should allow reversed fuzzy ranges", () => {
    expect(formatLocation(range(before(5), 3))).toBe("<5..3");
  });

  test("should require adjacent or wrapping site bases", () => {
    expect(between(4, 5)).toEqual({ kind: "between", left: 4, right: 5 });
    expect(between(100, 1)).toEqual({ kind: "between", left: 100, right: 1 });
    expect(() => between(4, 6)).toThrow(InvalidLocationError);
    expect(() => between(1, 1)).toThrow(InvalidLocationError);
  });

  test("should reject empty joins and orders", () => {
    expect(() => join([])).toThrow("join requires at least one part");
    expect(() => order([])).toThrow("order requires at least one part");
  });

  test("should flatten only same-kind nesting", () => {
    const nested = join([join([range(1, 2), range(3, 4)]), order([range(5, 6)])]);
    expect(formatLocation(nested)).toBe("join(1..2,3..4,order(5..6))");
  });

  test("should build complements and remote parts", () => {
    expect(formatLocation(complement(remote("AB000001.2", range(10, 20))))).toBe(
      "complement(AB000001.2:10..20)"
    );
    expect(() => remote(" ", single(1))).toThrow(InvalidLocationError);
  });
});
