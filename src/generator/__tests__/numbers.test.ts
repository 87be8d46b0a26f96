/**
 * Tests for numbers that keep their written form.
 */

import { describe, it, expect } from "@jest/globals";
import { ExactNumber, integerFromText, numberFromText, numbersEqual, parseJsonExact } from "../numbers";

describe("numbers", () => {
  it("keeps a plain number when String() reproduces the text", () => {
    expect(numberFromText("5432")).toBe(5432);
    expect(numberFromText("0.25")).toBe(0.25);
    expect(numberFromText("1.0")).toEqual(new ExactNumber("1.0"));
  });

  it("normalises unsafe integers to decimal digits", () => {
    expect(integerFromText("42", 42)).toBe(42);
    expect(integerFromText("-0x20000000000001", -9007199254740992)).toEqual(
      new ExactNumber("-9007199254740993")
    );
  });

  it("compares integers exactly and everything else as doubles", () => {
    expect(numbersEqual(new ExactNumber("9007199254740993"), new ExactNumber("9007199254740993"))).toBe(true);
    expect(numbersEqual(new ExactNumber("9007199254740993"), 9007199254740992)).toBe(false);
    expect(numbersEqual(new ExactNumber("1.50"), 1.5)).toBe(true);
  });

  it("stringifies as its text and serialises as a number", () => {
    const value = new ExactNumber("1.0");

    expect(String(value)).toBe("1.0");
    expect(JSON.stringify({ value })).toBe('{"value":1}');
  });

  describe("parseJsonExact", () => {
    it("returns JSON.parse's result when every number is exact", () => {
      expect(parseJsonExact('{"a": [1, 2.5], "b": "1.0"}')).toEqual({ a: [1, 2.5], b: "1.0" });
    });

    it("does not confuse real strings with its placeholders", () => {
      expect(parseJsonExact('{"s": "\\u0000x", "n": 1.0}')).toEqual({
        s: "\u0000x",
        n: new ExactNumber("1.0"),
      });
    });

    it("throws JSON.parse's SyntaxError on invalid input", () => {
      expect(() => parseJsonExact("{ nope")).toThrow(SyntaxError);
    });
  });
});
