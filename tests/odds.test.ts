import { describe, test, expect } from "vitest";
import {
  americanToDecimal,
  americanToImplied,
  decimalToImplied,
  devigProportional,
  impliedToAmerican,
  isValidAmericanOdds,
} from "../src/fees/odds";

describe("odds", () => {
  describe("americanToImplied", () => {
    test("converts favourites and underdogs", () => {
      expect(americanToImplied(-150)).toBeCloseTo(0.6, 10);
      expect(americanToImplied(150)).toBeCloseTo(0.4, 10);
    });

    test("treats +100 and -100 as even money", () => {
      expect(americanToImplied(100)).toBe(0.5);
      expect(americanToImplied(-100)).toBe(0.5);
    });

    test("rejects odds between -100 and +100", () => {
      expect(() => americanToImplied(50)).toThrow(RangeError);
      expect(() => americanToImplied(-99)).toThrow(RangeError);
      expect(() => americanToImplied(Number.NaN)).toThrow(RangeError);
    });
  });

  describe("impliedToAmerican", () => {
    test("returns integer odds", () => {
      expect(impliedToAmerican(0.6)).toBe(-150);
      expect(impliedToAmerican(0.4)).toBe(150);
      expect(impliedToAmerican(0.5)).toBe(-100);
    });

    test("rejects probabilities outside (0, 1)", () => {
      expect(() => impliedToAmerican(0)).toThrow(RangeError);
      expect(() => impliedToAmerican(1)).toThrow(RangeError);
      expect(() => impliedToAmerican(1.2)).toThrow(RangeError);
    });

    test("round-trips valid American odds", () => {
      for (const odds of [-500, -150, -110, 110, 150, 300, 1000]) {
        expect(impliedToAmerican(americanToImplied(odds))).toBe(odds);
      }
    });

    test("round-trips probabilities within rounding tolerance", () => {
      for (const p of [0.2, 0.37, 0.4, 0.6, 0.75, 0.9]) {
        expect(americanToImplied(impliedToAmerican(p))).toBeCloseTo(p, 2);
      }
    });
  });

  test("isValidAmericanOdds", () => {
    expect(isValidAmericanOdds(-110)).toBe(true);
    expect(isValidAmericanOdds(100)).toBe(true);
    expect(isValidAmericanOdds(99)).toBe(false);
    expect(isValidAmericanOdds(Number.POSITIVE_INFINITY)).toBe(false);
  });

  test("decimal odds", () => {
    expect(americanToDecimal(150)).toBe(2.5);
    expect(americanToDecimal(-200)).toBe(1.5);
    expect(decimalToImplied(2.5)).toBe(0.4);
    expect(() => decimalToImplied(1)).toThrow(RangeError);
  });

  describe("devigProportional", () => {
    test("normalizes a two-way market to sum to one", () => {
      const result = devigProportional(0.6, 0.5);
      expect(result.fairA).toBeCloseTo(0.6 / 1.1, 10);
      expect(result.fairB).toBeCloseTo(0.5 / 1.1, 10);
      expect(result.fairA + result.fairB).toBeCloseTo(1, 10);
      expect(result.overround).toBeCloseTo(0.1, 10);
    });

    test("leaves a fair market unchanged", () => {
      const result = devigProportional(0.6, 0.4);
      expect(result.fairA).toBeCloseTo(0.6, 10);
      expect(result.fairB).toBeCloseTo(0.4, 10);
      expect(result.overround).toBeCloseTo(0, 10);
    });

    test("rejects non-positive inputs", () => {
      expect(() => devigProportional(0, 0.5)).toThrow(RangeError);
    });
  });
});
