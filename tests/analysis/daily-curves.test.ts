import { describe, it, expect } from "vitest";
import {
  buildDailyCurves,
  correlateDailyCurves,
  dateOfDayIndex,
  dayIndexOf,
} from "../../src/analysis/daily-curves";
import { EmptyInputError, InvalidParameterError } from "../../src/analysis/errors";
import type { Window } from "../../src/analysis/types";

const HOUR = 3600;
const DAY = 86400;

function window(binStart: number, mean: number): Window {
  return { binStart, binEnd: binStart + HOUR, count: 1, mean, quantiles: {} };
}

function day(dayIndex: number, means: number[]): Window[] {
  return means.map((mean, hour) => window(dayIndex * DAY + hour * HOUR, mean));
}

describe("Daily curves", () => {
  describe("day indexing", () => {
    it("should split days at UTC midnight", () => {
      expect(dayIndexOf(DAY - 1)).toBe(0);
      expect(dayIndexOf(DAY)).toBe(1);
    });

    it("should format UTC dates", () => {
      expect(dateOfDayIndex(0)).toBe("1970-01-01");
      expect(dateOfDayIndex(19723)).toBe("2024-01-01");
    });
  });

  describe("buildDailyCurves", () => {
    it("should build one 24-hour curve per day with gaps as null", () => {
      const curves = buildDailyCurves([window(0, 1), window(2 * HOUR, 3), window(DAY, 5)]);

      expect(curves.map((curve) => curve.date)).toEqual(["1970-01-01", "1970-01-02"]);
      expect(curves[0]?.values).toHaveLength(24);
      expect(curves[0]?.values.slice(0, 3)).toEqual([1, null, 3]);
      expect(curves[1]?.values[0]).toBe(5);
      expect(curves[1]?.values[1]).toBeNull();
    });

    it("should average windows sharing a day and hour", () => {
      const curves = buildDailyCurves([window(0, 2), window(1800, 4)]);
      expect(curves[0]?.values[0]).toBe(3);
    });

    it("should reject an empty window table", () => {
      expect(() => buildDailyCurves([])).toThrow(EmptyInputError);
    });
  });

  describe("correlateDailyCurves", () => {
    it("should find perfectly repeating shapes", () => {
      const curves = buildDailyCurves([
        ...day(0, [1, 2, 3, 4, 5, 6]),
        ...day(1, [2, 4, 6, 8, 10, 12]),
      ]);
      const result = correlateDailyCurves(curves);

      expect(result.dayCount).toBe(2);
      expect(result.pairCount).toBe(1);
      expect(result.meanCorrelation).toBeCloseTo(1, 10);
      expect(result.stdCorrelation).toBe(0);
    });

    it("should skip pairs with too few shared hours", () => {
      const curves = buildDailyCurves([...day(0, [1, 2, 3, 4, 5]), ...day(1, [5, 4, 3, 2, 1])]);
      const result = correlateDailyCurves(curves);

      expect(result.pairCount).toBe(0);
      expect(result.meanCorrelation).toBeNull();
      expect(result.stdCorrelation).toBeNull();
    });

    it("should honor a lower shared-hour minimum", () => {
      const curves = buildDailyCurves([...day(0, [1, 2, 3]), ...day(1, [3, 2, 1])]);
      expect(correlateDailyCurves(curves, 3).meanCorrelation).toBeCloseTo(-1, 10);
    });

    it("should reject a shared-hour minimum below 2", () => {
      expect(() => correlateDailyCurves([], 1)).toThrow(InvalidParameterError);
    });
  });
});
