/**
 * Tests for WindowAggregator
 */

import { describe, it, expect } from "vitest";
import {
  aggregateSessionWindows,
  aggregateWindows,
  binStartOf,
  sessionContextSamples,
  sessionTurnSamples,
} from "../../src/analysis/window-aggregator";
import { EmptyInputError, InvalidParameterError } from "../../src/analysis/errors";
import type { Session, TimedValue } from "../../src/analysis/types";

// ============================================================================
// Test Data Helpers
// ============================================================================

const samples: TimedValue[] = [
  { timestamp: 0, value: 1 },
  { timestamp: 10, value: 3 },
  { timestamp: 3600, value: 5 },
  { timestamp: 7300, value: 2 },
  { timestamp: 7300, value: 4 },
];

function session(id: number, startTime: number, turnCount: number): Session {
  return { id, startTime, endTime: startTime + 60, turnCount, durationSec: 60 };
}

// ============================================================================
// Tests
// ============================================================================

describe("WindowAggregator", () => {
  describe("binStartOf", () => {
    it("should floor timestamps to the bin width", () => {
      expect(binStartOf(3599, 3600)).toBe(0);
      expect(binStartOf(3600, 3600)).toBe(3600);
      expect(binStartOf(5000, 900)).toBe(4500);
    });

    it("should floor negative timestamps downwards", () => {
      expect(binStartOf(-1, 3600)).toBe(-3600);
    });
  });

  describe("aggregateWindows", () => {
    it("should emit one row per non-empty bin in order", () => {
      const windows = aggregateWindows(samples);

      expect(windows.map((window) => window.binStart)).toEqual([0, 3600, 7200]);
      expect(windows.map((window) => window.binEnd)).toEqual([3600, 7200, 10800]);
      expect(windows.map((window) => window.count)).toEqual([2, 1, 2]);
      expect(windows.map((window) => window.mean)).toEqual([2, 5, 3]);
    });

    it("should report interpolated quantiles per window", () => {
      const [first, second] = aggregateWindows(samples);

      expect(first?.quantiles.p90).toBeCloseTo(2.8, 10);
      expect(first?.quantiles.p95).toBeCloseTo(2.9, 10);
      expect(second?.quantiles).toEqual({ p90: 5, p95: 5 });
    });

    it("should use the requested quantiles", () => {
      const [first] = aggregateWindows(samples, { quantiles: [0.5] });
      expect(first?.quantiles).toEqual({ p50: 2 });
    });

    it("should never materialize empty bins", () => {
      const windows = aggregateWindows(
        [
          { timestamp: 0, value: 1 },
          { timestamp: 86400, value: 1 },
        ],
        { binWidthSec: 3600 }
      );
      expect(windows.map((window) => window.binStart)).toEqual([0, 86400]);
    });

    it("should not depend on input order", () => {
      expect(aggregateWindows([...samples].reverse())).toEqual(aggregateWindows(samples));
    });

    it("should return equal tables for repeated runs over the same input", () => {
      const first = aggregateWindows(samples, { binWidthSec: 1800, quantiles: [0.5, 0.9] });
      const second = aggregateWindows(samples, { binWidthSec: 1800, quantiles: [0.5, 0.9] });
      expect(second).toEqual(first);
    });

    it("should keep the total count equal to the number of samples", () => {
      const total = aggregateWindows(samples, { binWidthSec: 60 }).reduce(
        (sum, window) => sum + window.count,
        0
      );
      expect(total).toBe(samples.length);
    });

    it("should reject invalid parameters", () => {
      expect(() => aggregateWindows(samples, { binWidthSec: 0 })).toThrow(InvalidParameterError);
      expect(() => aggregateWindows(samples, { quantiles: [1.5] })).toThrow(InvalidParameterError);
    });

    it("should reject an empty sample table", () => {
      expect(() => aggregateWindows([])).toThrow(EmptyInputError);
    });
  });

  describe("aggregateSessionWindows", () => {
    const sessions = [session(0, 0, 1), session(1, 100, 3), session(2, 4000, 2)];

    it("should bin sessions by start time on turn count", () => {
      const windows = aggregateSessionWindows(sessions);

      expect(windows.map((window) => window.binStart)).toEqual([0, 3600]);
      expect(windows.map((window) => window.mean)).toEqual([2, 2]);
      expect(windows.map((window) => window.count)).toEqual([2, 1]);
    });

    it("should return equal tables for repeated runs", () => {
      expect(aggregateSessionWindows(sessions)).toEqual(aggregateSessionWindows(sessions));
    });

    it("should report multi-turn fractions per window", () => {
      const windows = aggregateSessionWindows(sessions, { turnCountThresholds: [2, 3] });

      expect(windows.map((window) => window.fractionAtLeast)).toEqual([
        { 2: 0.5, 3: 0.5 },
        { 2: 1, 3: 0 },
      ]);
    });

    it("should reject an empty session table", () => {
      expect(() => aggregateSessionWindows([])).toThrow(EmptyInputError);
    });
  });

  describe("sessionContextSamples", () => {
    it("should project only sessions that carry a context length", () => {
      const sessions: Session[] = [
        { ...session(0, 100, 2), contextLength: 80 },
        session(1, 200, 1),
        { ...session(2, 300, 4), contextLength: 0 },
      ];
      expect(sessionContextSamples(sessions)).toEqual([
        { timestamp: 100, value: 80 },
        { timestamp: 300, value: 0 },
      ]);
    });
  });

  describe("sessionTurnSamples", () => {
    it("should project sessions onto start time and turn count", () => {
      expect(sessionTurnSamples([session(0, 50, 4)])).toEqual([{ timestamp: 50, value: 4 }]);
    });
  });
});
