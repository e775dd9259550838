/**
 * Window Aggregator
 *
 * Buckets (timestamp, value) samples into fixed-width windows:
 *   binStart = floor(timestamp / width) * width
 *
 * One row per bin that has samples, in binStart order. Empty bins are never
 * materialized. Quantiles use linear interpolation between order statistics.
 */

import { serviceLoggers } from "../utils/logger";
import { EmptyInputError, InvalidParameterError, assertPositive } from "./errors";
import { fractionAtLeast, mean, quantileKey, quantileSorted, sortAscending } from "./statistics";
import type { Session, SessionWindow, TimedValue, Window } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for window aggregation
 */
export interface WindowAggregationOptions {
  /** Bin width in seconds (default: 3600) */
  binWidthSec?: number;

  /** Quantiles in [0, 1] reported per window (default: [0.9, 0.95]) */
  quantiles?: readonly number[];
}

/**
 * Options for session windows
 */
export interface SessionWindowOptions extends WindowAggregationOptions {
  /** k values for the per-window multi-turn fractions (default: [2, 3]) */
  turnCountThresholds?: readonly number[];
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_BIN_WIDTH_SEC = 3600;

export const DEFAULT_WINDOW_QUANTILES: readonly number[] = [0.9, 0.95];

const DEFAULT_TURN_COUNT_THRESHOLDS: readonly number[] = [2, 3];

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Start of the bin containing a timestamp
 */
export function binStartOf(timestamp: number, binWidthSec: number): number {
  return Math.floor(timestamp / binWidthSec) * binWidthSec;
}

function validateQuantiles(quantiles: readonly number[]): void {
  for (const q of quantiles) {
    if (!(q >= 0 && q <= 1)) {
      throw new InvalidParameterError("quantiles", quantiles, "every entry must be in [0, 1]");
    }
  }
}

/**
 * Group values by bin start, returning bins in ascending order
 */
function groupByBin<T>(
  items: readonly T[],
  timestampOf: (item: T) => number,
  binWidthSec: number
): Array<[number, T[]]> {
  const bins = new Map<number, T[]>();
  for (const item of items) {
    const binStart = binStartOf(timestampOf(item), binWidthSec);
    const bucket = bins.get(binStart);
    if (bucket) {
      bucket.push(item);
    } else {
      bins.set(binStart, [item]);
    }
  }
  return [...bins.entries()].sort(([a], [b]) => a - b);
}

function buildWindow(
  binStart: number,
  binWidthSec: number,
  values: readonly number[],
  quantiles: readonly number[]
): Window {
  const sorted = sortAscending(values);
  const quantileValues: Record<string, number> = {};
  for (const q of quantiles) {
    quantileValues[quantileKey(q)] = quantileSorted(sorted, q);
  }

  return {
    binStart,
    binEnd: binStart + binWidthSec,
    count: values.length,
    mean: mean(values),
    quantiles: Object.freeze(quantileValues),
  };
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Aggregate samples into fixed-width windows
 */
export function aggregateWindows(
  samples: readonly TimedValue[],
  options: WindowAggregationOptions = {}
): readonly Window[] {
  const binWidthSec = options.binWidthSec ?? DEFAULT_BIN_WIDTH_SEC;
  const quantiles = options.quantiles ?? DEFAULT_WINDOW_QUANTILES;

  assertPositive("binWidthSec", binWidthSec);
  validateQuantiles(quantiles);
  if (samples.length === 0) {
    throw new EmptyInputError("Cannot aggregate an empty sample table into windows");
  }

  const windows = groupByBin(samples, (sample) => sample.timestamp, binWidthSec).map(
    ([binStart, bucket]) =>
      Object.freeze(
        buildWindow(
          binStart,
          binWidthSec,
          bucket.map((sample) => sample.value),
          quantiles
        )
      )
  );

  serviceLoggers.windows.debug("Aggregated windows", {
    sampleCount: samples.length,
    windowCount: windows.length,
    binWidthSec,
  });

  return Object.freeze(windows);
}

/**
 * Aggregate sessions into windows by start time, with value = turn count
 */
export function aggregateSessionWindows(
  sessions: readonly Session[],
  options: SessionWindowOptions = {}
): readonly SessionWindow[] {
  const binWidthSec = options.binWidthSec ?? DEFAULT_BIN_WIDTH_SEC;
  const quantiles = options.quantiles ?? DEFAULT_WINDOW_QUANTILES;
  const thresholds = options.turnCountThresholds ?? DEFAULT_TURN_COUNT_THRESHOLDS;

  assertPositive("binWidthSec", binWidthSec);
  validateQuantiles(quantiles);
  if (sessions.length === 0) {
    throw new EmptyInputError("Cannot aggregate an empty session table into windows");
  }

  const windows = groupByBin(sessions, (session) => session.startTime, binWidthSec).map(
    ([binStart, bucket]) => {
      const turns = bucket.map((session) => session.turnCount);
      const fractions: Record<number, number> = {};
      for (const k of thresholds) {
        fractions[k] = fractionAtLeast(turns, k);
      }
      return Object.freeze({
        ...buildWindow(binStart, binWidthSec, turns, quantiles),
        fractionAtLeast: Object.freeze(fractions),
      });
    }
  );

  serviceLoggers.windows.debug("Aggregated session windows", {
    sessionCount: sessions.length,
    windowCount: windows.length,
    binWidthSec,
  });

  return Object.freeze(windows);
}

/**
 * Session table projected to (startTime, turnCount) samples
 */
export function sessionTurnSamples(sessions: readonly Session[]): readonly TimedValue[] {
  return sessions.map((session) => ({ timestamp: session.startTime, value: session.turnCount }));
}

/**
 * Sessions that carry a context length, projected to (startTime, contextLength) samples
 */
export function sessionContextSamples(sessions: readonly Session[]): readonly TimedValue[] {
  const samples: TimedValue[] = [];
  for (const session of sessions) {
    if (session.contextLength !== undefined) {
      samples.push({ timestamp: session.startTime, value: session.contextLength });
    }
  }
  return samples;
}
