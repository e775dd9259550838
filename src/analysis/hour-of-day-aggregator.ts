/**
 * Hour-of-Day Aggregator
 *
 * Re-groups windows (or sessions) by hour of day, ignoring the calendar date:
 *   hourOfDay = floor((t mod 86400) / 3600)
 *
 * Reports mean, sample std (ddof = 1), p10, p90 and sample count for each
 * hour that has data, ordered 0 -> 23. Hours are UTC.
 */

import { EmptyInputError } from "./errors";
import { mean, positiveModulo, quantileSorted, sampleStd, sortAscending } from "./statistics";
import {
  SECONDS_PER_DAY,
  SECONDS_PER_HOUR,
  type HourOfDayRecord,
  type Session,
  type TimedValue,
  type Window,
} from "./types";

/**
 * Picks the metric a window contributes
 */
export type WindowMetric = (window: Window) => number;

/** Window mean (the default metric) */
export const windowMean: WindowMetric = (window) => window.mean;

/** Window sample count, i.e. load per window */
export const windowCount: WindowMetric = (window) => window.count;

/**
 * Hour of day (0-23, UTC) of an epoch-seconds timestamp
 */
export function hourOfDay(timestamp: number): number {
  return Math.floor(positiveModulo(timestamp, SECONDS_PER_DAY) / SECONDS_PER_HOUR);
}

/**
 * Aggregate samples by hour of day
 */
export function aggregateByHourOfDay(samples: readonly TimedValue[]): readonly HourOfDayRecord[] {
  if (samples.length === 0) {
    throw new EmptyInputError("Cannot aggregate an empty sample table by hour of day");
  }

  const byHour = new Map<number, number[]>();
  for (const sample of samples) {
    const hour = hourOfDay(sample.timestamp);
    const bucket = byHour.get(hour);
    if (bucket) {
      bucket.push(sample.value);
    } else {
      byHour.set(hour, [sample.value]);
    }
  }

  const records = [...byHour.entries()]
    .sort(([a], [b]) => a - b)
    .map(([hour, values]) => {
      const sorted = sortAscending(values);
      return Object.freeze({
        hour,
        mean: mean(values),
        std: sampleStd(values),
        p10: quantileSorted(sorted, 0.1),
        p90: quantileSorted(sorted, 0.9),
        sampleCount: values.length,
      });
    });

  return Object.freeze(records);
}

/**
 * Aggregate windows by the hour of their bin start
 */
export function aggregateWindowsByHourOfDay(
  windows: readonly Window[],
  metric: WindowMetric = windowMean
): readonly HourOfDayRecord[] {
  return aggregateByHourOfDay(
    windows.map((window) => ({ timestamp: window.binStart, value: metric(window) }))
  );
}

/**
 * Aggregate session turn counts by the hour of each session's start
 */
export function aggregateSessionsByHourOfDay(
  sessions: readonly Session[]
): readonly HourOfDayRecord[] {
  return aggregateByHourOfDay(
    sessions.map((session) => ({ timestamp: session.startTime, value: session.turnCount }))
  );
}
