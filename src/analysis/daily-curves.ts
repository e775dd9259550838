/**
 * Daily Curves
 *
 * Builds one 24-hour curve per UTC calendar day from the window table and
 * measures how consistently the diurnal shape repeats: the Pearson
 * correlation between every pair of days, over the hours both days have.
 */

import { EmptyInputError, InvalidParameterError } from "./errors";
import { windowMean, hourOfDay, type WindowMetric } from "./hour-of-day-aggregator";
import { mean, pearsonCorrelation, populationStd } from "./statistics";
import { HOURS_PER_DAY, SECONDS_PER_DAY, type DailyCurve, type Window } from "./types";

/**
 * Cross-day consistency of the diurnal curve
 */
export interface DailyCurveCorrelation {
  dayCount: number;
  /** Day pairs that shared enough hours and had a defined correlation */
  pairCount: number;
  /** Null when no pair qualifies */
  meanCorrelation: number | null;
  /** Population std over pairs; null when no pair qualifies */
  stdCorrelation: number | null;
}

/** Hours two days must share before their curves are compared */
export const DEFAULT_MIN_SHARED_HOURS = 6;

/**
 * Index of the UTC day containing a timestamp
 */
export function dayIndexOf(timestamp: number): number {
  return Math.floor(timestamp / SECONDS_PER_DAY);
}

/**
 * UTC date string (YYYY-MM-DD) for a day index
 */
export function dateOfDayIndex(dayIndex: number): string {
  return new Date(dayIndex * SECONDS_PER_DAY * 1000).toISOString().slice(0, 10);
}

/**
 * Build one curve per day that has windows, ordered by date
 */
export function buildDailyCurves(
  windows: readonly Window[],
  metric: WindowMetric = windowMean
): readonly DailyCurve[] {
  if (windows.length === 0) {
    throw new EmptyInputError("Cannot build daily curves from an empty window table");
  }

  const cells = new Map<number, number[][]>();
  for (const window of windows) {
    const day = dayIndexOf(window.binStart);
    let hours = cells.get(day);
    if (!hours) {
      hours = Array.from({ length: HOURS_PER_DAY }, () => []);
      cells.set(day, hours);
    }
    hours[hourOfDay(window.binStart)]?.push(metric(window));
  }

  const curves = [...cells.entries()]
    .sort(([a], [b]) => a - b)
    .map(([dayIndex, hours]) =>
      Object.freeze({
        date: dateOfDayIndex(dayIndex),
        dayIndex,
        values: Object.freeze(hours.map((values) => (values.length > 0 ? mean(values) : null))),
      })
    );

  return Object.freeze(curves);
}

/**
 * Pairwise correlation between daily curves
 */
export function correlateDailyCurves(
  curves: readonly DailyCurve[],
  minSharedHours: number = DEFAULT_MIN_SHARED_HOURS
): DailyCurveCorrelation {
  if (!Number.isInteger(minSharedHours) || minSharedHours < 2) {
    throw new InvalidParameterError("minSharedHours", minSharedHours, "must be an integer >= 2");
  }

  const correlations: number[] = [];
  for (let i = 0; i < curves.length; i++) {
    for (let j = i + 1; j < curves.length; j++) {
      const a = curves[i]?.values ?? [];
      const b = curves[j]?.values ?? [];
      const xs: number[] = [];
      const ys: number[] = [];
      for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
        const x = a[hour];
        const y = b[hour];
        if (typeof x === "number" && typeof y === "number") {
          xs.push(x);
          ys.push(y);
        }
      }
      if (xs.length < minSharedHours) continue;
      const r = pearsonCorrelation(xs, ys);
      if (r !== null) correlations.push(r);
    }
  }

  return Object.freeze({
    dayCount: curves.length,
    pairCount: correlations.length,
    meanCorrelation: correlations.length > 0 ? mean(correlations) : null,
    stdCorrelation: populationStd(correlations),
  });
}
