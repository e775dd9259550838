/**
 * Variance Decomposer
 *
 * Splits the variability of a window metric into three coefficient-of-variation
 * views (CV = sample std / mean):
 *
 * - global:    across every window row
 * - intra-day: within each UTC day that has enough hours, then mean/std across days
 * - inter-day: within each hour of day across days, then mean across hours
 *
 * The intra- and inter-day levels work on (day, hour-of-day) cells, each the
 * mean metric of the windows starting in that hour, so sub-hour bin widths
 * collapse into one value per hour before any CV is taken.
 *
 * A level whose guard is never met is reported as null, never as 0 or NaN.
 */

import { serviceLoggers } from "../utils/logger";
import { EmptyInputError, InsufficientDataError, InvalidParameterError } from "./errors";
import { buildDailyCurves } from "./daily-curves";
import { windowMean, type WindowMetric } from "./hour-of-day-aggregator";
import { coefficientOfVariation, mean, sampleStd } from "./statistics";
import { HOURS_PER_DAY, type Window } from "./types";

// ============================================================================
// Types
// ============================================================================

export interface GlobalCv {
  cv: number;
  mean: number;
  std: number;
  windowCount: number;
}

export interface DayCv {
  date: string;
  dayIndex: number;
  cv: number;
  /** Distinct hours of the day that have windows */
  hourCount: number;
}

export interface IntraDayCv {
  meanCv: number;
  /** Sample std across qualifying days; null with a single day */
  stdCv: number | null;
  dayCount: number;
  days: readonly DayCv[];
  /** Days dropped by the distinct-hour or positive-mean guard */
  excludedDayCount: number;
}

export interface HourCv {
  hour: number;
  cv: number;
  /** Distinct days that have windows in this hour */
  dayCount: number;
}

export interface InterDayCv {
  meanCv: number;
  hourCount: number;
  hours: readonly HourCv[];
}

export interface VarianceDecomposition {
  global: GlobalCv | null;
  intraDay: IntraDayCv | null;
  interDay: InterDayCv | null;
}

export interface VarianceDecompositionOptions {
  /** Metric taken from each window (default: window mean) */
  metric?: WindowMetric;

  /** Distinct hours a day needs for an intra-day CV (default: 6) */
  minWindowsPerDay?: number;

  /** Throw InsufficientDataError instead of returning a null level (default: false) */
  strict?: boolean;
}

export const DEFAULT_MIN_WINDOWS_PER_DAY = 6;

// ============================================================================
// Levels
// ============================================================================

function presentValues(values: ReadonlyArray<number | null>): number[] {
  return values.filter((value): value is number => value !== null);
}

/**
 * CV across all windows
 */
export function computeGlobalCv(
  windows: readonly Window[],
  metric: WindowMetric = windowMean
): GlobalCv | null {
  const values = windows.map(metric);
  const cv = coefficientOfVariation(values);
  const std = sampleStd(values);
  if (cv === null || std === null) return null;
  return Object.freeze({ cv, mean: mean(values), std, windowCount: values.length });
}

/**
 * CV within each qualifying day, summarized across days
 */
export function computeIntraDayCv(
  windows: readonly Window[],
  metric: WindowMetric = windowMean,
  minWindowsPerDay: number = DEFAULT_MIN_WINDOWS_PER_DAY
): IntraDayCv | null {
  if (!Number.isInteger(minWindowsPerDay) || minWindowsPerDay < 2) {
    throw new InvalidParameterError("minWindowsPerDay", minWindowsPerDay, "must be an integer >= 2");
  }

  if (windows.length === 0) return null;

  const days: DayCv[] = [];
  let excludedDayCount = 0;

  for (const curve of buildDailyCurves(windows, metric)) {
    const values = presentValues(curve.values);
    const cv = values.length >= minWindowsPerDay ? coefficientOfVariation(values) : null;
    if (cv === null) {
      excludedDayCount++;
      continue;
    }
    days.push(
      Object.freeze({ date: curve.date, dayIndex: curve.dayIndex, cv, hourCount: values.length })
    );
  }

  if (days.length === 0) return null;

  const cvs = days.map((day) => day.cv);
  return Object.freeze({
    meanCv: mean(cvs),
    stdCv: sampleStd(cvs),
    dayCount: days.length,
    days: Object.freeze(days),
    excludedDayCount,
  });
}

/**
 * CV across days for each hour of day, averaged over hours
 */
export function computeInterDayCv(
  windows: readonly Window[],
  metric: WindowMetric = windowMean
): InterDayCv | null {
  if (windows.length === 0) return null;

  const curves = buildDailyCurves(windows, metric);
  const hours: HourCv[] = [];
  for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
    const values = presentValues(curves.map((curve) => curve.values[hour] ?? null));
    const cv = coefficientOfVariation(values);
    if (cv !== null) {
      hours.push(Object.freeze({ hour, cv, dayCount: values.length }));
    }
  }

  if (hours.length === 0) return null;

  return Object.freeze({
    meanCv: mean(hours.map((entry) => entry.cv)),
    hourCount: hours.length,
    hours: Object.freeze(hours),
  });
}

// ============================================================================
// Decomposition
// ============================================================================

/**
 * Compute all three levels for a window table
 */
export function decomposeVariance(
  windows: readonly Window[],
  options: VarianceDecompositionOptions = {}
): VarianceDecomposition {
  if (windows.length === 0) {
    throw new EmptyInputError("Cannot decompose variance of an empty window table");
  }

  const metric = options.metric ?? windowMean;
  const result: VarianceDecomposition = Object.freeze({
    global: computeGlobalCv(windows, metric),
    intraDay: computeIntraDayCv(
      windows,
      metric,
      options.minWindowsPerDay ?? DEFAULT_MIN_WINDOWS_PER_DAY
    ),
    interDay: computeInterDayCv(windows, metric),
  });

  const absent = (["global", "intraDay", "interDay"] as const).filter(
    (level) => result[level] === null
  );

  if (absent.length > 0) {
    serviceLoggers.variance.warn("Variance decomposition levels without data", {
      levels: absent,
      windowCount: windows.length,
    });
    const first = absent[0];
    if (options.strict && first !== undefined) {
      throw new InsufficientDataError(
        first,
        `No ${first} coefficient of variation: guard condition never met across ${windows.length} windows`
      );
    }
  }

  return result;
}
