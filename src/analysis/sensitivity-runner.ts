/**
 * Sensitivity Runner
 *
 * Re-runs Segmenter -> WindowAggregator -> HourOfDayAggregator for each
 * session-gap threshold and tabulates how much the conclusions move.
 *
 * Features:
 * - One comparison row per gap threshold
 * - Per-setting failure isolation: a bad setting is reported, siblings still run
 * - Sparse-bin filtering before trend statistics
 * - Event emission per completed / failed setting
 */

import { EventEmitter } from "events";
import { serviceLoggers } from "../utils/logger";
import { aggregateSessionsByHourOfDay, windowMean, type WindowMetric } from "./hour-of-day-aggregator";
import { InvalidParameterError, TraceAnalysisError, assertPositiveList } from "./errors";
import { buildSessions } from "./session-segmenter";
import { coefficientOfVariation, fractionAtLeast, linearSlope, mean, sampleStd } from "./statistics";
import {
  SECONDS_PER_DAY,
  SECONDS_PER_MINUTE,
  type HourOfDayRecord,
  type SessionWindow,
  type TraceEvent,
  type Window,
} from "./types";
import { DEFAULT_BIN_WIDTH_SEC, DEFAULT_WINDOW_QUANTILES, aggregateSessionWindows } from "./window-aggregator";

// ============================================================================
// Types
// ============================================================================

/**
 * Comparison row for one gap threshold
 */
export interface SensitivityRow {
  /** "15m" for 900 s; "<n>s" when not a whole number of minutes */
  label: string;
  gapThresholdSec: number;
  sessionCount: number;
  /** Fraction of sessions with turnCount >= k, keyed by k */
  fractionAtLeast: Readonly<Record<number, number>>;
  meanTurnCount: number;
  /** Sample std of the by-hour mean turn count; null with fewer than two hours */
  meanTurnCountStdOverHours: number | null;
}

/**
 * Trend statistics over a (filtered) window table
 */
export interface TrendSummary {
  windowCount: number;
  mean: number | null;
  std: number | null;
  cv: number | null;
  /** Least-squares slope of the metric per day */
  slopePerDay: number | null;
}

export interface SensitivitySuccess {
  status: "ok";
  label: string;
  gapThresholdSec: number;
  row: SensitivityRow;
  windows: readonly SessionWindow[];
  /** Windows left after sparse-bin filtering */
  filteredWindows: readonly SessionWindow[];
  hourOfDay: readonly HourOfDayRecord[];
  trend: TrendSummary;
}

export interface SensitivityFailure {
  status: "failed";
  label: string;
  gapThresholdSec: number;
  errorName: string;
  errorMessage: string;
}

export type SensitivityOutcome = SensitivitySuccess | SensitivityFailure;

export interface SensitivityReport {
  /** Rows of successful settings, in input order */
  rows: readonly SensitivityRow[];
  /** Every setting in input order */
  outcomes: readonly SensitivityOutcome[];
  failureCount: number;
}

/**
 * Configuration for SensitivityRunner
 */
export interface SensitivityRunnerConfig {
  /** Gap thresholds to compare (default: [900, 1800, 3600]) */
  gapThresholdsSec?: readonly number[];

  /** Window width in seconds (default: 3600) */
  binWidthSec?: number;

  /** k values for multi-turn fractions (default: [2, 3]) */
  turnCountThresholds?: readonly number[];

  /** Minimum sessions per window kept for trend statistics (default: 100) */
  minSessionCountPerBin?: number;

  /** Window quantiles (default: [0.9, 0.95]) */
  quantiles?: readonly number[];
}

/**
 * Event types emitted by SensitivityRunner
 */
export interface SensitivityRunnerEvents {
  "setting-completed": (outcome: SensitivitySuccess) => void;
  "setting-failed": (outcome: SensitivityFailure) => void;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SENSITIVITY_GAPS_SEC: readonly number[] = [900, 1800, 3600];

const DEFAULT_TURN_COUNT_THRESHOLDS: readonly number[] = [2, 3];

const DEFAULT_MIN_SESSION_COUNT_PER_BIN = 100;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Label for a gap threshold
 */
export function gapLabel(gapThresholdSec: number): string {
  if (gapThresholdSec > 0 && gapThresholdSec % SECONDS_PER_MINUTE === 0) {
    return `${gapThresholdSec / SECONDS_PER_MINUTE}m`;
  }
  return `${gapThresholdSec}s`;
}

function validateMinCount(minCount: number): void {
  if (!Number.isFinite(minCount) || minCount < 0) {
    throw new InvalidParameterError("minSessionCountPerBin", minCount, "must be a finite number >= 0");
  }
}

/**
 * Drop windows with fewer than `minCount` samples
 */
export function filterSparseWindows<T extends Window>(
  windows: readonly T[],
  minCount: number
): readonly T[] {
  validateMinCount(minCount);
  return Object.freeze(windows.filter((window) => window.count >= minCount));
}

/**
 * Trend statistics of a window metric over time
 */
export function summarizeTrend(
  windows: readonly Window[],
  metric: WindowMetric = windowMean
): TrendSummary {
  const values = windows.map(metric);
  const origin = windows[0]?.binStart ?? 0;
  const days = windows.map((window) => (window.binStart - origin) / SECONDS_PER_DAY);

  return Object.freeze({
    windowCount: windows.length,
    mean: values.length > 0 ? mean(values) : null,
    std: sampleStd(values),
    cv: coefficientOfVariation(values),
    slopePerDay: linearSlope(days, values),
  });
}

// ============================================================================
// SensitivityRunner Class
// ============================================================================

/**
 * Compares pipeline output across gap thresholds
 */
export class SensitivityRunner extends EventEmitter {
  private readonly gapThresholdsSec: readonly number[];
  private readonly binWidthSec: number;
  private readonly turnCountThresholds: readonly number[];
  private readonly minSessionCountPerBin: number;
  private readonly quantiles: readonly number[];

  constructor(config?: SensitivityRunnerConfig) {
    super();
    this.gapThresholdsSec = config?.gapThresholdsSec ?? DEFAULT_SENSITIVITY_GAPS_SEC;
    this.binWidthSec = config?.binWidthSec ?? DEFAULT_BIN_WIDTH_SEC;
    this.turnCountThresholds = config?.turnCountThresholds ?? DEFAULT_TURN_COUNT_THRESHOLDS;
    this.minSessionCountPerBin = config?.minSessionCountPerBin ?? DEFAULT_MIN_SESSION_COUNT_PER_BIN;
    this.quantiles = config?.quantiles ?? DEFAULT_WINDOW_QUANTILES;

    if (this.gapThresholdsSec.length === 0) {
      throw new InvalidParameterError("gapThresholdsSec", this.gapThresholdsSec, "must not be empty");
    }
    assertPositiveList("turnCountThresholds", this.turnCountThresholds);
    validateMinCount(this.minSessionCountPerBin);
  }

  /**
   * Run one gap threshold; throws on parameter or structural errors
   */
  runSetting(events: readonly TraceEvent[], gapThresholdSec: number): SensitivitySuccess {
    const sessions = buildSessions(events, { gapThresholdSec });
    const windows = aggregateSessionWindows(sessions, {
      binWidthSec: this.binWidthSec,
      quantiles: this.quantiles,
      turnCountThresholds: this.turnCountThresholds,
    });
    const hourOfDay = aggregateSessionsByHourOfDay(sessions);
    const filteredWindows = filterSparseWindows(windows, this.minSessionCountPerBin);

    const turns = sessions.map((session) => session.turnCount);
    const fractions: Record<number, number> = {};
    for (const k of this.turnCountThresholds) {
      fractions[k] = fractionAtLeast(turns, k);
    }

    const label = gapLabel(gapThresholdSec);
    const row: SensitivityRow = Object.freeze({
      label,
      gapThresholdSec,
      sessionCount: sessions.length,
      fractionAtLeast: Object.freeze(fractions),
      meanTurnCount: mean(turns),
      meanTurnCountStdOverHours: sampleStd(hourOfDay.map((record) => record.mean)),
    });

    return Object.freeze({
      status: "ok" as const,
      label,
      gapThresholdSec,
      row,
      windows,
      filteredWindows,
      hourOfDay,
      trend: summarizeTrend(filteredWindows),
    });
  }

  /**
   * Run every gap threshold, capturing failures per setting
   */
  run(events: readonly TraceEvent[]): SensitivityReport {
    const log = serviceLoggers.sensitivity;
    const outcomes: SensitivityOutcome[] = [];

    for (const gapThresholdSec of this.gapThresholdsSec) {
      const label = gapLabel(gapThresholdSec);
      try {
        const outcome = this.runSetting(events, gapThresholdSec);
        outcomes.push(outcome);
        log.debug("Sensitivity setting completed", {
          label,
          sessionCount: outcome.row.sessionCount,
          filteredWindows: outcome.filteredWindows.length,
        });
        this.emit("setting-completed", outcome);
      } catch (error) {
        if (!(error instanceof TraceAnalysisError)) {
          throw error;
        }
        const failure: SensitivityFailure = Object.freeze({
          status: "failed" as const,
          label,
          gapThresholdSec,
          errorName: error.name,
          errorMessage: error.message,
        });
        outcomes.push(failure);
        log.warn("Sensitivity setting failed", { label, error: error.message });
        this.emit("setting-failed", failure);
      }
    }

    const rows = outcomes.flatMap((outcome) => (outcome.status === "ok" ? [outcome.row] : []));

    return Object.freeze({
      rows: Object.freeze(rows),
      outcomes: Object.freeze(outcomes),
      failureCount: outcomes.length - rows.length,
    });
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Create a new SensitivityRunner instance
 */
export function createSensitivityRunner(config?: SensitivityRunnerConfig): SensitivityRunner {
  return new SensitivityRunner(config);
}

/**
 * Run a sensitivity comparison (convenience function)
 */
export function runSensitivity(
  events: readonly TraceEvent[],
  config?: SensitivityRunnerConfig
): SensitivityReport {
  return new SensitivityRunner(config).run(events);
}
