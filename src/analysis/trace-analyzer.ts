/**
 * Trace Analyzer
 *
 * End-to-end batch pipeline over one complete trace. Each stage returns a new
 * frozen table; the analyzer threads them forward and returns one result
 * structure. Nothing is shared between runs.
 */

import { randomUUID } from "crypto";
import { createRunLogger, serviceLoggers } from "../utils/logger";
import {
  resolveAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigInput,
} from "./analysis-config";
import { summarizeArrivals, type ArrivalProcessSummary } from "./arrival-process";
import { summarizeByModel, type ModelBreakdown } from "./model-breakdown";
import { estimateConcurrencyForModels, type ConcurrencySummary } from "./concurrency-estimator";
import { buildDailyCurves, correlateDailyCurves, type DailyCurveCorrelation } from "./daily-curves";
import {
  aggregateSessionsByHourOfDay,
  aggregateWindowsByHourOfDay,
  windowCount,
} from "./hour-of-day-aggregator";
import { SensitivityRunner, filterSparseWindows, summarizeTrend, type SensitivityReport, type TrendSummary } from "./sensitivity-runner";
import { assignSessionIds, buildSessionTable, summarizeSessions, type SessionSummary } from "./session-segmenter";
import { TimestampNormalizer, type TimestampValidationReport } from "./timestamp-normalizer";
import type {
  DailyCurve,
  HourOfDayRecord,
  RawTraceRecord,
  Session,
  SessionWindow,
  Window,
} from "./types";
import { decomposeVariance, type VarianceDecomposition } from "./variance-decomposer";
import { aggregateSessionWindows, aggregateWindows, sessionContextSamples } from "./window-aggregator";

// ============================================================================
// Types
// ============================================================================

/**
 * Windowed view of session context length, present when the trace carries one
 */
export interface ContextLengthAnalysis {
  /** Sessions with a context length */
  sessionCount: number;
  /** Mean context length per session, per window */
  windows: readonly Window[];
  hourOfDay: readonly HourOfDayRecord[];
  dailyCurves: readonly DailyCurve[];
  dailyCurveCorrelation: DailyCurveCorrelation;
  variance: VarianceDecomposition;
}

/**
 * Everything one analysis run produces
 */
export interface TraceAnalysisResult {
  runId: string;
  config: Readonly<AnalysisConfig>;
  validation: TimestampValidationReport;
  /** True when recorded session ids were used instead of inference */
  usedExplicitSessionIds: boolean;
  sessions: readonly Session[];
  sessionSummary: SessionSummary;
  windows: readonly SessionWindow[];
  /** Windows with at least minSessionCountPerBin sessions */
  filteredWindows: readonly SessionWindow[];
  trend: TrendSummary;
  /** Mean turn count per window, grouped by hour of day */
  hourOfDay: readonly HourOfDayRecord[];
  /** Sessions per window, grouped by hour of day */
  loadByHourOfDay: readonly HourOfDayRecord[];
  /** Session turn counts grouped by the hour each session started */
  sessionsByHourOfDay: readonly HourOfDayRecord[];
  dailyCurves: readonly DailyCurve[];
  dailyCurveCorrelation: DailyCurveCorrelation;
  variance: VarianceDecomposition;
  concurrency: readonly ConcurrencySummary[];
  arrivals: ArrivalProcessSummary;
  /** Null when no session carries a context length */
  contextLength: ContextLengthAnalysis | null;
  models: ModelBreakdown;
  /** Null when no sensitivity gaps were requested */
  sensitivity: SensitivityReport | null;
}

export interface AnalyzeTraceOptions {
  /** Run the gap-threshold comparison (default: true) */
  includeSensitivity?: boolean;

  /** Read overrides from environment variables (default: true) */
  useEnv?: boolean;
}

// ============================================================================
// Pipeline
// ============================================================================

function analyzeContextLength(
  sessions: readonly Session[],
  config: Readonly<AnalysisConfig>
): ContextLengthAnalysis | null {
  const samples = sessionContextSamples(sessions);
  if (samples.length === 0) return null;

  const windows = aggregateWindows(samples, {
    binWidthSec: config.binWidthSec,
    quantiles: config.quantiles,
  });
  const dailyCurves = buildDailyCurves(windows);

  return Object.freeze({
    sessionCount: samples.length,
    windows,
    hourOfDay: aggregateWindowsByHourOfDay(windows),
    dailyCurves,
    dailyCurveCorrelation: correlateDailyCurves(dailyCurves),
    variance: decomposeVariance(windows, { minWindowsPerDay: config.minWindowsPerDay }),
  });
}

/**
 * Run the full analysis over one trace
 */
export function analyzeTrace(
  records: readonly RawTraceRecord[],
  configInput: AnalysisConfigInput = {},
  options: AnalyzeTraceOptions = {}
): TraceAnalysisResult {
  const config = Object.freeze(resolveAnalysisConfig(configInput, { useEnv: options.useEnv }));
  const runId = randomUUID();
  const log = createRunLogger(runId, serviceLoggers.analyzer);
  const startedAt = Date.now();

  log.info("Trace analysis started", { recordCount: records.length });

  const normalized = new TimestampNormalizer({
    segmentableKinds: config.segmentableKinds,
  }).normalize(records);
  const { events } = normalized;

  const sessionIds = assignSessionIds(events, {
    gapThresholdSec: config.gapThresholdSec,
    explicitSessionIds: normalized.explicitSessionIds,
  });
  const sessions = buildSessionTable(events, sessionIds);
  const sessionSummary = summarizeSessions(sessions, config.turnCountThresholds);
  log.debug("Sessions built", { sessionCount: sessions.length });

  const windows = aggregateSessionWindows(sessions, {
    binWidthSec: config.binWidthSec,
    quantiles: config.quantiles,
    turnCountThresholds: config.turnCountThresholds,
  });
  const filteredWindows = filterSparseWindows(windows, config.minSessionCountPerBin);
  log.debug("Windows aggregated", {
    windowCount: windows.length,
    filteredWindowCount: filteredWindows.length,
  });

  const dailyCurves = buildDailyCurves(windows);
  const variance = decomposeVariance(windows, { minWindowsPerDay: config.minWindowsPerDay });
  const concurrency = estimateConcurrencyForModels(sessions, config.durationModelMultipliers);
  const contextLength = analyzeContextLength(sessions, config);

  const sensitivity =
    options.includeSensitivity === false
      ? null
      : new SensitivityRunner({
          gapThresholdsSec: config.sensitivityGapThresholdsSec,
          binWidthSec: config.binWidthSec,
          turnCountThresholds: config.turnCountThresholds,
          minSessionCountPerBin: config.minSessionCountPerBin,
          quantiles: config.quantiles,
        }).run(events);

  const result: TraceAnalysisResult = Object.freeze({
    runId,
    config,
    validation: normalized.report,
    usedExplicitSessionIds: normalized.explicitSessionIds !== null,
    sessions,
    sessionSummary,
    windows,
    filteredWindows,
    trend: summarizeTrend(filteredWindows),
    hourOfDay: aggregateWindowsByHourOfDay(windows),
    loadByHourOfDay: aggregateWindowsByHourOfDay(windows, windowCount),
    sessionsByHourOfDay: aggregateSessionsByHourOfDay(sessions),
    dailyCurves,
    dailyCurveCorrelation: correlateDailyCurves(dailyCurves),
    variance,
    concurrency,
    arrivals: summarizeArrivals(events),
    contextLength,
    models: summarizeByModel(sessions),
    sensitivity,
  });

  log.info("Trace analysis finished", {
    sessionCount: sessions.length,
    windowCount: windows.length,
    sensitivityFailures: sensitivity?.failureCount ?? 0,
    durationMs: Date.now() - startedAt,
  });

  return result;
}
