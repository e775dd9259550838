/**
 * Analysis Module
 *
 * Exports the trace analytics pipeline: normalization, session inference,
 * window and hour-of-day aggregation, variance decomposition, concurrency
 * estimation and gap-threshold sensitivity.
 */

// Shared tables and constants
export {
  SECONDS_PER_MINUTE,
  SECONDS_PER_HOUR,
  SECONDS_PER_DAY,
  HOURS_PER_DAY,
  EventKind,
  TABLE_COLUMNS,
} from "./types";

export type {
  RawTraceRecord,
  TraceEvent,
  Session,
  TimedValue,
  QuantileSet,
  Window,
  SessionWindow,
  HourOfDayRecord,
  ConcurrencyEvent,
  DailyCurve,
} from "./types";

// Errors
export {
  TraceAnalysisErrorCode,
  TraceAnalysisError,
  EmptyInputError,
  InvalidParameterError,
  InsufficientDataError,
  assertPositive,
  assertPositiveList,
} from "./errors";

// Statistics
export {
  mean,
  sampleStd,
  populationStd,
  quantile,
  quantileSorted,
  median,
  quantileKey,
  coefficientOfVariation,
  pearsonCorrelation,
  linearSlope,
  fractionAtLeast,
} from "./statistics";

// Configuration
export {
  DEFAULT_SEGMENTABLE_KINDS,
  DEFAULT_ANALYSIS_CONFIG,
  ENV_VARS,
  loadConfigFromEnv,
  validateAnalysisConfig,
  validateAnalysisEnv,
  resolveAnalysisConfig,
} from "./analysis-config";

export type { AnalysisConfig, AnalysisConfigInput } from "./analysis-config";

// Timestamp Normalizer
export {
  MISSING_SESSION_ID,
  TimestampNormalizer,
  parseTimestamp,
  coerceSessionId,
  parseTurnCount,
  parseContextLength,
  normalizeTrace,
} from "./timestamp-normalizer";

export type {
  TimestampValidationReport,
  NormalizedTrace,
  TimestampNormalizerConfig,
} from "./timestamp-normalizer";

// Session Segmenter
export {
  INITIAL_SEGMENTATION_STATE,
  segmentStep,
  segmentSessions,
  assignSessionIds,
  buildSessionTable,
  buildSessions,
  summarizeSessions,
} from "./session-segmenter";

export type {
  SegmentationAccumulator,
  SegmentationStepResult,
  AssignSessionIdsOptions,
  SessionSummary,
} from "./session-segmenter";

// Window Aggregator
export {
  DEFAULT_BIN_WIDTH_SEC,
  DEFAULT_WINDOW_QUANTILES,
  binStartOf,
  aggregateWindows,
  aggregateSessionWindows,
  sessionTurnSamples,
  sessionContextSamples,
} from "./window-aggregator";

export type { WindowAggregationOptions, SessionWindowOptions } from "./window-aggregator";

// Hour-of-Day Aggregator
export {
  windowMean,
  windowCount,
  hourOfDay,
  aggregateByHourOfDay,
  aggregateWindowsByHourOfDay,
  aggregateSessionsByHourOfDay,
} from "./hour-of-day-aggregator";

export type { WindowMetric } from "./hour-of-day-aggregator";

// Daily Curves
export {
  DEFAULT_MIN_SHARED_HOURS,
  dayIndexOf,
  dateOfDayIndex,
  buildDailyCurves,
  correlateDailyCurves,
} from "./daily-curves";

export type { DailyCurveCorrelation } from "./daily-curves";

// Variance Decomposer
export {
  DEFAULT_MIN_WINDOWS_PER_DAY,
  computeGlobalCv,
  computeIntraDayCv,
  computeInterDayCv,
  decomposeVariance,
} from "./variance-decomposer";

export type {
  GlobalCv,
  DayCv,
  IntraDayCv,
  HourCv,
  InterDayCv,
  VarianceDecomposition,
  VarianceDecompositionOptions,
} from "./variance-decomposer";

// Concurrency Estimator
export {
  durationModelLabel,
  buildConcurrencyEvents,
  sweepConcurrency,
  estimateConcurrency,
  estimateConcurrencyForModels,
} from "./concurrency-estimator";

export type { ConcurrencySummary, ConcurrencyStep } from "./concurrency-estimator";

// Arrival Process
export { computeInterArrival, dayOfWeek, summarizeArrivals } from "./arrival-process";

export type { InterArrivalStats, ArrivalProcessSummary } from "./arrival-process";

// Model Breakdown
export { summarizeByModel } from "./model-breakdown";

export type { ModelSummary, ModelBreakdown } from "./model-breakdown";

// Sensitivity Runner
export {
  DEFAULT_SENSITIVITY_GAPS_SEC,
  gapLabel,
  filterSparseWindows,
  summarizeTrend,
  SensitivityRunner,
  createSensitivityRunner,
  runSensitivity,
} from "./sensitivity-runner";

export type {
  SensitivityRow,
  TrendSummary,
  SensitivitySuccess,
  SensitivityFailure,
  SensitivityOutcome,
  SensitivityReport,
  SensitivityRunnerConfig,
  SensitivityRunnerEvents,
} from "./sensitivity-runner";

// Trace Analyzer
export { analyzeTrace } from "./trace-analyzer";

export type {
  TraceAnalysisResult,
  AnalyzeTraceOptions,
  ContextLengthAnalysis,
} from "./trace-analyzer";
