/**
 * Shared table types for the trace analysis pipeline
 *
 * All tables are readonly arrays of frozen rows. Stages return new tables
 * and never write into their inputs.
 */

// ============================================================================
// Time constants
// ============================================================================

export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_DAY = 86400;
export const HOURS_PER_DAY = 24;

// ============================================================================
// Input records
// ============================================================================

/**
 * Raw record as handed over by a loader. Column presence is not trusted;
 * the normalizer validates every field.
 */
export interface RawTraceRecord {
  /** Epoch seconds, numeric string, ISO date string or Date */
  timestamp: number | string | Date | null | undefined;

  /** Log type; absent means conversational, any non-string value is a marker */
  kind?: unknown;

  /** Session id recorded by the source, when the trace has one */
  explicitSessionId?: number | string | null;

  /** Turns the record stands for, for traces with one record per conversation */
  turnCount?: number | string | null;

  /** Context size of the record, e.g. total words across its utterances */
  contextLength?: number | string | null;

  /** Model that served the record */
  model?: unknown;
}

/**
 * Event classification used by the segmenter
 */
export enum EventKind {
  /** Part of a conversation; eligible for proximity grouping */
  CONVERSATIONAL = "CONVERSATIONAL",
  /** Any other marker; always isolated into its own session */
  OTHER = "OTHER",
}

/**
 * Validated event
 */
export interface TraceEvent {
  /** Position of the record in the raw input */
  index: number;

  /** Epoch seconds */
  timestamp: number;

  kind: EventKind;

  /** Turns carried by a conversation-level record; absent means one turn */
  turnCount?: number;

  contextLength?: number;

  model?: string;
}

// ============================================================================
// Derived tables
// ============================================================================

/**
 * One inferred (or recorded) session
 */
export interface Session {
  /** Session id; -1 only for records missing an explicit id */
  id: number;
  startTime: number;
  endTime: number;
  /** Turns in the session (>= 1): one per event unless the events carry their own counts */
  turnCount: number;
  /** endTime - startTime, never negative */
  durationSec: number;
  /** Sum of the context lengths its events carry; absent when none carries one */
  contextLength?: number;
  /** Model of the first event that names one */
  model?: string;
}

/**
 * Generic (timestamp, value) sample fed to the window and hour-of-day aggregators
 */
export interface TimedValue {
  timestamp: number;
  value: number;
}

/**
 * Quantiles keyed as p<percent>, e.g. { p90, p95 }
 */
export type QuantileSet = Readonly<Record<string, number>>;

/**
 * Fixed-width time bucket
 */
export interface Window {
  binStart: number;
  binEnd: number;
  /** Number of samples in the bin (> 0) */
  count: number;
  mean: number;
  quantiles: QuantileSet;
}

/**
 * Window over sessions binned by start time with value = turn count
 */
export interface SessionWindow extends Window {
  /** Fraction of the bin's sessions with turnCount >= k, keyed by k */
  fractionAtLeast: Readonly<Record<number, number>>;
}

/**
 * Hour-of-day aggregate across all days
 */
export interface HourOfDayRecord {
  /** 0..23 */
  hour: number;
  mean: number;
  /** Sample standard deviation (ddof = 1); null with a single sample */
  std: number | null;
  p10: number;
  p90: number;
  sampleCount: number;
}

/**
 * One step of the concurrency sweep
 */
export interface ConcurrencyEvent {
  time: number;
  delta: 1 | -1;
}

/**
 * Metric value for each hour of one calendar day
 */
export interface DailyCurve {
  /** UTC date, YYYY-MM-DD */
  date: string;
  /** floor(t / 86400) */
  dayIndex: number;
  /** 24 entries; null where the day has no window in that hour */
  values: ReadonlyArray<number | null>;
}

/**
 * Column order of each output table, for sinks that write them out
 */
export const TABLE_COLUMNS = {
  session: ["id", "startTime", "endTime", "turnCount", "durationSec", "contextLength", "model"],
  window: ["binStart", "binEnd", "count", "mean", "quantiles"],
  sessionWindow: ["binStart", "binEnd", "count", "mean", "quantiles", "fractionAtLeast"],
  hourOfDay: ["hour", "mean", "std", "p10", "p90", "sampleCount"],
  sensitivity: [
    "label",
    "gapThresholdSec",
    "sessionCount",
    "fractionAtLeast",
    "meanTurnCount",
    "meanTurnCountStdOverHours",
  ],
  modelSummary: ["model", "sessionCount", "turnMean", "turnMedian", "wordsPerTurnMean"],
  concurrency: [
    "label",
    "multiplierSec",
    "sessionCount",
    "peak",
    "mean",
    "median",
    "eventIndexedMean",
    "eventIndexedMedian",
    "spanSec",
  ],
} as const;
