/**
 * Analysis Configuration
 *
 * Recognized options, their defaults, and environment overrides.
 * Resolution order: defaults <- environment <- explicit input.
 *
 * This is the only reader of the analysis environment variables; they are
 * read per call, after config/env has loaded .env.
 */

import { envUtils } from "../../config/env";
import { InvalidParameterError, assertPositive, assertPositiveList } from "./errors";

// ============================================================================
// Types
// ============================================================================

/**
 * Fully resolved analysis configuration
 */
export interface AnalysisConfig {
  /** Idle gap (seconds) above which a new session starts */
  gapThresholdSec: number;

  /** Width of time windows in seconds */
  binWidthSec: number;

  /** Windows with fewer sessions are dropped before trend statistics */
  minSessionCountPerBin: number;

  /** Seconds per turn for each synthetic duration model */
  durationModelMultipliers: number[];

  /** k values for "fraction of sessions with turnCount >= k" */
  turnCountThresholds: number[];

  /** Gap thresholds compared by the sensitivity runner */
  sensitivityGapThresholdsSec: number[];

  /** Quantiles reported per window, in [0, 1] */
  quantiles: number[];

  /** Minimum windows a day needs to get an intra-day CV */
  minWindowsPerDay: number;

  /** Record kinds treated as conversational (case-insensitive) */
  segmentableKinds: string[];
}

/**
 * Partial configuration accepted by resolveAnalysisConfig
 */
export type AnalysisConfigInput = Partial<AnalysisConfig>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SEGMENTABLE_KINDS = ["Conversation log", "conversation", "conversational"];

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  gapThresholdSec: 1800,
  binWidthSec: 3600,
  minSessionCountPerBin: 100,
  durationModelMultipliers: [10, 30],
  turnCountThresholds: [2, 3],
  sensitivityGapThresholdsSec: [900, 1800, 3600],
  quantiles: [0.9, 0.95],
  minWindowsPerDay: 6,
  segmentableKinds: DEFAULT_SEGMENTABLE_KINDS,
});

export const ENV_VARS = {
  GAP_THRESHOLD_SEC: "SESSION_GAP_THRESHOLD_SEC",
  BIN_WIDTH_SEC: "WINDOW_BIN_WIDTH_SEC",
  MIN_SESSION_COUNT_PER_BIN: "MIN_SESSION_COUNT_PER_BIN",
  DURATION_MODEL_MULTIPLIERS: "DURATION_MODEL_MULTIPLIERS",
  TURN_COUNT_THRESHOLDS: "TURN_COUNT_THRESHOLDS",
  SENSITIVITY_GAP_THRESHOLDS_SEC: "SENSITIVITY_GAP_THRESHOLDS_SEC",
  SEGMENTABLE_KINDS: "SEGMENTABLE_KINDS",
} as const;

// ============================================================================
// Environment
// ============================================================================

/**
 * Read one variable through an env getter; unset or blank means no override
 */
function readEnv<T>(key: string, read: (key: string) => T): T | undefined {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  try {
    return read(key);
  } catch (error) {
    throw new InvalidParameterError(
      key,
      raw,
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Load configuration overrides from environment variables
 */
export function loadConfigFromEnv(): AnalysisConfigInput {
  const config: AnalysisConfigInput = {};

  const gap = readEnv(ENV_VARS.GAP_THRESHOLD_SEC, envUtils.getEnvVarAsNumber);
  if (gap !== undefined) config.gapThresholdSec = gap;

  const binWidth = readEnv(ENV_VARS.BIN_WIDTH_SEC, envUtils.getEnvVarAsNumber);
  if (binWidth !== undefined) config.binWidthSec = binWidth;

  const minCount = readEnv(ENV_VARS.MIN_SESSION_COUNT_PER_BIN, envUtils.getEnvVarAsNumber);
  if (minCount !== undefined) config.minSessionCountPerBin = minCount;

  const multipliers = readEnv(ENV_VARS.DURATION_MODEL_MULTIPLIERS, envUtils.getEnvVarAsNumberList);
  if (multipliers !== undefined) config.durationModelMultipliers = multipliers;

  const thresholds = readEnv(ENV_VARS.TURN_COUNT_THRESHOLDS, envUtils.getEnvVarAsNumberList);
  if (thresholds !== undefined) config.turnCountThresholds = thresholds;

  const gaps = readEnv(ENV_VARS.SENSITIVITY_GAP_THRESHOLDS_SEC, envUtils.getEnvVarAsNumberList);
  if (gaps !== undefined) config.sensitivityGapThresholdsSec = gaps;

  const kinds = readEnv(ENV_VARS.SEGMENTABLE_KINDS, envUtils.getEnvVarAsList);
  if (kinds !== undefined) config.segmentableKinds = kinds;

  return config;
}

// ============================================================================
// Validation & resolution
// ============================================================================

/**
 * Throw InvalidParameterError for the first out-of-range option
 */
export function validateAnalysisConfig(config: AnalysisConfig): void {
  assertPositive("gapThresholdSec", config.gapThresholdSec);
  assertPositive("binWidthSec", config.binWidthSec);

  if (!Number.isFinite(config.minSessionCountPerBin) || config.minSessionCountPerBin < 0) {
    throw new InvalidParameterError(
      "minSessionCountPerBin",
      config.minSessionCountPerBin,
      "must be a finite number >= 0"
    );
  }

  assertPositiveList("durationModelMultipliers", config.durationModelMultipliers);
  assertPositiveList("turnCountThresholds", config.turnCountThresholds);
  assertPositiveList("sensitivityGapThresholdsSec", config.sensitivityGapThresholdsSec);

  if (config.quantiles.some((q) => !(q >= 0 && q <= 1))) {
    throw new InvalidParameterError("quantiles", config.quantiles, "every entry must be in [0, 1]");
  }

  if (!Number.isInteger(config.minWindowsPerDay) || config.minWindowsPerDay < 2) {
    throw new InvalidParameterError(
      "minWindowsPerDay",
      config.minWindowsPerDay,
      "must be an integer >= 2"
    );
  }

  if (config.segmentableKinds.length === 0) {
    throw new InvalidParameterError("segmentableKinds", config.segmentableKinds, "must not be empty");
  }
}

/**
 * Merge defaults, environment overrides and explicit input, then validate
 */
export function resolveAnalysisConfig(
  input: AnalysisConfigInput = {},
  options: { useEnv?: boolean } = {}
): AnalysisConfig {
  const envConfig = options.useEnv === false ? {} : loadConfigFromEnv();
  const merged: AnalysisConfig = {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...envConfig,
    ...stripUndefined(input),
  };

  const resolved: AnalysisConfig = {
    ...merged,
    durationModelMultipliers: [...merged.durationModelMultipliers],
    turnCountThresholds: [...merged.turnCountThresholds],
    sensitivityGapThresholdsSec: [...merged.sensitivityGapThresholdsSec],
    quantiles: [...merged.quantiles],
    segmentableKinds: [...merged.segmentableKinds],
  };

  validateAnalysisConfig(resolved);
  return resolved;
}

function stripUndefined(input: AnalysisConfigInput): AnalysisConfigInput {
  const result: AnalysisConfigInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Check the analysis environment variables without running anything
 */
export function validateAnalysisEnv(): { valid: boolean; errors: string[] } {
  try {
    resolveAnalysisConfig();
    return { valid: true, errors: [] };
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      return { valid: false, errors: [error.message] };
    }
    throw error;
  }
}
