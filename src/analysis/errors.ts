/**
 * Trace analysis error taxonomy
 *
 * Parameter and structural errors abort the run for one parameter setting.
 * Unusable individual records are never errors; the normalizer drops and counts them.
 */

/**
 * Stable machine-readable error codes
 */
export enum TraceAnalysisErrorCode {
  EMPTY_INPUT = "EMPTY_INPUT",
  INVALID_PARAMETER = "INVALID_PARAMETER",
  INSUFFICIENT_DATA = "INSUFFICIENT_DATA",
}

/**
 * Base class for all errors raised by the analysis core
 */
export class TraceAnalysisError extends Error {
  public readonly code: TraceAnalysisErrorCode;

  constructor(code: TraceAnalysisErrorCode, message: string) {
    super(message);
    this.name = "TraceAnalysisError";
    this.code = code;
  }
}

/**
 * No usable records remain (after timestamp validation, or an empty table was passed)
 */
export class EmptyInputError extends TraceAnalysisError {
  constructor(message: string = "No usable records in input") {
    super(TraceAnalysisErrorCode.EMPTY_INPUT, message);
    this.name = "EmptyInputError";
  }
}

/**
 * A parameter is out of range: non-positive gap or bin width, empty threshold lists, ...
 */
export class InvalidParameterError extends TraceAnalysisError {
  public readonly parameter: string;
  public readonly value: unknown;

  constructor(parameter: string, value: unknown, reason: string) {
    super(
      TraceAnalysisErrorCode.INVALID_PARAMETER,
      `Invalid ${parameter} (${formatValue(value)}): ${reason}`
    );
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.value = value;
  }
}

/**
 * A decomposition level's guard condition is never met across the dataset
 */
export class InsufficientDataError extends TraceAnalysisError {
  public readonly level: string;

  constructor(level: string, message: string) {
    super(TraceAnalysisErrorCode.INSUFFICIENT_DATA, message);
    this.name = "InsufficientDataError";
    this.level = level;
  }
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.join(", ")}]`;
  }
  return String(value);
}

/**
 * Require a finite, strictly positive number
 */
export function assertPositive(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(parameter, value, "must be a finite number greater than 0");
  }
}

/**
 * Require a non-empty list of finite, strictly positive numbers
 */
export function assertPositiveList(parameter: string, values: readonly number[]): void {
  if (values.length === 0) {
    throw new InvalidParameterError(parameter, values, "must not be empty");
  }
  for (const value of values) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidParameterError(parameter, values, "every entry must be greater than 0");
    }
  }
}
