/**
 * Timestamp Normalizer
 *
 * Validates raw trace records into a typed, time-ordered event table.
 *
 * - Unusable timestamps are dropped and counted, never fatal
 * - Record kind is mapped onto CONVERSATIONAL / OTHER
 * - Stable sort: equal timestamps keep arrival order
 * - Explicit session ids are carried through aligned with the sorted events
 * - Optional turn count, context length and model are validated per record;
 *   a malformed value is dropped and counted, the record itself is kept
 */

import { serviceLoggers } from "../utils/logger";
import { DEFAULT_SEGMENTABLE_KINDS } from "./analysis-config";
import { EmptyInputError, InvalidParameterError } from "./errors";
import { EventKind, SECONDS_PER_DAY, type RawTraceRecord, type TraceEvent } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * Summary of what the normalizer kept and dropped
 */
export interface TimestampValidationReport {
  inputCount: number;
  validCount: number;
  droppedCount: number;
  minTimestamp: number;
  maxTimestamp: number;
  spanDays: number;
  /** Events sharing their timestamp with at least one other event */
  duplicateTimestampCount: number;
  /** Valid records were already in non-decreasing order */
  wasSorted: boolean;
  conversationalCount: number;
  otherCount: number;
  /** Turn count, context length or model values dropped as malformed */
  invalidAttributeCount: number;
}

/**
 * Normalized trace
 */
export interface NormalizedTrace {
  events: readonly TraceEvent[];
  /** Present when the input carries recorded session ids; aligned with events */
  explicitSessionIds: readonly number[] | null;
  report: TimestampValidationReport;
}

/**
 * Configuration for TimestampNormalizer
 */
export interface TimestampNormalizerConfig {
  /** Kinds treated as conversational, compared case-insensitively (default: conversation log kinds) */
  segmentableKinds?: readonly string[];
}

/** Sentinel id for records without a recorded session id */
export const MISSING_SESSION_ID = -1;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse a raw timestamp into epoch seconds, or null when unusable
 */
export function parseTimestamp(raw: RawTraceRecord["timestamp"]): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }

  if (raw instanceof Date) {
    const ms = raw.getTime();
    return Number.isFinite(ms) ? ms / 1000 : null;
  }

  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (trimmed === "") return null;

    const numeric = Number(trimmed);
    if (Number.isFinite(numeric)) return numeric;

    const ms = Date.parse(trimmed);
    return Number.isFinite(ms) ? ms / 1000 : null;
  }

  return null;
}

/**
 * Coerce a recorded session id to an integer; missing or unparsable -> -1
 */
export function coerceSessionId(raw: RawTraceRecord["explicitSessionId"]): number {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? Math.trunc(raw) : MISSING_SESSION_ID;
  }
  if (typeof raw === "string" && raw.trim() !== "") {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? Math.trunc(parsed) : MISSING_SESSION_ID;
  }
  return MISSING_SESSION_ID;
}

function parseNumeric(raw: number | string): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  const trimmed = raw.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a record's turn count: a positive integer, or null when unusable
 */
export function parseTurnCount(raw: number | string): number | null {
  const parsed = parseNumeric(raw);
  return parsed !== null && Number.isInteger(parsed) && parsed >= 1 ? parsed : null;
}

/**
 * Parse a record's context length: a finite number >= 0, or null when unusable
 */
export function parseContextLength(raw: number | string): number | null {
  const parsed = parseNumeric(raw);
  return parsed !== null && parsed >= 0 ? parsed : null;
}

type EventAttributes = Pick<TraceEvent, "turnCount" | "contextLength" | "model">;

function readAttributes(record: RawTraceRecord): { attributes: EventAttributes; invalid: number } {
  const attributes: EventAttributes = {};
  let invalid = 0;

  if (record.turnCount !== undefined && record.turnCount !== null) {
    const turnCount = parseTurnCount(record.turnCount);
    if (turnCount === null) invalid++;
    else attributes.turnCount = turnCount;
  }

  if (record.contextLength !== undefined && record.contextLength !== null) {
    const contextLength = parseContextLength(record.contextLength);
    if (contextLength === null) invalid++;
    else attributes.contextLength = contextLength;
  }

  if (record.model !== undefined && record.model !== null) {
    if (typeof record.model === "string" && record.model.trim() !== "") {
      attributes.model = record.model.trim();
    } else {
      invalid++;
    }
  }

  return { attributes, invalid };
}

function countDuplicates(sortedTimestamps: readonly number[]): number {
  let duplicates = 0;
  let runLength = 1;
  for (let i = 1; i <= sortedTimestamps.length; i++) {
    if (i < sortedTimestamps.length && sortedTimestamps[i] === sortedTimestamps[i - 1]) {
      runLength++;
      continue;
    }
    if (runLength > 1) duplicates += runLength;
    runLength = 1;
  }
  return duplicates;
}

// ============================================================================
// TimestampNormalizer Class
// ============================================================================

/**
 * Cleans raw records into the event table every later stage reads
 */
export class TimestampNormalizer {
  private readonly segmentableKinds: ReadonlySet<string>;

  constructor(config?: TimestampNormalizerConfig) {
    const kinds = config?.segmentableKinds ?? DEFAULT_SEGMENTABLE_KINDS;
    if (kinds.length === 0) {
      throw new InvalidParameterError("segmentableKinds", kinds, "must not be empty");
    }
    this.segmentableKinds = new Set(kinds.map((kind) => kind.trim().toLowerCase()));
  }

  /**
   * Classify a record kind
   */
  classifyKind(kind: unknown): EventKind {
    if (kind === undefined || kind === null) {
      return EventKind.CONVERSATIONAL;
    }
    if (typeof kind !== "string") {
      return EventKind.OTHER;
    }
    return this.segmentableKinds.has(kind.trim().toLowerCase())
      ? EventKind.CONVERSATIONAL
      : EventKind.OTHER;
  }

  /**
   * Validate, classify and sort a raw record stream
   */
  normalize(records: readonly RawTraceRecord[]): NormalizedTrace {
    const log = serviceLoggers.normalizer;
    const hasExplicitIds = records.some((record) => "explicitSessionId" in record);

    const valid: Array<{ event: TraceEvent; sessionId: number }> = [];
    let wasSorted = true;
    let previous = -Infinity;
    let invalidAttributeCount = 0;

    records.forEach((record, index) => {
      const timestamp = parseTimestamp(record.timestamp);
      if (timestamp === null) return;

      if (timestamp < previous) wasSorted = false;
      previous = timestamp;

      const { attributes, invalid } = readAttributes(record);
      invalidAttributeCount += invalid;

      valid.push({
        event: Object.freeze({
          index,
          timestamp,
          kind: this.classifyKind(record.kind),
          ...attributes,
        }),
        sessionId: hasExplicitIds ? coerceSessionId(record.explicitSessionId) : MISSING_SESSION_ID,
      });
    });

    const droppedCount = records.length - valid.length;
    if (droppedCount > 0) {
      log.warn("Dropped records with unusable timestamps", {
        droppedCount,
        inputCount: records.length,
      });
    }

    if (invalidAttributeCount > 0) {
      log.warn("Dropped malformed record attributes", { invalidAttributeCount });
    }

    if (valid.length === 0) {
      throw new EmptyInputError(
        `No usable records after timestamp validation (${records.length} input, ${droppedCount} dropped)`
      );
    }

    // Array.prototype.sort is stable, so ties keep arrival order
    valid.sort((a, b) => a.event.timestamp - b.event.timestamp);

    const events = Object.freeze(valid.map((entry) => entry.event));
    const explicitSessionIds = hasExplicitIds
      ? Object.freeze(valid.map((entry) => entry.sessionId))
      : null;

    const timestamps = events.map((event) => event.timestamp);
    const minTimestamp = timestamps[0] ?? 0;
    const maxTimestamp = timestamps[timestamps.length - 1] ?? 0;
    const conversationalCount = events.filter(
      (event) => event.kind === EventKind.CONVERSATIONAL
    ).length;

    const report: TimestampValidationReport = Object.freeze({
      inputCount: records.length,
      validCount: events.length,
      droppedCount,
      minTimestamp,
      maxTimestamp,
      spanDays: (maxTimestamp - minTimestamp) / SECONDS_PER_DAY,
      duplicateTimestampCount: countDuplicates(timestamps),
      wasSorted,
      conversationalCount,
      otherCount: events.length - conversationalCount,
      invalidAttributeCount,
    });

    log.debug("Normalized trace", {
      validCount: report.validCount,
      droppedCount: report.droppedCount,
      explicitSessionIds: hasExplicitIds,
    });

    return Object.freeze({ events, explicitSessionIds, report });
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Normalize a raw record stream (convenience function)
 */
export function normalizeTrace(
  records: readonly RawTraceRecord[],
  config?: TimestampNormalizerConfig
): NormalizedTrace {
  return new TimestampNormalizer(config).normalize(records);
}
