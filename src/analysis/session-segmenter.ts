/**
 * Session Segmenter
 *
 * Infers session boundaries from event timestamps when the trace carries no
 * session id. A new session starts when:
 * - the idle time since the previous conversational event exceeds the gap threshold, or
 * - the event is a non-conversational marker, which becomes a singleton session.
 *
 * Segmentation is a left-to-right fold over { previousTimestamp, currentSessionId };
 * `segmentStep` is the fold body and can be applied to any slice.
 */

import { serviceLoggers } from "../utils/logger";
import { EmptyInputError, InvalidParameterError, assertPositive } from "./errors";
import {
  fractionAtLeast,
  mean,
  quantileSorted,
  sampleStd,
  sortAscending,
} from "./statistics";
import { EventKind, type Session, type TraceEvent } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * Fold state carried between events
 */
export interface SegmentationAccumulator {
  /**
   * Timestamp of the last event of the open conversational session.
   * Null when no session is open (start of stream, or right after a marker).
   */
  readonly previousTimestamp: number | null;

  /** Last id issued; -1 before the first event */
  readonly currentSessionId: number;
}

/**
 * Result of one fold step
 */
export interface SegmentationStepResult {
  sessionId: number;
  next: SegmentationAccumulator;
}

interface SessionGroup {
  start: number;
  end: number;
  turns: number;
  contextLength: number | undefined;
  model: string | undefined;
}

/**
 * Options for assigning session ids
 */
export interface AssignSessionIdsOptions {
  /** Idle gap threshold in seconds (used when no explicit ids are given) */
  gapThresholdSec: number;

  /** Recorded ids aligned with events; bypasses inference when present */
  explicitSessionIds?: readonly number[] | null;
}

/**
 * Session depth distribution
 */
export interface SessionSummary {
  sessionCount: number;
  meanTurnCount: number;
  medianTurnCount: number;
  p90TurnCount: number;
  p95TurnCount: number;
  p99TurnCount: number;
  /** Sample std of turn counts; null with a single session */
  turnCountStd: number | null;
  singleTurnCount: number;
  singleTurnFraction: number;
  /** Fraction of sessions with turnCount >= k, keyed by k */
  fractionAtLeast: Readonly<Record<number, number>>;
  meanDurationSec: number;
}

// ============================================================================
// Fold
// ============================================================================

export const INITIAL_SEGMENTATION_STATE: SegmentationAccumulator = Object.freeze({
  previousTimestamp: null,
  currentSessionId: -1,
});

/**
 * Assign one event to a session and return the updated accumulator
 */
export function segmentStep(
  acc: SegmentationAccumulator,
  event: TraceEvent,
  gapThresholdSec: number
): SegmentationStepResult {
  if (event.kind !== EventKind.CONVERSATIONAL) {
    const sessionId = acc.currentSessionId + 1;
    return {
      sessionId,
      next: { previousTimestamp: null, currentSessionId: sessionId },
    };
  }

  const startsNewSession =
    acc.previousTimestamp === null || event.timestamp - acc.previousTimestamp > gapThresholdSec;
  const sessionId = startsNewSession ? acc.currentSessionId + 1 : acc.currentSessionId;

  return {
    sessionId,
    next: { previousTimestamp: event.timestamp, currentSessionId: sessionId },
  };
}

/**
 * Infer session ids for a time-ordered event table
 */
export function segmentSessions(
  events: readonly TraceEvent[],
  gapThresholdSec: number,
  initial: SegmentationAccumulator = INITIAL_SEGMENTATION_STATE
): { sessionIds: readonly number[]; state: SegmentationAccumulator } {
  assertPositive("gapThresholdSec", gapThresholdSec);
  if (events.length === 0) {
    throw new EmptyInputError("Cannot segment an empty event sequence");
  }

  const sessionIds: number[] = new Array<number>(events.length);
  let state = initial;
  events.forEach((event, i) => {
    const step = segmentStep(state, event, gapThresholdSec);
    sessionIds[i] = step.sessionId;
    state = step.next;
  });

  return { sessionIds: Object.freeze(sessionIds), state };
}

/**
 * Session id per event: recorded ids when available, inferred otherwise
 */
export function assignSessionIds(
  events: readonly TraceEvent[],
  options: AssignSessionIdsOptions
): readonly number[] {
  const explicit = options.explicitSessionIds;
  if (explicit) {
    if (events.length === 0) {
      throw new EmptyInputError("Cannot assign session ids to an empty event sequence");
    }
    if (explicit.length !== events.length) {
      throw new InvalidParameterError(
        "explicitSessionIds",
        explicit.length,
        `expected one id per event (${events.length})`
      );
    }
    serviceLoggers.segmenter.debug("Using recorded session ids", { eventCount: events.length });
    return explicit;
  }

  const { sessionIds, state } = segmentSessions(events, options.gapThresholdSec);
  serviceLoggers.segmenter.debug("Inferred sessions", {
    eventCount: events.length,
    sessionCount: state.currentSessionId + 1,
    gapThresholdSec: options.gapThresholdSec,
  });
  return sessionIds;
}

// ============================================================================
// Session table
// ============================================================================

/**
 * Group events by session id into the session table, ordered by id.
 * An event carrying its own turn count contributes that many turns;
 * context lengths are summed per session.
 */
export function buildSessionTable(
  events: readonly TraceEvent[],
  sessionIds: readonly number[]
): readonly Session[] {
  if (events.length === 0) {
    throw new EmptyInputError("Cannot build sessions from an empty event sequence");
  }
  if (sessionIds.length !== events.length) {
    throw new InvalidParameterError(
      "sessionIds",
      sessionIds.length,
      `expected one id per event (${events.length})`
    );
  }

  const groups = new Map<number, SessionGroup>();
  events.forEach((event, i) => {
    const id = sessionIds[i] ?? -1;
    const turns = event.turnCount ?? 1;
    const group = groups.get(id);
    if (!group) {
      groups.set(id, {
        start: event.timestamp,
        end: event.timestamp,
        turns,
        contextLength: event.contextLength,
        model: event.model,
      });
      return;
    }
    group.start = Math.min(group.start, event.timestamp);
    group.end = Math.max(group.end, event.timestamp);
    group.turns += turns;
    if (event.contextLength !== undefined) {
      group.contextLength = (group.contextLength ?? 0) + event.contextLength;
    }
    if (group.model === undefined) group.model = event.model;
  });

  const sessions = [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([id, group]) => {
      const session: Session = {
        id,
        startTime: group.start,
        endTime: group.end,
        turnCount: group.turns,
        durationSec: Math.max(0, group.end - group.start),
      };
      if (group.contextLength !== undefined) session.contextLength = group.contextLength;
      if (group.model !== undefined) session.model = group.model;
      return Object.freeze(session);
    });

  return Object.freeze(sessions);
}

/**
 * Segment and build the session table in one call
 */
export function buildSessions(
  events: readonly TraceEvent[],
  options: AssignSessionIdsOptions
): readonly Session[] {
  return buildSessionTable(events, assignSessionIds(events, options));
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Describe the session depth distribution
 */
export function summarizeSessions(
  sessions: readonly Session[],
  turnCountThresholds: readonly number[]
): SessionSummary {
  if (sessions.length === 0) {
    throw new EmptyInputError("Cannot summarize an empty session table");
  }

  const turns = sessions.map((session) => session.turnCount);
  const sorted = sortAscending(turns);
  const singleTurnCount = turns.filter((turn) => turn === 1).length;

  const fractions: Record<number, number> = {};
  for (const k of turnCountThresholds) {
    fractions[k] = fractionAtLeast(turns, k);
  }

  return Object.freeze({
    sessionCount: sessions.length,
    meanTurnCount: mean(turns),
    medianTurnCount: quantileSorted(sorted, 0.5),
    p90TurnCount: quantileSorted(sorted, 0.9),
    p95TurnCount: quantileSorted(sorted, 0.95),
    p99TurnCount: quantileSorted(sorted, 0.99),
    turnCountStd: sampleStd(turns),
    singleTurnCount,
    singleTurnFraction: singleTurnCount / sessions.length,
    fractionAtLeast: Object.freeze(fractions),
    meanDurationSec: mean(sessions.map((session) => session.durationSec)),
  });
}
