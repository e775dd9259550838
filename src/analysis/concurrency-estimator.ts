/**
 * Concurrency Estimator
 *
 * Model-based concurrent-session load. Each session is assumed active on
 *   [endTime - turnCount * K, endTime]
 * for a seconds-per-turn multiplier K. This is synthetic; the trace has no
 * observed session start times.
 *
 * Sweep line: one (+1) event at each start and one (-1) event just after each
 * end. An end sorts after every start at the same instant, so intervals that
 * touch at a point both count as active there (closed intervals).
 *
 * Mean and median are time-weighted over the step function: each plateau
 * counts for the time it lasts. The event-indexed mean/median (one sample per
 * sweep event) are reported alongside as an approximation; they under-weight
 * long stable plateaus.
 */

import { serviceLoggers } from "../utils/logger";
import { EmptyInputError, assertPositive, assertPositiveList } from "./errors";
import { mean, quantile } from "./statistics";
import type { ConcurrencyEvent, Session } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * Concurrency summary for one duration model
 */
export interface ConcurrencySummary {
  /** Duration model label, e.g. "10s" for 10 seconds per turn */
  label: string;
  multiplierSec: number;
  sessionCount: number;
  /** Maximum number of simultaneously active sessions */
  peak: number;
  /** First time the peak is reached */
  peakTime: number;
  /** Time-weighted mean level between the first and last sweep event */
  mean: number;
  /** Time-weighted median level */
  median: number;
  /** Mean over sweep events (approximation) */
  eventIndexedMean: number;
  /** Median over sweep events (approximation) */
  eventIndexedMedian: number;
  /** Time between the first and last sweep event */
  spanSec: number;
}

/**
 * Level after each sweep event
 */
export interface ConcurrencyStep {
  time: number;
  level: number;
}

// ============================================================================
// Sweep
// ============================================================================

/**
 * Format a duration-model label from its multiplier
 */
export function durationModelLabel(multiplierSec: number): string {
  return `${multiplierSec}s`;
}

/**
 * Build the sorted sweep events for a duration model.
 * Ends are stored at their interval end; ordering places them after any start at the same time.
 */
export function buildConcurrencyEvents(
  sessions: readonly Session[],
  multiplierSec: number
): readonly ConcurrencyEvent[] {
  assertPositive("durationModelMultiplier", multiplierSec);
  if (sessions.length === 0) {
    throw new EmptyInputError("Cannot estimate concurrency for an empty session table");
  }

  const events: ConcurrencyEvent[] = [];
  for (const session of sessions) {
    const duration = session.turnCount * multiplierSec;
    events.push({ time: session.endTime - duration, delta: 1 });
    events.push({ time: session.endTime, delta: -1 });
  }

  // Starts (+1) before ends (-1) at equal times: the end carries an infinitesimal offset
  events.sort((a, b) => a.time - b.time || b.delta - a.delta);

  return Object.freeze(events);
}

/**
 * Running prefix sum of the sweep events
 */
export function sweepConcurrency(events: readonly ConcurrencyEvent[]): readonly ConcurrencyStep[] {
  let level = 0;
  return events.map((event) => {
    level += event.delta;
    return { time: event.time, level };
  });
}

/**
 * Time-weighted mean and median of a step function
 */
function timeWeightedStats(steps: readonly ConcurrencyStep[]): {
  mean: number;
  median: number;
  spanSec: number;
} | null {
  const first = steps[0];
  const last = steps[steps.length - 1];
  if (!first || !last) return null;

  const spanSec = last.time - first.time;
  if (!(spanSec > 0)) return null;

  const timeAtLevel = new Map<number, number>();
  let weighted = 0;
  for (let i = 0; i < steps.length - 1; i++) {
    const current = steps[i];
    const next = steps[i + 1];
    if (!current || !next) continue;
    const duration = next.time - current.time;
    if (duration <= 0) continue;
    weighted += current.level * duration;
    timeAtLevel.set(current.level, (timeAtLevel.get(current.level) ?? 0) + duration);
  }

  const levels = [...timeAtLevel.keys()].sort((a, b) => a - b);
  const half = spanSec / 2;
  let cumulative = 0;
  let median = levels[levels.length - 1] ?? 0;
  for (const level of levels) {
    cumulative += timeAtLevel.get(level) ?? 0;
    if (cumulative >= half) {
      median = level;
      break;
    }
  }

  return { mean: weighted / spanSec, median, spanSec };
}

// ============================================================================
// Estimation
// ============================================================================

/**
 * Estimate concurrency for one seconds-per-turn multiplier
 */
export function estimateConcurrency(
  sessions: readonly Session[],
  multiplierSec: number
): ConcurrencySummary {
  const steps = sweepConcurrency(buildConcurrencyEvents(sessions, multiplierSec));

  let peak = 0;
  let peakTime = steps[0]?.time ?? 0;
  const levels: number[] = new Array<number>(steps.length);
  steps.forEach((step, i) => {
    levels[i] = step.level;
    if (step.level > peak) {
      peak = step.level;
      peakTime = step.time;
    }
  });

  const eventIndexedMean = mean(levels);
  const eventIndexedMedian = quantile(levels, 0.5);
  const weighted = timeWeightedStats(steps);

  const summary: ConcurrencySummary = Object.freeze({
    label: durationModelLabel(multiplierSec),
    multiplierSec,
    sessionCount: sessions.length,
    peak,
    peakTime,
    mean: weighted?.mean ?? eventIndexedMean,
    median: weighted?.median ?? eventIndexedMedian,
    eventIndexedMean,
    eventIndexedMedian,
    spanSec: weighted?.spanSec ?? 0,
  });

  serviceLoggers.concurrency.debug("Estimated concurrency", {
    label: summary.label,
    peak: summary.peak,
    mean: summary.mean,
  });

  return summary;
}

/**
 * Estimate concurrency for each duration model, in the order given
 */
export function estimateConcurrencyForModels(
  sessions: readonly Session[],
  multipliersSec: readonly number[]
): readonly ConcurrencySummary[] {
  assertPositiveList("durationModelMultipliers", multipliersSec);
  return Object.freeze(multipliersSec.map((k) => estimateConcurrency(sessions, k)));
}
