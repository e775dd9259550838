/**
 * Arrival Process
 *
 * Inter-arrival gaps and arrival-rate variability of the event table.
 */

import { EmptyInputError } from "./errors";
import { hourOfDay } from "./hour-of-day-aggregator";
import { mean, positiveModulo, quantileSorted, sampleStd, sortAscending } from "./statistics";
import { SECONDS_PER_DAY, SECONDS_PER_HOUR, SECONDS_PER_MINUTE, type TraceEvent } from "./types";
import { binStartOf } from "./window-aggregator";

export interface InterArrivalStats {
  /** Number of strictly positive gaps */
  gapCount: number;
  mean: number;
  median: number;
  p95: number;
  min: number;
  max: number;
}

export interface ArrivalProcessSummary {
  eventCount: number;
  /** Null when no two events are at distinct times */
  interArrival: InterArrivalStats | null;
  /** Mean arrivals per observed 1-minute bin */
  arrivalsPerMinuteMean: number;
  /** Mean arrivals per observed 1-hour bin */
  arrivalsPerHourMean: number;
  /** Sample std of arrivals per observed 1-hour bin */
  arrivalsPerHourStd: number | null;
  /** Sample std of total arrivals across the hours of day that have events */
  arrivalsByHourOfDayStd: number | null;
  /** Sample std of total arrivals across the weekdays that have events */
  arrivalsByDayOfWeekStd: number | null;
}

/**
 * UTC day of week, Monday = 0 ... Sunday = 6 (1970-01-01 was a Thursday)
 */
export function dayOfWeek(timestamp: number): number {
  return positiveModulo(Math.floor(timestamp / SECONDS_PER_DAY) + 3, 7);
}

function countBy(events: readonly TraceEvent[], keyOf: (event: TraceEvent) => number): number[] {
  const counts = new Map<number, number>();
  for (const event of events) {
    const key = keyOf(event);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.values()];
}

/**
 * Positive gaps between consecutive events (zero gaps from ties are skipped)
 */
export function computeInterArrival(events: readonly TraceEvent[]): InterArrivalStats | null {
  const gaps: number[] = [];
  for (let i = 1; i < events.length; i++) {
    const previous = events[i - 1];
    const current = events[i];
    if (!previous || !current) continue;
    const gap = current.timestamp - previous.timestamp;
    if (gap > 0) gaps.push(gap);
  }
  if (gaps.length === 0) return null;

  const sorted = sortAscending(gaps);
  return Object.freeze({
    gapCount: gaps.length,
    mean: mean(gaps),
    median: quantileSorted(sorted, 0.5),
    p95: quantileSorted(sorted, 0.95),
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
  });
}

/**
 * Summarize arrivals of a time-ordered event table
 */
export function summarizeArrivals(events: readonly TraceEvent[]): ArrivalProcessSummary {
  if (events.length === 0) {
    throw new EmptyInputError("Cannot summarize arrivals of an empty event table");
  }

  const perMinute = countBy(events, (event) => binStartOf(event.timestamp, SECONDS_PER_MINUTE));
  const perHour = countBy(events, (event) => binStartOf(event.timestamp, SECONDS_PER_HOUR));
  const perHourOfDay = countBy(events, (event) => hourOfDay(event.timestamp));
  const perDayOfWeek = countBy(events, (event) => dayOfWeek(event.timestamp));

  return Object.freeze({
    eventCount: events.length,
    interArrival: computeInterArrival(events),
    arrivalsPerMinuteMean: mean(perMinute),
    arrivalsPerHourMean: mean(perHour),
    arrivalsPerHourStd: sampleStd(perHour),
    arrivalsByHourOfDayStd: sampleStd(perHourOfDay),
    arrivalsByDayOfWeekStd: sampleStd(perDayOfWeek),
  });
}
