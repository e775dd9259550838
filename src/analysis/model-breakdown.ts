/**
 * Model Breakdown
 *
 * Session depth per serving model, for traces whose records name one.
 * Sessions without a model are left out; models are ordered by name.
 */

import { mean, quantileSorted, sortAscending } from "./statistics";
import type { Session } from "./types";

export interface ModelSummary {
  model: string;
  sessionCount: number;
  turnMean: number;
  turnMedian: number;
  /** Mean of contextLength / turnCount over sessions that carry a context length */
  wordsPerTurnMean: number | null;
}

export interface ModelBreakdown {
  models: readonly ModelSummary[];
  /** Mean words per turn over every session with a context length, any model */
  wordsPerTurnMean: number | null;
}

function wordsPerTurn(sessions: readonly Session[]): number | null {
  const ratios: number[] = [];
  for (const session of sessions) {
    if (session.contextLength !== undefined) {
      ratios.push(session.contextLength / session.turnCount);
    }
  }
  return ratios.length > 0 ? mean(ratios) : null;
}

/**
 * Summarize sessions per model
 */
export function summarizeByModel(sessions: readonly Session[]): ModelBreakdown {
  const byModel = new Map<string, Session[]>();
  for (const session of sessions) {
    if (session.model === undefined) continue;
    const bucket = byModel.get(session.model);
    if (bucket) {
      bucket.push(session);
    } else {
      byModel.set(session.model, [session]);
    }
  }

  const models = [...byModel.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([model, group]) => {
      const turns = group.map((session) => session.turnCount);
      return Object.freeze({
        model,
        sessionCount: group.length,
        turnMean: mean(turns),
        turnMedian: quantileSorted(sortAscending(turns), 0.5),
        wordsPerTurnMean: wordsPerTurn(group),
      });
    });

  return Object.freeze({
    models: Object.freeze(models),
    wordsPerTurnMean: wordsPerTurn(sessions),
  });
}
