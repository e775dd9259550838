/**
 * Tests for the per-model session breakdown
 */

import { describe, it, expect } from "vitest";
import { summarizeByModel } from "../../src/analysis/model-breakdown";
import type { Session } from "../../src/analysis/types";

// ============================================================================
// Test Data Helpers
// ============================================================================

function session(id: number, turnCount: number, extra: Partial<Session> = {}): Session {
  return { id, startTime: id * 60, endTime: id * 60, turnCount, durationSec: 0, ...extra };
}

const sessions: Session[] = [
  session(0, 4, { model: "model-b", contextLength: 200 }),
  session(1, 2, { model: "model-a", contextLength: 100 }),
  session(2, 1, { model: "model-b" }),
  session(3, 3, { contextLength: 30 }),
];

// ============================================================================
// Tests
// ============================================================================

describe("summarizeByModel", () => {
  it("should group sessions by model in name order", () => {
    const { models } = summarizeByModel(sessions);

    expect(models.map((entry) => [entry.model, entry.sessionCount])).toEqual([
      ["model-a", 1],
      ["model-b", 2],
    ]);
  });

  it("should report turn mean and median per model", () => {
    const [, modelB] = summarizeByModel(sessions).models;

    expect(modelB?.turnMean).toBe(2.5);
    expect(modelB?.turnMedian).toBe(2.5);
  });

  it("should average words per turn over sessions with a context length", () => {
    const breakdown = summarizeByModel(sessions);

    expect(breakdown.models.map((entry) => entry.wordsPerTurnMean)).toEqual([50, 50]);
    expect(breakdown.wordsPerTurnMean).toBeCloseTo(110 / 3, 10);
  });

  it("should report nothing for sessions without models or context", () => {
    expect(summarizeByModel([session(0, 2)])).toEqual({ models: [], wordsPerTurnMean: null });
  });
});
