/**
 * Tests for TimestampNormalizer
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  MISSING_SESSION_ID,
  TimestampNormalizer,
  coerceSessionId,
  normalizeTrace,
  parseContextLength,
  parseTimestamp,
  parseTurnCount,
} from "../../src/analysis/timestamp-normalizer";
import { EmptyInputError, InvalidParameterError } from "../../src/analysis/errors";
import { EventKind, type RawTraceRecord } from "../../src/analysis/types";

describe("TimestampNormalizer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("parseTimestamp", () => {
    it("should accept epoch seconds as numbers and numeric strings", () => {
      expect(parseTimestamp(1700000000)).toBe(1700000000);
      expect(parseTimestamp(" 1700000000.5 ")).toBe(1700000000.5);
    });

    it("should convert ISO strings and Dates to epoch seconds", () => {
      expect(parseTimestamp("2024-01-01T00:00:00Z")).toBe(1704067200);
      expect(parseTimestamp(new Date(1500))).toBe(1.5);
    });

    it("should return null for unusable values", () => {
      expect(parseTimestamp(null)).toBeNull();
      expect(parseTimestamp(undefined)).toBeNull();
      expect(parseTimestamp("")).toBeNull();
      expect(parseTimestamp("yesterday-ish")).toBeNull();
      expect(parseTimestamp(Number.NaN)).toBeNull();
      expect(parseTimestamp(Infinity)).toBeNull();
      expect(parseTimestamp(new Date("invalid"))).toBeNull();
    });
  });

  describe("parseTurnCount", () => {
    it("should accept positive integers as numbers and numeric strings", () => {
      expect(parseTurnCount(4)).toBe(4);
      expect(parseTurnCount(" 2 ")).toBe(2);
    });

    it("should reject fractions, zero and non-numeric strings", () => {
      expect(parseTurnCount(2.5)).toBeNull();
      expect(parseTurnCount(0)).toBeNull();
      expect(parseTurnCount("many")).toBeNull();
    });
  });

  describe("parseContextLength", () => {
    it("should accept non-negative numbers", () => {
      expect(parseContextLength("0")).toBe(0);
      expect(parseContextLength(125.5)).toBe(125.5);
    });

    it("should reject negative and non-finite values", () => {
      expect(parseContextLength(-1)).toBeNull();
      expect(parseContextLength(Infinity)).toBeNull();
      expect(parseContextLength("")).toBeNull();
    });
  });

  describe("coerceSessionId", () => {
    it("should truncate numeric ids", () => {
      expect(coerceSessionId(3.7)).toBe(3);
      expect(coerceSessionId("5")).toBe(5);
    });

    it("should map missing or unparsable ids to the sentinel", () => {
      expect(coerceSessionId(null)).toBe(MISSING_SESSION_ID);
      expect(coerceSessionId(undefined)).toBe(MISSING_SESSION_ID);
      expect(coerceSessionId("abc")).toBe(MISSING_SESSION_ID);
      expect(MISSING_SESSION_ID).toBe(-1);
    });
  });

  describe("classifyKind", () => {
    const normalizer = new TimestampNormalizer();

    it("should treat absent kinds as conversational", () => {
      expect(normalizer.classifyKind(undefined)).toBe(EventKind.CONVERSATIONAL);
      expect(normalizer.classifyKind(null)).toBe(EventKind.CONVERSATIONAL);
    });

    it("should match the default kinds case-insensitively", () => {
      expect(normalizer.classifyKind("Conversation log")).toBe(EventKind.CONVERSATIONAL);
      expect(normalizer.classifyKind(" CONVERSATION ")).toBe(EventKind.CONVERSATIONAL);
    });

    it("should classify other kinds as OTHER", () => {
      expect(normalizer.classifyKind("tool_call")).toBe(EventKind.OTHER);
    });

    it("should use configured kinds", () => {
      const custom = new TimestampNormalizer({ segmentableKinds: ["chat"] });
      expect(custom.classifyKind("Chat")).toBe(EventKind.CONVERSATIONAL);
      expect(custom.classifyKind("conversation")).toBe(EventKind.OTHER);
    });

    it("should classify a non-string kind as a marker", () => {
      expect(normalizer.classifyKind(42)).toBe(EventKind.OTHER);
      expect(normalizer.classifyKind({ type: "conversation" })).toBe(EventKind.OTHER);
    });

    it("should reject an empty kind list", () => {
      expect(() => new TimestampNormalizer({ segmentableKinds: [] })).toThrow(
        InvalidParameterError
      );
    });
  });

  describe("normalize", () => {
    const records: RawTraceRecord[] = [
      { timestamp: 300 },
      { timestamp: "not a time" },
      { timestamp: 100 },
      { timestamp: 100, kind: "tool_call" },
      { timestamp: null },
    ];

    it("should drop unusable records and sort stably by timestamp", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const { events, explicitSessionIds } = normalizeTrace(records);

      expect(events.map((event) => event.index)).toEqual([2, 3, 0]);
      expect(events.map((event) => event.timestamp)).toEqual([100, 100, 300]);
      expect(events.map((event) => event.kind)).toEqual([
        EventKind.CONVERSATIONAL,
        EventKind.OTHER,
        EventKind.CONVERSATIONAL,
      ]);
      expect(explicitSessionIds).toBeNull();
    });

    it("should report what was kept and dropped", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const { report } = normalizeTrace(records);

      expect(report).toEqual({
        inputCount: 5,
        validCount: 3,
        droppedCount: 2,
        minTimestamp: 100,
        maxTimestamp: 300,
        spanDays: 200 / 86400,
        duplicateTimestampCount: 2,
        wasSorted: false,
        conversationalCount: 2,
        otherCount: 1,
        invalidAttributeCount: 0,
      });
    });

    it("should warn once about dropped records", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      normalizeTrace(records);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("should report sorted input", () => {
      const { report } = normalizeTrace([{ timestamp: 1 }, { timestamp: 2 }, { timestamp: 2 }]);
      expect(report.wasSorted).toBe(true);
      expect(report.droppedCount).toBe(0);
    });

    it("should carry explicit session ids aligned with the sorted events", () => {
      const { events, explicitSessionIds } = normalizeTrace([
        { timestamp: 20, explicitSessionId: "7" },
        { timestamp: 10, explicitSessionId: null },
      ]);

      expect(events.map((event) => event.timestamp)).toEqual([10, 20]);
      expect(explicitSessionIds).toEqual([-1, 7]);
    });

    it("should keep records whose kind is not a string", () => {
      const { events } = normalizeTrace([{ timestamp: 0, kind: 7 }, { timestamp: 5 }]);
      expect(events.map((event) => event.kind)).toEqual([
        EventKind.OTHER,
        EventKind.CONVERSATIONAL,
      ]);
    });

    it("should carry valid turn counts, context lengths and models", () => {
      const { events, report } = normalizeTrace([
        { timestamp: 10, turnCount: "3", contextLength: 120, model: " model-a " },
      ]);

      expect(events).toEqual([
        {
          index: 0,
          timestamp: 10,
          kind: EventKind.CONVERSATIONAL,
          turnCount: 3,
          contextLength: 120,
          model: "model-a",
        },
      ]);
      expect(report.invalidAttributeCount).toBe(0);
    });

    it("should drop and count malformed attributes but keep the record", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { events, report } = normalizeTrace([
        { timestamp: 20, turnCount: 0, contextLength: "-5", model: 7 },
        { timestamp: 30, turnCount: null, contextLength: null, model: null },
      ]);

      expect(events).toEqual([
        { index: 0, timestamp: 20, kind: EventKind.CONVERSATIONAL },
        { index: 1, timestamp: 30, kind: EventKind.CONVERSATIONAL },
      ]);
      expect(report.invalidAttributeCount).toBe(3);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("should not modify the input records", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      const input: RawTraceRecord[] = [{ timestamp: 2 }, { timestamp: 1 }];
      normalizeTrace(input);
      expect(input).toEqual([{ timestamp: 2 }, { timestamp: 1 }]);
    });

    it("should throw EmptyInputError when no record is usable", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(() => normalizeTrace([{ timestamp: "x" }, { timestamp: undefined }])).toThrow(
        EmptyInputError
      );
      expect(() => normalizeTrace([])).toThrow(EmptyInputError);
    });
  });
});
