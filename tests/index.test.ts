import { describe, it, expect, vi, afterEach } from "vitest";
import {
  APP_NAME,
  VERSION,
  EventKind,
  analyzeTrace,
  normalizeTrace,
  resolveAnalysisConfig,
  validateEnv,
} from "../src/index";

describe("Index Module", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should export APP_NAME constant", () => {
    expect(APP_NAME).toBe("Trace Analytics");
  });

  it("should export VERSION constant", () => {
    expect(VERSION).toBe("1.0.0");
  });

  it("should re-export the analysis pipeline", () => {
    expect(typeof analyzeTrace).toBe("function");
    expect(typeof resolveAnalysisConfig).toBe("function");
    expect(normalizeTrace([{ timestamp: 1, kind: "tool_call" }]).events[0]?.kind).toBe(
      EventKind.OTHER
    );
  });

  it("should re-export environment validation", () => {
    expect(typeof validateEnv().valid).toBe("boolean");
  });
});
