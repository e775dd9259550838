/**
 * Tests for analysis configuration resolution
 */

import { describe, it, expect, afterEach } from "vitest";
import {
  DEFAULT_ANALYSIS_CONFIG,
  ENV_VARS,
  loadConfigFromEnv,
  resolveAnalysisConfig,
  validateAnalysisEnv,
  type AnalysisConfigInput,
} from "../../src/analysis/analysis-config";
import { InvalidParameterError } from "../../src/analysis/errors";

const originalEnv = { ...process.env };

describe("analysis-config", () => {
  afterEach(() => {
    for (const key of Object.values(ENV_VARS)) {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    }
  });

  describe("resolveAnalysisConfig", () => {
    it("should return the defaults without input", () => {
      expect(resolveAnalysisConfig({}, { useEnv: false })).toEqual({
        gapThresholdSec: 1800,
        binWidthSec: 3600,
        minSessionCountPerBin: 100,
        durationModelMultipliers: [10, 30],
        turnCountThresholds: [2, 3],
        sensitivityGapThresholdsSec: [900, 1800, 3600],
        quantiles: [0.9, 0.95],
        minWindowsPerDay: 6,
        segmentableKinds: ["Conversation log", "conversation", "conversational"],
      });
    });

    it("should apply explicit overrides and ignore undefined values", () => {
      const config = resolveAnalysisConfig(
        { gapThresholdSec: 900, binWidthSec: undefined },
        { useEnv: false }
      );
      expect(config.gapThresholdSec).toBe(900);
      expect(config.binWidthSec).toBe(3600);
    });

    it("should copy list options so callers cannot mutate the defaults", () => {
      const config = resolveAnalysisConfig({}, { useEnv: false });
      config.quantiles.push(0.5);
      expect(DEFAULT_ANALYSIS_CONFIG.quantiles).toEqual([0.9, 0.95]);
    });

    it("should read environment overrides", () => {
      process.env[ENV_VARS.BIN_WIDTH_SEC] = "1800";
      expect(resolveAnalysisConfig().binWidthSec).toBe(1800);
    });

    it("should let explicit input win over the environment", () => {
      process.env[ENV_VARS.GAP_THRESHOLD_SEC] = "60";
      expect(resolveAnalysisConfig({ gapThresholdSec: 120 }).gapThresholdSec).toBe(120);
    });

    it("should reject out-of-range options", () => {
      const invalidInputs: AnalysisConfigInput[] = [
        { gapThresholdSec: 0 },
        { binWidthSec: -3600 },
        { minSessionCountPerBin: -1 },
        { durationModelMultipliers: [] },
        { turnCountThresholds: [2, 0] },
        { sensitivityGapThresholdsSec: [] },
        { quantiles: [1.2] },
        { minWindowsPerDay: 1 },
        { segmentableKinds: [] },
      ];
      for (const input of invalidInputs) {
        expect(() => resolveAnalysisConfig(input, { useEnv: false })).toThrow(InvalidParameterError);
      }
    });
  });

  describe("loadConfigFromEnv", () => {
    it("should return an empty object when nothing is set", () => {
      for (const key of Object.values(ENV_VARS)) {
        delete process.env[key];
      }
      expect(loadConfigFromEnv()).toEqual({});
    });

    it("should parse number lists and kind lists", () => {
      process.env[ENV_VARS.DURATION_MODEL_MULTIPLIERS] = "5, 15";
      process.env[ENV_VARS.SEGMENTABLE_KINDS] = "chat, message,";
      const config = loadConfigFromEnv();
      expect(config.durationModelMultipliers).toEqual([5, 15]);
      expect(config.segmentableKinds).toEqual(["chat", "message"]);
    });

    it("should throw InvalidParameterError for a non-numeric value", () => {
      process.env[ENV_VARS.MIN_SESSION_COUNT_PER_BIN] = "many";
      expect(() => loadConfigFromEnv()).toThrow(InvalidParameterError);
    });

    it("should report the env getter's reason for a bad list entry", () => {
      process.env[ENV_VARS.SENSITIVITY_GAP_THRESHOLDS_SEC] = "900,soon";
      expect(() => loadConfigFromEnv()).toThrow(
        "Environment variable SENSITIVITY_GAP_THRESHOLDS_SEC[1] must be a number, got: soon"
      );
    });

    it("should read sensitivity gaps from the environment", () => {
      process.env[ENV_VARS.SENSITIVITY_GAP_THRESHOLDS_SEC] = "600, 1200";
      expect(loadConfigFromEnv().sensitivityGapThresholdsSec).toEqual([600, 1200]);
    });

    it("should treat a blank value as unset", () => {
      process.env[ENV_VARS.GAP_THRESHOLD_SEC] = "   ";
      expect(loadConfigFromEnv().gapThresholdSec).toBeUndefined();
    });
  });

  describe("validateAnalysisEnv", () => {
    it("should accept an environment without overrides", () => {
      for (const key of Object.values(ENV_VARS)) {
        delete process.env[key];
      }
      expect(validateAnalysisEnv()).toEqual({ valid: true, errors: [] });
    });

    it("should reject an empty threshold list the same way the resolver does", () => {
      process.env[ENV_VARS.TURN_COUNT_THRESHOLDS] = ",";
      expect(() => resolveAnalysisConfig()).toThrow(InvalidParameterError);

      const result = validateAnalysisEnv();
      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toContain("turnCountThresholds");
    });

    it("should reject a non-positive sensitivity gap", () => {
      process.env[ENV_VARS.SENSITIVITY_GAP_THRESHOLDS_SEC] = "900,0";
      expect(validateAnalysisEnv().valid).toBe(false);
    });
  });
});
