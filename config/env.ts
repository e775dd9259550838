import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 *
 * Analysis settings (SESSION_GAP_THRESHOLD_SEC, WINDOW_BIN_WIDTH_SEC, ...) are
 * read per run through envUtils by src/analysis/analysis-config.
 */

const LOG_LEVEL_NAMES = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

/**
 * Get a required environment variable
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable
 */
function getEnvVarOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === "" ? undefined : value;
}

/**
 * Parse a single numeric value, accepting decimals
 */
function parseNumber(key: string, raw: string): number {
  const parsed = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${raw}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a number
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return parseNumber(key, value);
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Parse a comma-separated list of values
 */
function getEnvVarAsList(key: string, defaultValue?: string[]): string[] {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue ?? [];
  }
  return value.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

/**
 * Parse a comma-separated list of numbers
 */
function getEnvVarAsNumberList(key: string, defaultValue?: number[]): number[] {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue ?? [];
  }
  const items = value.split(",").map((item) => item.trim()).filter((item) => item !== "");
  return items.map((item, index) => {
    const parsed = Number(item);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Environment variable ${key}[${index}] must be a number, got: ${item}`);
    }
    return parsed;
  });
}

/**
 * Check a LOG_LEVEL value against the known level names
 */
function isValidLogLevel(level: string): boolean {
  return LOG_LEVEL_NAMES.some((name) => name === level.toLowerCase());
}

/**
 * All environment configuration
 */
export const env = {
  // Application
  NODE_ENV: getEnvVar("NODE_ENV", "development"),
  isDevelopment: getEnvVar("NODE_ENV", "development") === "development",
  isProduction: getEnvVar("NODE_ENV", "development") === "production",
  isTest: getEnvVar("NODE_ENV", "development") === "test",

  // Logging
  LOG_LEVEL: getEnvVarOptional("LOG_LEVEL"),
  LOG_PRETTY: getEnvVarAsBoolean("LOG_PRETTY", true),
} as const;

export type Env = typeof env;

/**
 * Log the current configuration
 */
export function logConfig(): void {
  const config = {
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL ?? "(default)",
    LOG_PRETTY: env.LOG_PRETTY,
  };

  console.log("=".repeat(60));
  console.log("Environment Configuration:");
  console.log("=".repeat(60));
  for (const [key, value] of Object.entries(config)) {
    console.log(`  ${key}: ${value}`);
  }
  console.log("=".repeat(60));
}

/**
 * Validate that the environment is properly configured
 */
export function validateEnv(): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (env.LOG_LEVEL !== undefined && !isValidLogLevel(env.LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVEL_NAMES.join(", ")}, got: ${env.LOG_LEVEL}`);
  }

  if (env.isProduction && env.LOG_PRETTY) {
    warnings.push("LOG_PRETTY is on in production - log lines will not be JSON");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate the environment and throw on errors
 */
export function validateEnvOrThrow(): void {
  const validation = validateEnv();

  if (validation.warnings.length > 0 && !env.isTest) {
    console.log("\nConfiguration Warnings:");
    for (const warning of validation.warnings) {
      console.log(`  ⚠️  ${warning}`);
    }
  }

  if (validation.errors.length > 0) {
    console.error("\nConfiguration Errors:");
    for (const error of validation.errors) {
      console.error(`  ❌  ${error}`);
    }
    throw new Error(`Environment validation failed with ${validation.errors.length} error(s)`);
  }
}

// Export utility functions for testing
export const envUtils = {
  getEnvVar,
  getEnvVarAsNumber,
  getEnvVarAsBoolean,
  getEnvVarAsList,
  getEnvVarAsNumberList,
  isValidLogLevel,
};
