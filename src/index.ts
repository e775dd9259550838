/**
 * Trace Analytics
 * Main entry point
 */

export const APP_NAME = "Trace Analytics";
export const VERSION = "1.0.0";

export * from "./analysis";

export { logger, createLogger, createServiceLogger, createRunLogger } from "./utils/logger";
export type { Logger, LogLevel, LogContext } from "./utils/logger";

export { env, validateEnv, validateEnvOrThrow, logConfig } from "../config/env";
