/**
 * @kwargs-kit/core — shared configuration and logging.
 *
 * @packageDocumentation
 */

export { config, defineConfig } from "./config.js";
export type { KwargsConfig, LogConfig, LogLevel } from "./config.js";

export { createLogger, configuredLogLevel } from "./log.js";
export type { Logger, LoggerOptions, LogSeverity } from "./log.js";
