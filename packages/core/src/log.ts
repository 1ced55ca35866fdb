/**
 * Console logging for kwargs-kit packages.
 *
 * Lines are prefixed with `[kwargs/<scope>]` and the level, and dropped when
 * they fall below the configured `log.level`. Setting `debug` in config
 * lowers the threshold to "debug".
 *
 * @example
 * ```typescript
 * const log = createLogger("keywords");
 * log.debug("extracted 2/3 keywords");
 * // [kwargs/keywords] DEBUG: extracted 2/3 keywords
 * ```
 */

import { config, type LogLevel } from "./config.js";

/** Levels that can be emitted; "silent" is only a threshold. */
export type LogSeverity = Exclude<LogLevel, "silent">;

const SEVERITY_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  /** Fixed threshold; when omitted the threshold is read from config on each call */
  level?: LogLevel;
  /** Custom writer function (default: the console method matching the level) */
  writer?: (line: string, severity: LogSeverity) => void;
}

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Whether a line at this severity would currently be written. */
  enabled(severity: LogSeverity): boolean;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

/**
 * Current threshold from config.
 */
export function configuredLogLevel(): LogLevel {
  if (config.get<boolean>("debug") === true) return "debug";
  const level = config.get("log.level");
  return isLogLevel(level) ? level : "warn";
}

function consoleWriter(line: string, severity: LogSeverity): void {
  switch (severity) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleWriter;
  const prefix = `[kwargs/${scope}]`;

  const enabled = (severity: LogSeverity): boolean => {
    const threshold = options.level ?? configuredLogLevel();
    return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
  };

  const emit = (severity: LogSeverity, message: string): void => {
    if (!enabled(severity)) return;
    writer(`${prefix} ${severity.toUpperCase()}: ${message}`, severity);
  };

  return {
    scope,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    enabled,
  };
}
