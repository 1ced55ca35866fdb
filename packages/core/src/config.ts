/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for kwargs-kit packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: KWARGS_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .kwargsrc(.json|.yaml|.cjs), kwargs.config.cjs, a "kwargs" key in package.json
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@kwargs-kit/core";
 *
 * config.get("debug")        // → boolean
 * config.get("checks")       // → "full" | "none"
 *
 * config.set({ log: { level: "debug" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Severity threshold for log output.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Lines below this level are dropped */
  level?: LogLevel;
}

/**
 * Full kwargs-kit configuration schema.
 */
export interface KwargsConfig {
  /** Enable debug mode (lowers the log threshold to "debug") */
  debug?: boolean;
  /**
   * Programming-error checks at extraction time:
   * - "full": verify output buffers against the schema (default)
   * - "none": skip the checks
   */
  checks?: "full" | "none";
  /** Logging configuration */
  log?: LogConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

type ConfigRecord = Record<string, unknown>;

let fileStore: ConfigRecord = {};
let programmaticStore: ConfigRecord = {};
let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: KwargsConfig = {
  debug: false,
  checks: "full",
  log: {
    level: "warn",
  },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with KWARGS_ are parsed into the config object.
 *
 * Examples:
 *   KWARGS_DEBUG=1           → { debug: true }
 *   KWARGS_CHECKS=none       → { checks: "none" }
 *   KWARGS_LOG__LEVEL=info   → { log: { level: "info" } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};
  const PREFIX = "KWARGS_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/__/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: ConfigRecord = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "kwargs";

/**
 * Load configuration from a config file in the working directory, if there
 * is one. A file that fails to load is reported once and ignored.
 *
 * Script configs are CommonJS only: the sync loader requires them, and a
 * `.js` file is ESM in a `"type": "module"` package.
 */
function loadConfigFromFiles(): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  try {
    const result = explorer.search(process.cwd());
    if (result && !result.isEmpty && isPlainObject(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[kwargs/config] WARN: failed to load config file: ${reason}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function rebuild(): void {
  // Merge: defaults < file < programmatic < env
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, fileStore), programmaticStore), loadConfigFromEnv());
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  fileStore = loadConfigFromFiles();
  rebuild();
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get<T = unknown>(path: string): T | undefined;
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<KwargsConfig>): void {
  initializeConfig();
  programmaticStore = deepMerge(programmaticStore, values);
  rebuild();
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 * Environment variables and config files are read again on next access.
 */
function reset(): void {
  fileStore = {};
  programmaticStore = {};
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: KwargsConfig): KwargsConfig {
  return cfg;
}
