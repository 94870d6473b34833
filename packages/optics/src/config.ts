/**
 * Unified Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: FOCAL_* (highest priority, for CI overrides)
 * 2. Config files: `focal` key in package.json, .focalrc, focal.config.js, ...
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@focal/optics";
 *
 * config.get("recursion.limit");        // → 256
 * config.set({ recursion: { limit: 64 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
// ============================================================================
// Types
// ============================================================================

/** Recursive optic settings. */
export interface RecursionConfig {
  /** Maximum nesting of a recursive optic */
  limit?: number;
}

/** Full configuration schema. */
export interface FocalConfig {
  /** Log configuration problems to the console */
  debug?: boolean;
  recursion?: RecursionConfig;
  /** Record every dispatch decision in the global tracer */
  tracing?: boolean;
  [key: string]: unknown;
}

/** Each level of recursion costs several stack frames; this depth stays clear of the engine's stack limit. */
const DEFAULT_RECURSION_LIMIT = 256;

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let pendingOverrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let configLoadError: Error | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
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
  let current = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "FOCAL_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   FOCAL_DEBUG=1               → { debug: true }
 *   FOCAL_TRACING=true          → { tracing: true }
 *   FOCAL_RECURSION_LIMIT=64    → { recursion: { limit: 64 } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

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
// Config File Loading
// ============================================================================

const MODULE_NAME = "focal";

function loadConfigFromFiles(debug: boolean): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      throw new TypeError(`${result.filepath} must export an object`);
    }
  } catch (error) {
    configLoadError = error instanceof Error ? error : new Error(String(error));
    if (debug) {
      console.warn(`[focal] Ignoring configuration file: ${configLoadError.message}`);
    }
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: FocalConfig = {
    debug: false,
    recursion: { limit: DEFAULT_RECURSION_LIMIT },
    tracing: false,
  };

  const envConfig = loadConfigFromEnv();
  const fileConfig = loadConfigFromFiles(envConfig.debug === true);

  // defaults < programmatic < file < env
  configStore = deepMerge(
    deepMerge(deepMerge(defaults, pendingOverrides), fileConfig),
    envConfig
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 *
 * Environment variables and config files keep precedence over these values.
 */
function set(values: FocalConfig): void {
  pendingOverrides = deepMerge(pendingOverrides, values);
  configLoaded = false;
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
function getAll(): Readonly<Record<string, unknown>> {
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
 * Get the error raised while reading a config file (if any).
 */
function getLoadError(): Error | undefined {
  initializeConfig();
  return configLoadError;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  pendingOverrides = {};
  configLoaded = false;
  configFilePath = undefined;
  configLoadError = undefined;
}

/**
 * The configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  getLoadError,
  reset,
};

/**
 * Identity helper giving config files type checking.
 *
 * @example
 * ```typescript
 * // focal.config.js
 * import { defineConfig } from "@focal/optics";
 * export default defineConfig({ recursion: { limit: 64 } });
 * ```
 */
export function defineConfig(values: FocalConfig): FocalConfig {
  return values;
}

// ============================================================================
// Typed Accessors
// ============================================================================

/** The configured recursion limit; non-positive or non-integer values fall back to the default. */
export function configuredRecursionLimit(): number {
  const limit = get("recursion.limit");
  return typeof limit === "number" && Number.isInteger(limit) && limit > 0
    ? limit
    : DEFAULT_RECURSION_LIMIT;
}

/** Whether the global tracer starts enabled. */
export function tracingEnabled(): boolean {
  return get("tracing") === true;
}
