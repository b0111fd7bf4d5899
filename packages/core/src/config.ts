/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: HODATA_* (for CI overrides)
 * 3. Config files: package.json#hodata, .hodatarc, hodata.config.js, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@hodata/core";
 *
 * config.get("debug");            // → boolean
 * config.flag("trace");           // → boolean, false if misconfigured
 * config.get("pairing.mismatch"); // → "error" | "truncate"
 *
 * config.set({ pairing: { mismatch: "truncate" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What pairwise transposition does with two arrays of different lengths.
 * `"error"` rejects them; `"truncate"` keeps the common prefix.
 */
export type PairingMismatch = "error" | "truncate";

/**
 * Configuration schema, as written in config files and passed to `set()`.
 */
export interface HodataConfig {
  /** Write debug log lines through the logger */
  debug?: boolean;
  /** Record dispatch events in the global tracer */
  trace?: boolean;
  /** Pairwise transposition options */
  pairing?: {
    mismatch?: PairingMismatch;
  };
}

/**
 * Resolved values, keyed by dot path.
 */
export interface ConfigValues {
  debug: boolean;
  trace: boolean;
  "pairing.mismatch": PairingMismatch;
}

export type ConfigPath = keyof ConfigValues;

/** Paths holding on/off switches for diagnostics. */
export type FlagPath = "debug" | "trace";

type ConfigTree = Record<string, unknown>;

const DEFAULTS: ConfigValues = {
  debug: false,
  trace: false,
  "pairing.mismatch": "error",
};

const VALIDATORS: { [P in ConfigPath]: (value: unknown) => value is ConfigValues[P] } = {
  debug: (value): value is boolean => typeof value === "boolean",
  trace: (value): value is boolean => typeof value === "boolean",
  "pairing.mismatch": (value): value is PairingMismatch =>
    value === "error" || value === "truncate",
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigTree = {};
let configLoaded = false;
let configFilePath: string | undefined;
const warnedFlags = new Set<FlagPath>();

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigTree, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
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
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
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

const ENV_PREFIX = "HODATA_";

/**
 * Load configuration from environment variables.
 *
 *   HODATA_DEBUG=1                  → { debug: true }
 *   HODATA_PAIRING_MISMATCH=truncate → { pairing: { mismatch: "truncate" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigTree {
  const envConfig: ConfigTree = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
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

const MODULE_NAME = "hodata";

function loadConfigFromFiles(): ConfigTree {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("", `Failed to load ${MODULE_NAME} configuration: ${reason}`);
  }

  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError("", `${result.filepath}: configuration must be an object`);
  }

  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  configStore = deepMerge(fileConfig, envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path, falling back to its default.
 *
 * @throws ConfigError if the stored value has the wrong type
 */
function get<P extends ConfigPath>(path: P): ConfigValues[P] {
  initializeConfig();
  const value = getNestedValue(configStore, path);
  if (value === undefined) return DEFAULTS[path];

  const isValid: (candidate: unknown) => candidate is ConfigValues[P] = VALIDATORS[path];
  if (!isValid(value)) {
    throw new ConfigError(path, `Invalid value for '${path}': ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Read a diagnostics switch. A value that fails to load or validate turns
 * the switch off, with one warning per path until `reset()`, so tracing
 * and logging never make a dispatch throw.
 */
function flag(path: FlagPath): boolean {
  try {
    return get(path);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    if (!warnedFlags.has(path)) {
      warnedFlags.add(path);
      console.warn(`[hodata] '${path}' is off: ${error.message}`);
    }
    return false;
  }
}

/**
 * Set configuration values programmatically.
 */
function set(values: HodataConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, { ...values });
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: ConfigPath): boolean {
  return !!get(path);
}

/**
 * Get every resolved configuration value.
 */
function getAll(): Readonly<ConfigValues> {
  return {
    debug: get("debug"),
    trace: get("trace"),
    "pairing.mismatch": get("pairing.mismatch"),
  };
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  warnedFlags.clear();
}

export const config = {
  get,
  flag,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};
