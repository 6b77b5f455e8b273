/**
 * Configuration
 *
 * Settings are loaded lazily on first access, from (in priority order):
 *
 * 1. Environment variables: SEQKIT_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .seqkitrc, .seqkitrc.json, seqkit.config.js, etc.
 * 4. package.json: "seqkit" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@seqkit/core";
 *
 * config.get("debug")               // → boolean
 * config.get("equality.strategy")   // → "auto" | "linear"
 *
 * config.set({ equality: { strategy: "linear" } });
 * ```
 *
 * @example Config file (.seqkitrc.json)
 * ```json
 * { "debug": true, "equality": { "strategy": "linear" } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How `enumerableEqual` buffers unmatched elements for a custom comparer.
 * `"auto"` buckets by hash when the comparer implements `Hash`;
 * `"linear"` always scans.
 */
export type EqualityStrategy = "auto" | "linear";

export interface EqualityConfig {
  strategy?: EqualityStrategy;
}

export interface SeqkitConfig {
  /** Print debug log lines */
  debug?: boolean;
  equality?: EqualityConfig;
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let overrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "seqkit";
const ENV_PREFIX = "SEQKIT_";

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

function loadConfigFromFiles(): Record<string, unknown> {
  try {
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

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Variables prefixed with SEQKIT_ are parsed into the config object.
 *
 *   SEQKIT_DEBUG=1                   → { debug: true }
 *   SEQKIT_EQUALITY_STRATEGY=linear  → { equality: { strategy: "linear" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

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
  source: Record<string, unknown>,
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
// Config Initialization
// ============================================================================

const DEFAULTS: SeqkitConfig = {
  debug: false,
  equality: {
    strategy: "auto",
  },
};

function rebuild(fileConfig: Record<string, unknown>): void {
  // defaults < file < programmatic < env
  configStore = deepMerge(
    deepMerge(deepMerge(DEFAULTS, fileConfig), overrides),
    loadConfigFromEnv(),
  );
}

let fileConfigCache: Record<string, unknown> = {};

function initializeConfig(): void {
  if (configLoaded) return;
  fileConfigCache = loadConfigFromFiles();
  rebuild(fileConfigCache);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 *
 * @example
 * config.get("equality.strategy")   // → "auto"
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Merge values into the programmatic layer. Environment variables still
 * take precedence.
 */
function set(values: SeqkitConfig): void {
  initializeConfig();
  overrides = deepMerge(overrides, values);
  rebuild(fileConfigCache);
}

/** True if the path holds a truthy value. */
function has(path: string): boolean {
  return !!get(path);
}

/** The config file that was loaded, if any. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Drop all loaded and programmatic state (mainly for testing). */
function reset(): void {
  configStore = {};
  overrides = {};
  fileConfigCache = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed accessors
// ============================================================================

function isDebug(): boolean {
  return get("debug") === true;
}

function equalityStrategy(): EqualityStrategy {
  return get("equality.strategy") === "linear" ? "linear" : "auto";
}

export const config = {
  get,
  set,
  has,
  getConfigFilePath,
  reset,
  isDebug,
  equalityStrategy,
};

export { loadConfigFromEnv };
