/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: PICKLER_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: pickler.config.js, .picklerrc, a "pickler" key in package.json, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@pickler/core";
 *
 * config.resolved().tagKey        // → "$type"
 * config.set({ omitDefaults: false });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Full pickler configuration schema, as written in a config file.
 */
export interface PicklerConfig {
  /** Log macro expansion details */
  debug?: boolean;
  /** Reserved key holding a sum alternative's tag (default: "$type") */
  tagKey?: string;
  /** Omit fields whose value writes the same as their default (default: true) */
  omitDefaults?: boolean;
}

/** The settings the macros read, with every default applied. */
export interface ResolvedConfig {
  readonly debug: boolean;
  readonly tagKey: string;
  readonly omitDefaults: boolean;
}

const DEFAULTS: ResolvedConfig = {
  debug: false,
  tagKey: "$type",
  omitDefaults: true,
};

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let overrides: PicklerConfig = {};
let configLoaded = false;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/** Variables read as settings; a single underscore separates words of the key. */
const ENV_KEYS: ReadonlyArray<readonly [string, keyof ResolvedConfig]> = [
  ["PICKLER_DEBUG", "debug"],
  ["PICKLER_TAG_KEY", "tagKey"],
  ["PICKLER_OMIT_DEFAULTS", "omitDefaults"],
];

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   PICKLER_DEBUG=1                 → { debug: true }
 *   PICKLER_TAG_KEY=kind            → { tagKey: "kind" }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [name, key] of ENV_KEYS) {
    const value = env[name];
    if (value === undefined) continue;
    if (value === "1" || value === "true") {
      envConfig[key] = true;
    } else if (value === "0" || value === "false" || value === "") {
      envConfig[key] = false;
    } else {
      envConfig[key] = value;
    }
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "pickler";

function loadConfigFromFiles(searchFrom: string): Record<string, unknown> {
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
  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new Error(`${result.filepath}: pickler configuration must be an object`);
  }
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(searchFrom: string = process.cwd()): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // defaults < fileConfig < programmatic < envConfig
  configStore = { ...DEFAULTS, ...fileConfig, ...overrides, ...envConfig };
  configLoaded = true;
}

function checkType(key: keyof ResolvedConfig, kind: "boolean" | "string"): void {
  const value = configStore[key];
  if (value !== undefined && typeof value !== kind) {
    throw new Error(`pickler config: '${key}' must be a ${kind}, got ${typeof value}`);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Set configuration values programmatically. Environment variables still
 * take precedence.
 */
function set(values: PicklerConfig): void {
  overrides = { ...overrides, ...values };
  if (configLoaded) {
    configStore = { ...configStore, ...values, ...loadConfigFromEnv() };
  }
}

/**
 * The settings the macros use, validated, with defaults applied.
 */
function resolved(): ResolvedConfig {
  initializeConfig();
  checkType("debug", "boolean");
  checkType("tagKey", "string");
  checkType("omitDefaults", "boolean");

  const { debug, tagKey, omitDefaults } = configStore;
  return {
    debug: typeof debug === "boolean" ? debug : DEFAULTS.debug,
    tagKey: typeof tagKey === "string" ? tagKey : DEFAULTS.tagKey,
    omitDefaults: typeof omitDefaults === "boolean" ? omitDefaults : DEFAULTS.omitDefaults,
  };
}

/**
 * Load configuration searching from `dir` instead of the working
 * directory. Discards anything loaded before, except `set()` values.
 */
function loadFrom(dir: string): void {
  configLoaded = false;
  initializeConfig(dir);
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  set,
  resolved,
  loadFrom,
  reset,
} as const;
