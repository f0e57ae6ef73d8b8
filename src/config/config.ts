// src/config/config.ts
// Configuration for argument coercion and the query runner

import * as fs from "fs";
import * as path from "path";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "../log/logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type CoercionConfig = {
  /**
   * Fail with a value-required error when a non-null argument is neither written
   * nor defaulted. When false the argument is omitted from the resolver's map.
   */
  enforceRequiredArguments: boolean;
  /** Minimum level written by the default logger */
  logLevel: LogLevel;
};

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: CoercionConfig = {
  enforceRequiredArguments: false,
  logLevel: "warn",
};

export const DEFAULT_CONFIG_FILES = ["argcoerce.config.json", ".argcoercerc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return undefined;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(
  prefix = "ARGCOERCE",
  env: NodeJS.ProcessEnv = process.env
): CoercionConfig {
  const enforce = parseBoolean(env[`${prefix}_ENFORCE_REQUIRED_ARGUMENTS`]);
  const level = env[`${prefix}_LOG_LEVEL`]?.trim().toLowerCase();

  return {
    enforceRequiredArguments: enforce ?? DEFAULT_CONFIG.enforceRequiredArguments,
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): Partial<CoercionConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(Object.fromEntries(Object.entries(data)));
}

/**
 * Read the recognised keys of a plain object (camelCase or snake_case).
 */
export function configFromObject(data: Record<string, unknown>): Partial<CoercionConfig> {
  const out: Partial<CoercionConfig> = {};

  const enforce = data.enforceRequiredArguments ?? data.enforce_required_arguments;
  if (typeof enforce === "boolean") {
    out.enforceRequiredArguments = enforce;
  }

  const level = data.logLevel ?? data.log_level;
  if (typeof level === "string" && isLogLevel(level)) {
    out.logLevel = level;
  }

  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<CoercionConfig>[]): CoercionConfig {
  let result: CoercionConfig = { ...DEFAULT_CONFIG };
  for (const cfg of configs) {
    result = {
      enforceRequiredArguments: cfg.enforceRequiredArguments ?? result.enforceRequiredArguments,
      logLevel: cfg.logLevel ?? result.logLevel,
    };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<CoercionConfig>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): CoercionConfig {
  let config = configFromEnv("ARGCOERCE", options?.env ?? process.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        config = mergeConfigs(config, configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

/**
 * Check a config assembled by hand.
 */
export function validateConfig(config: { enforceRequiredArguments?: unknown; logLevel?: unknown }): ConfigValidation {
  const errors: string[] = [];

  if (typeof config.enforceRequiredArguments !== "boolean") {
    errors.push("enforceRequiredArguments must be a boolean");
  }
  if (typeof config.logLevel !== "string" || !isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(", ")}`);
  }

  return { valid: errors.length === 0, errors };
}
