/**
 * Configuration loader for reqlog
 * Handles YAML parsing, environment variable expansion, and validation
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { FilterLevel } from "../logs/types.js";
import type { ColorMode, Config, LoadedConfig, LoggingConfig, RawConfig, ServerConfig } from "./types.js";

// Valid log levels
const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<FilterLevel>(["error", "warning", "info", "debug"]);

// Valid color modes
const VALID_COLOR_MODES: ReadonlySet<string> = new Set<ColorMode>(["auto", "always", "never"]);

/** Default configuration values */
const DEFAULTS: Config = {
  logging: {
    enable: true,
    level: "info",
    backtraces: true,
    color: "auto",
    maxPendingWrites: 0,
  },
  server: {
    host: "127.0.0.1",
    port: 8080,
  },
};

/**
 * Expand environment variables in a string
 * Supports ${VAR} and ${VAR:-default} syntax
 */
export function expandEnvVars(str: string): string {
  return str.replace(/\$\{([^}:]+)(:-([^}]*))?\}/g, (_match, name: string, _default, defaultValue?: string) => {
    return process.env[name] ?? defaultValue ?? "";
  });
}

/**
 * Get the default configuration file path
 */
export function getDefaultConfigPath(): string {
  return process.env.REQLOG_CONFIG ?? join(process.cwd(), "reqlog.yml");
}

/**
 * Load configuration from a YAML file
 */
export async function loadConfig(filePath: string = getDefaultConfigPath()): Promise<LoadedConfig> {
  const warnings: string[] = [];
  let raw: RawConfig = {};

  if (existsSync(filePath)) {
    let content: string;
    let parsed: unknown;
    try {
      content = await readFile(filePath, "utf-8");
      parsed = parseYaml(content);
    } catch (error) {
      throw new Error(`Failed to parse config file at ${filePath}: ${error}`);
    }
    if (isRecord(parsed)) {
      raw = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      warnings.push(`Config file at ${filePath} is not a mapping; using defaults.`);
    }
  } else {
    warnings.push(`Config file not found at ${filePath}; using defaults.`);
  }

  return { config: mergeAndValidateConfig(raw), warnings };
}

/** Parse configuration from YAML text */
export function parseConfig(content: string): Config {
  const parsed: unknown = parseYaml(content);
  return mergeAndValidateConfig(isRecord(parsed) ? parsed : {});
}

function isRecord(value: unknown): value is Record<string, unknown> & RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge raw config with defaults, validate, and apply environment variable expansion
 */
function mergeAndValidateConfig(raw: RawConfig): Config {
  return {
    logging: mergeLoggingConfig(raw.logging),
    server: mergeServerConfig(raw.server),
  };
}

/** Expand strings; YAML scalars like `true` and `8080` arrive already typed */
function expanded(value: unknown): unknown {
  return typeof value === "string" ? expandEnvVars(value) : value;
}

function readBoolean(key: string, value: unknown, fallback: boolean): boolean {
  const v = expanded(value);
  if (v === undefined || v === "") return fallback;
  if (typeof v === "boolean") return v;
  if (v === "true") return true;
  if (v === "false") return false;
  throw new Error(`Invalid ${key}: ${String(v)}. Must be true or false.`);
}

function readInteger(key: string, value: unknown, fallback: number, min: number, max: number): number {
  const v = expanded(value);
  if (v === undefined || v === "") return fallback;
  const n = typeof v === "string" ? Number(v) : v;
  if (typeof n !== "number" || !Number.isInteger(n)) {
    throw new Error(`Invalid ${key}: ${String(v)}. Must be an integer.`);
  }
  if (n < min || n > max) {
    throw new Error(`Invalid ${key}: ${n}. Must be between ${min} and ${max}.`);
  }
  return n;
}

function readChoice<T extends string>(key: string, value: unknown, fallback: T, valid: ReadonlySet<string>, isChoice: (s: string) => s is T): T {
  const v = expanded(value);
  if (v === undefined || v === "") return fallback;
  if (typeof v !== "string" || !isChoice(v)) {
    throw new Error(`Invalid ${key}: ${String(v)}. Must be one of: ${Array.from(valid).join(", ")}`);
  }
  return v;
}

function isFilterLevel(s: string): s is FilterLevel {
  return VALID_LOG_LEVELS.has(s);
}

function isColorMode(s: string): s is ColorMode {
  return VALID_COLOR_MODES.has(s);
}

function mergeLoggingConfig(raw: RawConfig["logging"]): LoggingConfig {
  const defaults = DEFAULTS.logging;
  return {
    enable: readBoolean("logging.enable", raw?.enable, defaults.enable),
    level: readChoice("logging.level", raw?.level, defaults.level, VALID_LOG_LEVELS, isFilterLevel),
    backtraces: readBoolean("logging.backtraces", raw?.backtraces, defaults.backtraces),
    color: readChoice("logging.color", raw?.color, defaults.color, VALID_COLOR_MODES, isColorMode),
    maxPendingWrites: readInteger("logging.max_pending_writes", raw?.max_pending_writes, defaults.maxPendingWrites, 0, 1_000_000),
  };
}

function mergeServerConfig(raw: RawConfig["server"]): ServerConfig {
  const host = expanded(raw?.host ?? DEFAULTS.server.host);
  if (typeof host !== "string" || host.length === 0) {
    throw new Error(`Invalid server.host: must be a non-empty string.`);
  }

  return {
    host,
    port: readInteger("server.port", raw?.port, DEFAULTS.server.port, 0, 65535),
  };
}
