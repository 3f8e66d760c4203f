/**
 * Configuration types for reqlog
 */

import type { FilterLevel } from "../logs/types.js";

/** When to emit ANSI colors on stderr */
export type ColorMode = "auto" | "always" | "never";

/** Logging configuration */
export interface LoggingConfig {
  /** Install the stderr reporter at all */
  enable: boolean;
  level: FilterLevel;
  /** Raise the captured stack depth for error reports */
  backtraces: boolean;
  color: ColorMode;
  /** Lines in flight before new ones are dropped; 0 means unbounded */
  maxPendingWrites: number;
}

/** HTTP server configuration */
export interface ServerConfig {
  host: string;
  port: number;
}

/** Complete configuration structure */
export interface Config {
  logging: LoggingConfig;
  server: ServerConfig;
}

/** Raw parsed YAML structure (before environment variable expansion) */
export interface RawConfig {
  logging?: {
    enable?: unknown;
    level?: unknown;
    backtraces?: unknown;
    color?: unknown;
    max_pending_writes?: unknown;
  };
  server?: {
    host?: unknown;
    port?: unknown;
  };
}

/** Result of loading configuration */
export interface LoadedConfig {
  config: Config;
  warnings: string[];
}
