/**
 * Process-wide logging setup, performed once: either by an explicit
 * initialize() or lazily on the first log call
 */

import { Chalk, supportsColorStderr, type ColorSupportLevel } from "chalk";
import type { ColorMode, LoggingConfig } from "../config/types.js";
import { LogFramework, logs } from "./framework.js";
import { BufferedReporter, type DiagnosticStream } from "./reporter.js";
import type { FilterLevel } from "./types.js";

/** Minimum stack depth once backtraces are enabled */
export const STACK_TRACE_LIMIT = 50;

export interface InitializeOptions {
  enable: boolean;
  backtraces?: boolean;
  level?: FilterLevel;
  color?: ColorMode;
  /** 0 or omitted means unbounded */
  maxPendingWrites?: number;
  stream?: DiagnosticStream;
  clock?: () => number;
}

interface RuntimeSettings {
  enable: boolean;
  level: FilterLevel;
  color: ColorMode;
  maxPendingWrites: number;
  stream?: DiagnosticStream;
  clock?: () => number;
}

/** Pick a chalk color level; probes the terminal, so only call at setup time */
export function detectColorLevel(mode: ColorMode): ColorSupportLevel {
  if (mode === "never") return 0;
  const detected = supportsColorStderr ? supportsColorStderr.level : 0;
  if (mode === "always") return detected === 0 ? 1 : detected;
  return detected;
}

/** Map loaded configuration to initialize() options */
export function initializeOptionsFrom(config: LoggingConfig): InitializeOptions {
  return {
    enable: config.enable,
    backtraces: config.backtraces,
    level: config.level,
    color: config.color,
    maxPendingWrites: config.maxPendingWrites,
  };
}

export class LoggingRuntime {
  readonly framework: LogFramework;
  private settings: RuntimeSettings = { enable: true, level: "info", color: "auto", maxPendingWrites: 0 };
  private initialized = false;
  private stackTracesConfigured = false;
  private installed: BufferedReporter | undefined;

  constructor(framework: LogFramework = logs) {
    this.framework = framework;
  }

  /**
   * Configure and set up logging. Settings only take effect if the runtime
   * has not been set up yet; a second reporter is never installed
   */
  initialize(options: InitializeOptions): void {
    if (options.backtraces ?? true) {
      raiseStackTraceLimit();
    }
    this.stackTracesConfigured = true;

    this.settings = {
      enable: options.enable,
      level: options.level ?? "info",
      color: options.color ?? "auto",
      maxPendingWrites: options.maxPendingWrites ?? 0,
      stream: options.stream,
      clock: options.clock,
    };

    this.ensureInitialized();
  }

  /** Run the one-time setup if it has not happened yet */
  ensureInitialized(): void {
    if (this.initialized) return;
    this.initialized = true;

    const { enable, level, color, maxPendingWrites, stream, clock } = this.settings;
    if (!enable) return;

    this.framework.setLevel(level, { all: true });
    this.installed = new BufferedReporter({
      chalk: new Chalk({ level: detectColorLevel(color) }),
      stream,
      clock,
      maxPendingWrites: maxPendingWrites > 0 ? maxPendingWrites : undefined,
    });
    this.framework.setReporter(this.installed);
  }

  /** Enable deeper stack traces unless initialize() already decided */
  ensureStackTraces(): void {
    if (this.stackTracesConfigured) return;
    this.stackTracesConfigured = true;
    raiseStackTraceLimit();
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /** The installed reporter, if logging is enabled and set up */
  get reporter(): BufferedReporter | undefined {
    return this.installed;
  }
}

function raiseStackTraceLimit(): void {
  if (Error.stackTraceLimit < STACK_TRACE_LIMIT) {
    Error.stackTraceLimit = STACK_TRACE_LIMIT;
  }
}

/** Runtime behind the process-wide framework */
export const runtime = new LoggingRuntime();

export function initialize(options: InitializeOptions): void {
  runtime.initialize(options);
}
