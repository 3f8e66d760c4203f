/**
 * Leveled multi-source log framework: source registry, per-source level
 * filtering, tags and a single pluggable reporter
 */

import type { LogLevel, LogRecord, LogSrc, Reporter, TagDef, Tags } from "./types.js";

/** Log level values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  app: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4,
};

export const DEFAULT_SOURCE_NAME = "application";

const EMPTY_TAGS: Tags = new Map();

/** Reporter used until one is installed: drops everything */
const nopReporter: Reporter = {
  report(_src, _level, over) {
    over();
  },
};

/** Define a tag key whose values are checked by `is` */
export function defineTag<T>(name: string, is: (value: unknown) => value is T): TagDef<T> {
  return { name, is };
}

/** Build a tag set holding a single value */
export function tagsOf<T>(def: TagDef<T>, value: T): Tags {
  return new Map([[def.name, value]]);
}

/** Look up a tag value, checking its type */
export function findTag<T>(def: TagDef<T>, tags: Tags): T | undefined {
  const value = tags.get(def.name);
  return def.is(value) ? value : undefined;
}

/** Source registry and dispatcher */
export class LogFramework {
  readonly defaultSource: LogSrc;
  private sources: LogSrc[] = [];
  private reporter: Reporter = nopReporter;
  private installed = false;
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];
  private failures = 0;

  constructor() {
    this.defaultSource = { name: DEFAULT_SOURCE_NAME, isDefault: true, level: "warning" };
    this.sources.push(this.defaultSource);
  }

  /** Register a new named source at the default level */
  createSource(name: string): LogSrc {
    const src: LogSrc = { name, isDefault: false, level: this.defaultSource.level };
    this.sources.push(src);
    return src;
  }

  /** All registered sources, default first */
  listSources(): readonly LogSrc[] {
    return this.sources;
  }

  /** Set the level of the default source, or of every source with `all` */
  setLevel(level: LogLevel | null, options?: { all?: boolean }): void {
    if (options?.all) {
      for (const src of this.sources) {
        src.level = level;
      }
    } else {
      this.defaultSource.level = level;
    }
  }

  setReporter(reporter: Reporter): void {
    this.reporter = reporter;
    this.installed = true;
  }

  /** Whether a reporter other than the initial no-op one is installed */
  hasReporter(): boolean {
    return this.installed;
  }

  /** Check if a level should be logged for a source */
  accepts(src: LogSrc, level: LogLevel): boolean {
    return src.level !== null && LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[src.level];
  }

  /** Core log method */
  log(src: LogSrc, level: LogLevel, template: string, args: unknown[], tags: Tags = EMPTY_TAGS): void {
    if (!this.accepts(src, level)) return;

    const record: LogRecord = { template, args, tags };
    this.inFlight++;
    let done = false;
    const over = (): void => {
      if (done) return;
      done = true;
      this.complete();
    };

    try {
      this.reporter.report(src, level, over, record);
    } catch {
      // A failing reporter must never reach the call site
      this.failures++;
      over();
    }
  }

  /** Number of records whose reporter threw */
  get reportFailures(): number {
    return this.failures;
  }

  /** Number of records whose I/O has not completed yet */
  get pending(): number {
    return this.inFlight;
  }

  /** Resolve once every record logged so far has completed */
  drain(): Promise<void> {
    if (this.inFlight === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private complete(): void {
    this.inFlight--;
    if (this.inFlight === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}

/** Process-wide framework instance */
export const logs = new LogFramework();
