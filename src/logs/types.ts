/**
 * Core types shared by the log framework, reporter and source wrappers
 */

/** Log levels, most severe first. "app" is the unleveled tier */
export type LogLevel = "app" | "error" | "warning" | "info" | "debug";

/** Levels a source can be filtered to */
export type FilterLevel = Exclude<LogLevel, "app">;

/** Out-of-band key/value metadata attached to a log call */
export type Tags = ReadonlyMap<string, unknown>;

/** Typed handle for one tag key */
export interface TagDef<T> {
  readonly name: string;
  is(value: unknown): value is T;
}

/** A log call that passed its source's level filter */
export interface LogRecord {
  template: string;
  args: unknown[];
  tags: Tags;
}

/** Named origin of log calls */
export interface LogSrc {
  readonly name: string;
  readonly isDefault: boolean;
  /** null disables the source entirely */
  level: LogLevel | null;
}

/**
 * Back end of the framework. `over` must be called exactly once, when the
 * I/O for the record has completed (or was given up on)
 */
export interface Reporter {
  report(src: LogSrc, level: LogLevel, over: () => void, record: LogRecord): void;
}
