/**
 * Line formatting for the stderr reporter
 *
 * Shape: `<timestamp> <source:15> <level:5><REQ id> <message>\n`
 */

import type { ChalkInstance, ForegroundColorName } from "chalk";
import type { LogLevel } from "./types.js";

export const SOURCE_COLUMN_WIDTH = 15;

/** Label and color per level */
export const LEVEL_STYLES: Record<LogLevel, { label: string; color: ForegroundColorName }> = {
  app: { label: "     ", color: "white" },
  error: { label: "ERROR", color: "red" },
  warning: { label: " WARN", color: "yellow" },
  info: { label: " INFO", color: "green" },
  debug: { label: "DEBUG", color: "blue" },
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Format seconds since the epoch as `DD.MM.YY HH:MM:SS.mmm` in local time.
 * Fractions above 999 ms are clamped so the seconds field never rolls over
 */
export function formatTimestamp(unixSeconds: number): string {
  const whole = Math.floor(unixSeconds);
  const time = new Date(whole * 1000);
  const fraction = (unixSeconds - whole) * 1000;
  const millis = Math.round(fraction > 999 ? 999 : fraction);

  const date = `${pad2(time.getDate())}.${pad2(time.getMonth() + 1)}.${pad2(time.getFullYear() % 100)}`;
  const clock = `${pad2(time.getHours())}:${pad2(time.getMinutes())}:${pad2(time.getSeconds())}`;
  return `${date} ${clock}.${String(millis).padStart(3, "0")}`;
}

/**
 * Right-aligned source name, keeping the rightmost characters of long names.
 * The default source (undefined) renders as a blank column
 */
export function formatSourceColumn(name: string | undefined): string {
  if (name === undefined) return " ".repeat(SOURCE_COLUMN_WIDTH);
  if (name.length > SOURCE_COLUMN_WIDTH) return name.slice(name.length - SOURCE_COLUMN_WIDTH);
  return name.padStart(SOURCE_COLUMN_WIDTH);
}

/**
 * Request id column text and color. Ids almost always end in an
 * incrementing digit, so the parity of the last character stripes
 * concurrent requests
 */
export function requestIdColumn(requestId: string | undefined): { text: string; color: ForegroundColorName } {
  if (!requestId) return { text: "", color: "white" };
  const last = requestId.charCodeAt(requestId.length - 1);
  return { text: ` REQ ${requestId}`, color: last % 2 === 0 ? "cyan" : "magenta" };
}

export interface EntryFields {
  time: number;
  /** undefined for the default source */
  sourceName: string | undefined;
  level: LogLevel;
  requestId: string | undefined;
  message: string;
}

/** Render one complete log line, trailing newline included */
export function formatEntry(entry: EntryFields, chalk: ChalkInstance): string {
  const level = LEVEL_STYLES[entry.level];
  const requestId = requestIdColumn(entry.requestId);
  return (
    `${chalk.dim(formatTimestamp(entry.time))} ` +
    `${formatSourceColumn(entry.sourceName)} ` +
    chalk[level.color](level.label) +
    chalk[requestId.color].italic(requestId.text) +
    ` ${entry.message}\n`
  );
}
