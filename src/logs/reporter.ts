/**
 * Buffered stderr reporter
 *
 * Each record is formatted into one reusable buffer, which is snapshotted and
 * cleared before the write is scheduled. Callers that do not wait for the
 * write can log again immediately without their text reaching the same
 * generation of the buffer.
 */

import { format } from "node:util";
import type { ChalkInstance } from "chalk";
import { currentRequestId } from "../context/request-id.js";
import { defineTag, findTag } from "./framework.js";
import { formatEntry } from "./format.js";
import type { LogLevel, LogRecord, LogSrc, Reporter } from "./types.js";

/** Tag carrying the request id resolved by the source wrappers */
export const requestIdTag = defineTag("reqlog.request_id", (value): value is string => typeof value === "string");

/** Minimal writable diagnostic stream */
export interface DiagnosticStream {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
  /** Node streams also report write failures as 'error' events */
  on?(event: "error", listener: (error: Error) => void): unknown;
}

export interface ReporterOptions {
  chalk: ChalkInstance;
  stream?: DiagnosticStream;
  /** Wall-clock seconds since the epoch */
  clock?: () => number;
  /** Lines in flight before new ones are dropped; unbounded when omitted */
  maxPendingWrites?: number;
}

export interface ReporterStats {
  written: number;
  failedWrites: number;
  droppedLines: number;
  /** 'error' events emitted by the stream */
  streamErrors: number;
}

/** Sub-millisecond wall clock */
export function wallClock(): number {
  return (performance.timeOrigin + performance.now()) / 1000;
}

export class BufferedReporter implements Reporter {
  readonly stats: ReporterStats = { written: 0, failedWrites: 0, droppedLines: 0, streamErrors: 0 };
  private buffer: string[] = [];
  private pendingWrites = 0;
  private chalk: ChalkInstance;
  private stream: DiagnosticStream;
  private clock: () => number;
  private maxPendingWrites: number | undefined;

  constructor(options: ReporterOptions) {
    this.chalk = options.chalk;
    this.stream = options.stream ?? process.stderr;
    this.clock = options.clock ?? wallClock;
    this.maxPendingWrites = options.maxPendingWrites;

    // Failed writes are counted through their callbacks; the stream's
    // matching 'error' event still needs a listener
    if (typeof this.stream.on === "function") {
      this.stream.on("error", () => {
        this.stats.streamErrors++;
      });
    }
  }

  /** Writes scheduled but not yet completed */
  get pending(): number {
    return this.pendingWrites;
  }

  report(src: LogSrc, level: LogLevel, over: () => void, record: LogRecord): void {
    // Tag from the wrappers first; calls that bypassed them get the ambient id
    const requestId = findTag(requestIdTag, record.tags) ?? currentRequestId();

    this.buffer.push(
      formatEntry(
        {
          time: this.clock(),
          sourceName: src.isDefault ? undefined : src.name,
          level,
          requestId,
          message: format(record.template, ...record.args),
        },
        this.chalk,
      ),
    );
    const line = this.flush();

    if (this.maxPendingWrites !== undefined && this.pendingWrites >= this.maxPendingWrites) {
      this.stats.droppedLines++;
      over();
      return;
    }

    this.write(line, over);
  }

  /** Take the buffer contents and reset it */
  private flush(): string {
    const contents = this.buffer.join("");
    this.buffer = [];
    return contents;
  }

  private write(line: string, over: () => void): void {
    this.pendingWrites++;
    let settled = false;
    const done = (error?: Error | null): void => {
      if (settled) return;
      settled = true;
      this.pendingWrites--;
      if (error) {
        this.stats.failedWrites++;
      } else {
        this.stats.written++;
      }
      over();
    };

    try {
      this.stream.write(line, done);
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)));
    }
  }
}
