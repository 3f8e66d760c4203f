/**
 * In-memory diagnostic stream for reporter tests
 */

import type { DiagnosticStream } from "../../src/logs/reporter.js";

export class CaptureStream implements DiagnosticStream {
  chunks: string[] = [];
  /** Keep write callbacks pending until release() */
  hold = false;
  /** Complete writes with an error */
  fail = false;
  private held: Array<() => void> = [];

  write(chunk: string, callback: (error?: Error | null) => void): boolean {
    this.chunks.push(chunk);
    const error = this.fail ? new Error("stream closed") : null;
    const done = () => callback(error);
    if (this.hold) {
      this.held.push(done);
    } else {
      queueMicrotask(done);
    }
    return true;
  }

  release(): void {
    const held = this.held;
    this.held = [];
    for (const done of held) {
      done();
    }
  }

  /** Written text split into lines, without the trailing empty one */
  get lines(): string[] {
    return this.chunks.join("").split("\n").filter((line) => line !== "");
  }

  clear(): void {
    this.chunks = [];
  }
}

/** 05.03.24 14:07:09 local time */
export const FIXED_SECONDS = new Date(2024, 2, 5, 14, 7, 9).getTime() / 1000;

/** Clock pinned to FIXED_SECONDS + 0.25 */
export const fixedClock = () => FIXED_SECONDS + 0.25;

export const FIXED_TIMESTAMP = "05.03.24 14:07:09.250";
