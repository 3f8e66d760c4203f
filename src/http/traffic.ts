/**
 * Request logging middleware: one line when a request starts, one when it
 * completes, and the error plus its stack when the handler fails
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { inspect } from "node:util";
import { createLogSource, type LogSource } from "../logs/source.js";
import { runtime as defaultRuntime, type LoggingRuntime } from "../logs/runtime.js";
import type { Middleware } from "./types.js";

export const TRAFFIC_SOURCE_NAME = "reqlog.traffic";

export interface TrafficLoggerOptions {
  log?: LogSource;
  runtime?: LoggingRuntime;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

/** All values of a header, joined with single spaces */
export function headerValues(req: IncomingMessage, name: string): string {
  const value = req.headers[name.toLowerCase()];
  if (value === undefined) return "";
  return Array.isArray(value) ? value.join(" ") : value;
}

/** Location header of a response, or "" */
function redirectTarget(res: ServerResponse): string {
  const location = res.getHeader("location");
  if (location === undefined) return "";
  return Array.isArray(location) ? location.join(" ") : String(location);
}

/** Human-readable description of a thrown value */
export function describeError(error: unknown): string {
  return error instanceof Error ? String(error) : inspect(error);
}

/** Non-empty stack frame lines of a thrown value, without the message header */
export function stackLines(error: unknown): string[] {
  if (!(error instanceof Error) || typeof error.stack !== "string") return [];
  let stack = error.stack;
  const header = String(error);
  if (stack.startsWith(header)) {
    stack = stack.slice(header.length);
  }
  return stack
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

export function createTrafficLogger(options: TrafficLoggerOptions = {}): Middleware {
  const runtime = options.runtime ?? defaultRuntime;
  const log = options.log ?? createLogSource(TRAFFIC_SOURCE_NAME, runtime);
  const now = options.now ?? (() => performance.now());

  return (next) => async (req, res) => {
    runtime.ensureStackTraces();

    log.info(req, "%s %s %s %s", req.method ?? "GET", req.url ?? "/", req.socket.remoteAddress ?? "", headerValues(req, "User-Agent"));

    const start = now();
    try {
      await next(req, res);
    } catch (error) {
      log.error(req, "Aborted by %s", describeError(error));
      for (const line of stackLines(error)) {
        log.error(req, "%s", line);
      }
      throw error;
    }

    const elapsedMicros = (now() - start) * 1000;
    log.info(req, "%d%s in %s μs", res.statusCode, redirectTarget(res), elapsedMicros.toFixed(0));
  };
}

/** Ready-made traffic logger on the process-wide runtime */
export const logTraffic: Middleware = createTrafficLogger();
