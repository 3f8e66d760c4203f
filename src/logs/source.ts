/**
 * Front end: named log sources whose calls optionally take the request
 * being handled. The request id is passed to the reporter as a tag rather
 * than spliced into the message
 */

import type { IncomingMessage } from "node:http";
import { requestIdOf, resolveRequestId } from "../context/request-id.js";
import { tagsOf } from "./framework.js";
import { requestIdTag } from "./reporter.js";
import { runtime as defaultRuntime, type LoggingRuntime } from "./runtime.js";
import type { FilterLevel, LogSrc, Tags } from "./types.js";

/** One leveled log operation */
export interface LogFn {
  (request: IncomingMessage, template: string, ...args: unknown[]): void;
  (template: string, ...args: unknown[]): void;
}

export interface LogSource {
  readonly src: LogSrc;
  error: LogFn;
  warning: LogFn;
  info: LogFn;
  debug: LogFn;
}

function wrap(runtime: LoggingRuntime, src: LogSrc, level: FilterLevel): LogFn {
  function log(request: IncomingMessage, template: string, ...args: unknown[]): void;
  function log(template: string, ...args: unknown[]): void;
  function log(first: IncomingMessage | string, ...rest: unknown[]): void {
    runtime.ensureInitialized();
    const framework = runtime.framework;
    if (!framework.accepts(src, level)) return;

    let request: IncomingMessage | undefined;
    let template: string;
    let args: unknown[];
    if (typeof first === "string") {
      template = first;
      args = rest;
    } else {
      request = first;
      template = typeof rest[0] === "string" ? rest[0] : String(rest[0]);
      args = rest.slice(1);
    }

    let tags: Tags | undefined;
    if (request) {
      const requestId = resolveRequestId(requestIdOf(request));
      if (requestId !== undefined) {
        tags = tagsOf(requestIdTag, requestId);
      }
    }

    framework.log(src, level, template, args, tags);
  }
  return log;
}

function sourceFrom(runtime: LoggingRuntime, src: LogSrc): LogSource {
  return {
    src,
    error: wrap(runtime, src, "error"),
    warning: wrap(runtime, src, "warning"),
    info: wrap(runtime, src, "info"),
    debug: wrap(runtime, src, "debug"),
  };
}

/** Create a named log source */
export function createLogSource(name: string, runtime: LoggingRuntime = defaultRuntime): LogSource {
  return sourceFrom(runtime, runtime.framework.createSource(name));
}

/** Source for the framework's default, unnamed origin */
export function defaultSourceOf(runtime: LoggingRuntime = defaultRuntime): LogSource {
  return sourceFrom(runtime, runtime.framework.defaultSource);
}

export const defaultLog = defaultSourceOf();
