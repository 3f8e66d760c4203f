/**
 * Request id lookup: explicit per-request handles, with the async-context
 * store as a fallback for code that has no handle at hand
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { IncomingMessage } from "node:http";

const ambient = new AsyncLocalStorage<string>();

const byRequest = new WeakMap<IncomingMessage, string>();

/** Run `fn` with `id` as the current request id for everything it schedules */
export function runWithRequestId<T>(id: string, fn: () => T): T {
  return ambient.run(id, fn);
}

/** Id of the request logically current on this async path, if any */
export function currentRequestId(): string | undefined {
  return ambient.getStore();
}

/** Attach an id to a request handle */
export function setRequestId(request: IncomingMessage, id: string): void {
  byRequest.set(request, id);
}

/** Id previously attached to a request handle */
export function requestIdOf(request: IncomingMessage): string | undefined {
  return byRequest.get(request);
}

/**
 * Prefer an explicit id; otherwise ask the async-context store. Absence is
 * normal (startup code, background tasks)
 */
export function resolveRequestId(explicitId?: string): string | undefined {
  if (explicitId) return explicitId;
  return currentRequestId();
}
