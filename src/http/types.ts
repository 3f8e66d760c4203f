/**
 * Type definitions for request handling
 */

import type { IncomingMessage, ServerResponse } from "node:http";

/** HTTP request handler; resolves once the response has been produced */
export type Handler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** Wraps a handler with extra behavior */
export type Middleware = (next: Handler) => Handler;

/** Apply middlewares so that the first one listed runs outermost */
export function pipeline(middlewares: Middleware[], handler: Handler): Handler {
  return middlewares.reduceRight((next, middleware) => middleware(next), handler);
}
