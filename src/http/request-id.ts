/**
 * Assigns each request an id, attaches it to the request handle and makes it
 * the ambient id for everything the downstream handler does
 */

import { runWithRequestId, setRequestId } from "../context/request-id.js";
import type { Middleware } from "./types.js";

export interface RequestIdOptions {
  prefix?: string;
}

export function assignRequestId(options: RequestIdOptions = {}): Middleware {
  const prefix = options.prefix ?? "";
  let lastId = 0;

  return (next) => (req, res) => {
    lastId += 1;
    const id = `${prefix}${lastId}`;
    setRequestId(req, id);
    return runWithRequestId(id, () => next(req, res));
  };
}
