/**
 * HTTP server with request ids and traffic logging wired in
 */

import { createServer, type Server } from "node:http";
import type { ServerConfig } from "../config/types.js";
import { createLogSource } from "../logs/source.js";
import { assignRequestId } from "./request-id.js";
import { logTraffic } from "./traffic.js";
import { pipeline, type Handler, type Middleware } from "./types.js";

const log = createLogSource("reqlog.server");

export interface LoggedServerOptions {
  /** Defaults to request ids plus traffic logging */
  middlewares?: Middleware[];
}

/** Create the server and start listening */
export function createLoggedServer(handler: Handler, config: ServerConfig, options: LoggedServerOptions = {}): Server {
  const handle = pipeline(options.middlewares ?? [assignRequestId(), logTraffic], handler);

  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      // Already logged by the traffic middleware; only answer the client
      log.debug(req, "Responding 500 after %s", err instanceof Error ? err.name : typeof err);
      if (!res.headersSent) {
        res.writeHead(500, { "content-type": "text/plain" });
        res.end("Internal Server Error");
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  const { port, host } = config;
  server.listen(port, host, () => {
    const address = server.address();
    const actualPort = address !== null && typeof address === "object" ? address.port : port;
    log.info("Listening on http://%s:%d", host, actualPort);
  });

  return server;
}
