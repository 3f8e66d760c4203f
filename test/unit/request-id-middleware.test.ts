/**
 * Unit tests for request id assignment
 */

import { describe, it, expect } from "vitest";
import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";
import { assignRequestId } from "../../src/http/request-id.js";
import { currentRequestId, requestIdOf } from "../../src/context/request-id.js";
import { pipeline, type Handler, type Middleware } from "../../src/http/types.js";

function makeRequest(): { req: IncomingMessage; res: ServerResponse } {
  const req = new IncomingMessage(new Socket());
  return { req, res: new ServerResponse(req) };
}

describe("assignRequestId", () => {
  it("assigns incrementing ids to the handle and the async context", async () => {
    const seen: Array<{ handle?: string; ambient?: string }> = [];
    const handler: Handler = async (req) => {
      await Promise.resolve();
      seen.push({ handle: requestIdOf(req), ambient: currentRequestId() });
    };
    const handle = assignRequestId({ prefix: "w" })(handler);

    const first = makeRequest();
    const second = makeRequest();
    await handle(first.req, first.res);
    await handle(second.req, second.res);

    expect(seen).toEqual([
      { handle: "w1", ambient: "w1" },
      { handle: "w2", ambient: "w2" },
    ]);
    expect(currentRequestId()).toBeUndefined();
  });

  it("keeps a separate counter per middleware instance", async () => {
    const ids: Array<string | undefined> = [];
    const handler: Handler = async (req) => {
      ids.push(requestIdOf(req));
    };

    const a = makeRequest();
    const b = makeRequest();
    await assignRequestId()(handler)(a.req, a.res);
    await assignRequestId()(handler)(b.req, b.res);

    expect(ids).toEqual(["1", "1"]);
  });
});

describe("pipeline", () => {
  it("runs the first middleware outermost", async () => {
    const order: string[] = [];
    const mark =
      (name: string): Middleware =>
      (next) =>
      async (req, res) => {
        order.push(`${name}>`);
        await next(req, res);
        order.push(`<${name}`);
      };

    const { req, res } = makeRequest();
    await pipeline([mark("a"), mark("b")], async () => {
      order.push("handler");
    })(req, res);

    expect(order).toEqual(["a>", "b>", "handler", "<b", "<a"]);
  });
});
