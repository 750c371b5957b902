/**
 * Tests for the global error handler.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { StreamError } from "@capstream/streams";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { ApiError } from "../../src/types/error.js";

function makeApp(error: Error, report?: (err: Error, requestId: string) => void) {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(createErrorHandler(report));
  app.get("/fail", () => {
    throw error;
  });
  return app;
}

const MAPPED: [StreamError | ApiError, number][] = [
  [new StreamError("NO_ACTIVE_STREAM", "none"), 404],
  [new StreamError("NOT_ENOUGH_FUNDS_IN_STREAM", "short"), 422],
  [new StreamError("NOT_ENOUGH_FUNDS_IN_CONTRACT", "short"), 422],
  [new StreamError("TRANSFER_FAILED", "reverted"), 502],
  [new StreamError("NOT_OWNER", "no"), 403],
  [new StreamError("INVALID_ARRAY_INPUT", "lengths"), 400],
  [new StreamError("STREAM_EXISTS", "taken"), 409],
  [new StreamError("INVALID_SNAPSHOT", "bad"), 400],
  [new ApiError("UNAUTHORIZED", "who"), 401],
];

describe("createErrorHandler", () => {
  it.each(MAPPED)("maps %s to %i", async (error, status) => {
    const res = await makeApp(error).request("/fail");

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({
      error: { code: error.code, message: error.message },
    });
  });

  it("hides unexpected errors and reports them with the request id", async () => {
    const report = vi.fn();
    const failure = new Error("database exploded");
    const app = makeApp(failure, report);

    const res = await app.request("/fail", { headers: { "X-Request-Id": "req-42" } });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(report).toHaveBeenCalledWith(failure, "req-42");
  });

  it("passes HTTPException responses through", async () => {
    const app = makeApp(new HTTPException(413, { message: "too large" }));

    const res = await app.request("/fail");

    expect(res.status).toBe(413);
    expect(await res.text()).toBe("too large");
  });
});
