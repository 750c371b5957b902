/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event log hash chain intact)
 */

import { Hono } from "hono";
import type { StreamLedger } from "@capstream/streams";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(ledger: StreamLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = ledger.events().verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      events: ledger.events().globalPosition(),
      ...(integrity.valid
        ? {}
        : { detail: `hash chain broken after position ${integrity.lastVerifiedPosition}` }),
      timestamp: new Date().toISOString(),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
