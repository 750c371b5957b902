/**
 * Snapshot route.
 *
 * GET /api/v1/snapshot — Owner and every active stream, JSON-safe
 */

import { Hono } from "hono";
import type { StreamLedger } from "@capstream/streams";
import type { AppEnv } from "../types/api-contract.js";

export function createSnapshotRoutes(ledger: StreamLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.json({ data: ledger.snapshot() }));

  return routes;
}
