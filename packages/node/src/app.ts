/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests call this
 * directly; main.ts serves the result.
 */

import { Hono } from "hono";
import type { StreamLedger } from "@capstream/streams";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { UnexpectedErrorFn } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createStreamRoutes } from "./routes/streams.js";
import { createWithdrawalRoutes } from "./routes/withdrawals.js";
import { createOwnershipRoutes } from "./routes/ownership.js";
import { createEventRoutes } from "./routes/events.js";
import { createSnapshotRoutes } from "./routes/snapshot.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly ledger: StreamLedger;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives errors that map to a 500 response. */
  readonly onUnexpectedError?: UnexpectedErrorFn;
  /**
   * API key registry. When provided, callers are identified by X-Api-Key;
   * otherwise by the X-Caller-Address header.
   */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly ledger: StreamLedger;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { ledger } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", callerMiddleware(options.auth));

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(ledger));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/streams", createStreamRoutes(ledger));
  app.route("/api/v1/withdrawals", createWithdrawalRoutes(ledger));
  app.route("/api/v1/ownership", createOwnershipRoutes(ledger));
  app.route("/api/v1/events", createEventRoutes(ledger));
  app.route("/api/v1/snapshot", createSnapshotRoutes(ledger));

  return { app, ledger };
}
