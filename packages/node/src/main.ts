/**
 * @capstream/node — Entry point.
 *
 * Loads config, builds the ledger and its gateway, starts the HTTP
 * server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import type { Address } from "@capstream/types";
import { StreamLedger } from "@capstream/streams";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { createGateway } from "./gateway.js";
import { logLedgerEvents } from "./event-log.js";
import type { AuthConfig } from "./middleware/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    authConfig = {
      apiKeys: new Map<string, Address>(parsedKeys.map((k) => [k.key, k.address])),
    };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; trusting the X-Caller-Address header");
  }

  const { gateway, description } = createGateway(config);
  const ledger = new StreamLedger({ owner: config.OWNER_ADDRESS, gateway });
  logger.info({ owner: ledger.owner(), gateway: description }, "Ledger ready");

  const eventLogger = logger.child({ component: "ledger" });
  const subscription = logLedgerEvents(ledger.events(), (entry) => {
    eventLogger.info(entry, entry.type);
  });

  const { app } = createApp({
    ledger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "capstream node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
