/**
 * Event query routes.
 *
 * GET /api/v1/events            — Ledger events in global order
 * GET /api/v1/events/:streamId  — Events of one stream, e.g. "stream:0x…" or "ownership"
 *
 * Both take `afterPosition` (global position or stream version) and `limit`.
 * The address in a "stream:" id may be given in any letter case.
 */

import { Hono } from "hono";
import type { StreamLedger } from "@capstream/streams";
import { normalizeAddress } from "@capstream/streams";
import type { HashedStoredEvent } from "@capstream/event-store";
import { recipientStreamId } from "@capstream/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

interface EventPage {
  readonly data: readonly HashedStoredEvent[];
  /** Pass as `afterPosition` to continue; null when there is nothing more. */
  readonly next: number | null;
}

const RECIPIENT_PREFIX = recipientStreamId("");

function canonicalStreamId(streamId: string): string {
  if (!streamId.startsWith(RECIPIENT_PREFIX)) return streamId;
  return recipientStreamId(
    normalizeAddress(streamId.slice(RECIPIENT_PREFIX.length), "recipient"),
  );
}

function page(
  events: readonly HashedStoredEvent[],
  limit: number,
  positionOf: (event: HashedStoredEvent) => number,
): EventPage {
  const data = events.slice(0, limit);
  const last = data[data.length - 1];
  return {
    data,
    next: events.length > limit && last !== undefined ? positionOf(last) : null,
  };
}

export function createEventRoutes(ledger: StreamLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = ledger.events().readAll({
      fromPosition: (query.afterPosition ?? 0) + 1,
      maxCount: query.limit + 1,
    });

    return c.json(page(events, query.limit, (e) => e.globalPosition));
  });

  // GET /api/v1/events/:streamId
  routes.get("/:streamId", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = ledger.events().read(canonicalStreamId(c.req.param("streamId")), {
      fromVersion: (query.afterPosition ?? 0) + 1,
      maxCount: query.limit + 1,
    });

    return c.json(page(events, query.limit, (e) => e.version));
  });

  return routes;
}
