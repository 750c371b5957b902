/**
 * Stream routes.
 *
 * GET    /api/v1/streams                  — List active streams
 * GET    /api/v1/streams/:recipient       — One recipient's stream (zero if none)
 * POST   /api/v1/streams                  — Create or replace (?mode=absent: create only)
 * PATCH  /api/v1/streams/:recipient/cap   — Change a cap, keeping accrual
 * POST   /api/v1/streams/batch            — Create or replace many, all or nothing
 * POST   /api/v1/streams/query            — Read many recipients at one timestamp
 */

import { Hono } from "hono";
import type { StreamLedger } from "@capstream/streams";
import type { AppEnv } from "../types/api-contract.js";
import {
  BatchCreateSchema,
  CreateStreamQuerySchema,
  CreateStreamSchema,
  QueryStreamsSchema,
  UpdateCapSchema,
  toStreamViewDto,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export function createStreamRoutes(ledger: StreamLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/streams — List
  routes.get("/", (c) => {
    return c.json({ data: ledger.listStreams().map(toStreamViewDto) });
  });

  // POST /api/v1/streams/batch — Batch create
  routes.post("/batch", validateBody(BatchCreateSchema), async (c) => {
    const caller = requireCaller(c.get("caller"));
    const body = c.get("validatedBody");

    await ledger.addBatch(caller, body.recipients, body.caps, body.assets);

    return c.json(
      { data: ledger.describeMany(body.recipients).map(toStreamViewDto) },
      201,
    );
  });

  // POST /api/v1/streams/query — Multi-read
  routes.post("/query", validateBody(QueryStreamsSchema), (c) => {
    const body = c.get("validatedBody");
    return c.json({ data: ledger.describeMany(body.recipients).map(toStreamViewDto) });
  });

  // GET /api/v1/streams/:recipient — Single read
  routes.get("/:recipient", (c) => {
    return c.json({ data: toStreamViewDto(ledger.describe(c.req.param("recipient"))) });
  });

  // POST /api/v1/streams — Create
  routes.post("/", validateBody(CreateStreamSchema), async (c) => {
    const queryResult = CreateStreamQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const caller = requireCaller(c.get("caller"));
    const body = c.get("validatedBody");

    if (queryResult.data.mode === "absent") {
      await ledger.createIfAbsent(caller, body.recipient, body.cap, body.asset);
    } else {
      await ledger.createOrReplace(caller, body.recipient, body.cap, body.asset);
    }

    return c.json({ data: toStreamViewDto(ledger.describe(body.recipient)) }, 201);
  });

  // PATCH /api/v1/streams/:recipient/cap — Update cap
  routes.patch("/:recipient/cap", validateBody(UpdateCapSchema), async (c) => {
    const caller = requireCaller(c.get("caller"));
    const recipient = c.req.param("recipient");
    const body = c.get("validatedBody");

    await ledger.updateCap(caller, recipient, body.cap);

    return c.json({ data: toStreamViewDto(ledger.describe(recipient)) });
  });

  return routes;
}
