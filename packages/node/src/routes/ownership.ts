/**
 * Ownership routes.
 *
 * GET  /api/v1/ownership           — Current owner
 * POST /api/v1/ownership/transfer  — Hand ownership to another address
 * POST /api/v1/ownership/renounce  — Give up ownership for good
 */

import { Hono } from "hono";
import { ZERO_ADDRESS } from "@capstream/types";
import type { Address } from "@capstream/types";
import type { StreamLedger } from "@capstream/streams";
import type { AppEnv } from "../types/api-contract.js";
import { TransferOwnershipSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

function ownershipView(owner: Address): { owner: Address; renounced: boolean } {
  return { owner, renounced: owner === ZERO_ADDRESS };
}

export function createOwnershipRoutes(ledger: StreamLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: ownershipView(ledger.owner()) });
  });

  routes.post("/transfer", validateBody(TransferOwnershipSchema), async (c) => {
    const caller = requireCaller(c.get("caller"));
    const body = c.get("validatedBody");

    const owner = await ledger.transferOwnership(caller, body.newOwner);

    return c.json({ data: ownershipView(owner) });
  });

  routes.post("/renounce", async (c) => {
    const caller = requireCaller(c.get("caller"));

    await ledger.renounceOwnership(caller);

    return c.json({ data: ownershipView(ledger.owner()) });
  });

  return routes;
}
