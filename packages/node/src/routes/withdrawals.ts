/**
 * Withdrawal routes.
 *
 * POST /api/v1/withdrawals — Withdraw unlocked funds to the caller
 *
 * 201 once the transfer is confirmed; 202 when it was broadcast but not
 * yet confirmed. Either way the entitlement is spent.
 */

import { Hono } from "hono";
import type { StreamLedger } from "@capstream/streams";
import type { AppEnv } from "../types/api-contract.js";
import { WithdrawSchema, toWithdrawalReceiptDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createWithdrawalRoutes(ledger: StreamLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(WithdrawSchema), async (c) => {
    const caller = requireCaller(c.get("caller"));
    const body = c.get("validatedBody");

    const receipt = await ledger.withdraw(caller, body.amount, body.memo);

    const status = receipt.status === "pending" ? 202 : 201;
    return c.json({ data: toWithdrawalReceiptDto(receipt) }, status);
  });

  return routes;
}
