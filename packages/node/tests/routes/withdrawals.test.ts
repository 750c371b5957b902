/**
 * Tests for the withdrawal route.
 *
 * Verifies:
 * - A withdrawal pays the caller and advances the checkpoint
 * - Each failure surfaces with its ledger code and status
 * - A failed transfer leaves the stream untouched
 */

import { describe, it, expect } from "vitest";
import {
  ALICE,
  BOB,
  NATIVE,
  ONE_ETHER,
  OWNER,
  TOKEN,
  callerHeaders,
  createTestApp,
  jsonRequest,
} from "../setup.js";
import type { ErrorBody, StreamBody, TestApp } from "../setup.js";

interface ReceiptBody {
  data: {
    recipient: string;
    asset: string;
    amount: string;
    memo: string;
    previousLast: string;
    last: string;
    remainingUnlocked: string;
    withdrawnAt: string;
    status: string;
    txHash?: string;
  };
}

async function fundedApp(): Promise<TestApp> {
  const test = createTestApp();
  test.vault.deposit(NATIVE, 10n * ONE_ETHER);
  await test.app.request(
    jsonRequest(
      "/api/v1/streams",
      "POST",
      { recipient: ALICE, cap: ONE_ETHER.toString() },
      callerHeaders(OWNER),
    ),
  );
  return test;
}

function withdraw(test: TestApp, body: unknown, caller: string = ALICE): Response | Promise<Response> {
  return test.app.request(
    jsonRequest("/api/v1/withdrawals", "POST", body, callerHeaders(caller)),
  );
}

describe("POST /api/v1/withdrawals", () => {
  it("pays the caller and moves the checkpoint proportionally", async () => {
    const test = await fundedApp();

    const res = await withdraw(test, { amount: "400000000000000000", memo: "rent" });

    expect(res.status).toBe(201);
    const body = (await res.json()) as ReceiptBody;
    expect(body.data).toEqual({
      recipient: ALICE,
      asset: NATIVE,
      amount: "400000000000000000",
      memo: "rent",
      previousLast: "1697408000",
      last: "1698444800",
      remainingUnlocked: "600000000000000000",
      withdrawnAt: "1700000000",
      status: "confirmed",
    });
    expect(test.vault.paidTo(ALICE)).toBe(400000000000000000n);
    expect(test.vault.holdings(NATIVE)).toBe(9_600_000_000_000_000_000n);
  });

  it("keeps accruing after a withdrawal", async () => {
    const test = await fundedApp();
    await withdraw(test, { amount: "400000000000000000" });
    test.clock.advance(259_200n);

    const res = await test.app.request(`/api/v1/streams/${ALICE}`);

    const body = (await res.json()) as StreamBody;
    expect(body.data.unlocked).toBe("700000000000000000");
  });

  it("defaults the memo to empty", async () => {
    const test = await fundedApp();

    const res = await withdraw(test, { amount: "1" });

    const body = (await res.json()) as ReceiptBody;
    expect(body.data.memo).toBe("");
  });

  it("returns 404 when the caller has no stream", async () => {
    const test = await fundedApp();

    const res = await withdraw(test, { amount: "1" }, BOB);

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NO_ACTIVE_STREAM");
  });

  it("returns 400 for a zero amount", async () => {
    const test = await fundedApp();

    const res = await withdraw(test, { amount: "0" });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_AMOUNT");
  });

  it("returns 422 when more than the unlocked amount is requested", async () => {
    const test = await fundedApp();

    const res = await withdraw(test, { amount: (ONE_ETHER + 1n).toString() });

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_ENOUGH_FUNDS_IN_STREAM");
  });

  it("returns 422 when the ledger does not hold the asset", async () => {
    const test = await fundedApp();
    await test.app.request(
      jsonRequest(
        "/api/v1/streams",
        "POST",
        { recipient: BOB, cap: "100", asset: TOKEN },
        callerHeaders(OWNER),
      ),
    );

    const res = await withdraw(test, { amount: "50" }, BOB);

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_ENOUGH_FUNDS_IN_CONTRACT");
  });

  it("returns 502 and keeps the checkpoint when the transfer fails", async () => {
    const test = await fundedApp();
    test.vault.blockRecipient(ALICE);

    const res = await withdraw(test, { amount: "1000" });

    expect(res.status).toBe(502);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("TRANSFER_FAILED");

    const stream = (await (await test.app.request(`/api/v1/streams/${ALICE}`)).json()) as StreamBody;
    expect(stream.data.last).toBe("1697408000");
    expect(stream.data.unlocked).toBe(ONE_ETHER.toString());
  });

  it("returns 202 for a broadcast but unconfirmed transfer and spends the entitlement", async () => {
    const test = await fundedApp();
    test.vault.blockRecipient(ALICE, "unconfirmed");

    const res = await withdraw(test, { amount: ONE_ETHER.toString() });

    expect(res.status).toBe(202);
    const body = (await res.json()) as ReceiptBody;
    expect(body.data).toMatchObject({ status: "pending", txHash: "memory-1", last: "1700000000" });

    const retry = await withdraw(test, { amount: ONE_ETHER.toString() });
    expect(retry.status).toBe(422);
    expect(test.vault.paidTo(ALICE)).toBe(ONE_ETHER);
  });

  it("returns 422 for an amount beyond uint256", async () => {
    const test = await fundedApp();

    const res = await withdraw(test, { amount: (1n << 256n).toString() });

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_ENOUGH_FUNDS_IN_STREAM");
  });

  it("returns 401 without a caller", async () => {
    const test = await fundedApp();

    const res = await test.app.request(
      jsonRequest("/api/v1/withdrawals", "POST", { amount: "1" }),
    );

    expect(res.status).toBe(401);
  });

  it("serializes concurrent withdrawals of the full amount", async () => {
    const test = await fundedApp();

    const [first, second] = await Promise.all([
      withdraw(test, { amount: ONE_ETHER.toString() }),
      withdraw(test, { amount: ONE_ETHER.toString() }),
    ]);

    expect([first.status, second.status].sort()).toEqual([201, 422]);
    expect(test.vault.paidTo(ALICE)).toBe(ONE_ETHER);
  });
});
