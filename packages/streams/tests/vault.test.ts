/**
 * Tests for InMemoryVault.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NATIVE_ASSET } from "@capstream/types";
import { InMemoryVault } from "../src/vault.js";
import { ALICE, BOB, TOKEN, codeOf } from "./helpers.js";

describe("InMemoryVault", () => {
  let vault: InMemoryVault;

  beforeEach(() => {
    vault = new InMemoryVault();
  });

  it("accumulates deposits per asset", () => {
    vault.deposit(NATIVE_ASSET, 100n);
    expect(vault.deposit(NATIVE_ASSET, 50n)).toBe(150n);
    expect(vault.holdings(TOKEN)).toBe(0n);
  });

  it("rejects negative deposits", () => {
    expect(codeOf(() => vault.deposit(NATIVE_ASSET, -1n))).toBe("ARITHMETIC_OVERFLOW");
  });

  it("moves funds and records the payout", async () => {
    vault.deposit(TOKEN, 100n);

    expect(await vault.transferToken(TOKEN, ALICE, 60n)).toBe(true);
    expect(await vault.balanceOf(TOKEN)).toBe(40n);
    expect(vault.paidTo(ALICE, TOKEN)).toBe(60n);
    expect(vault.paidTo(ALICE)).toBe(0n);
  });

  it("reports failure when holdings are short", async () => {
    vault.deposit(NATIVE_ASSET, 10n);
    expect(await vault.transferNative(ALICE, 11n)).toBe(false);
    expect(vault.holdings(NATIVE_ASSET)).toBe(10n);
  });

  it("throws for a recipient blocked in revert mode", async () => {
    vault.deposit(NATIVE_ASSET, 10n);
    vault.blockRecipient(ALICE);

    await expect(vault.transferNative(ALICE, 1n)).rejects.toThrow("rejected the transfer");
    expect(await vault.transferNative(BOB, 1n)).toBe(true);
  });

  it("returns false for a recipient blocked in return-false mode", async () => {
    vault.deposit(NATIVE_ASSET, 10n);
    vault.blockRecipient(ALICE, "return-false");

    expect(await vault.transferNative(ALICE, 1n)).toBe(false);
    vault.unblockRecipient(ALICE);
    expect(await vault.transferNative(ALICE, 1n)).toBe(true);
  });

  it("moves the funds but withholds confirmation in unconfirmed mode", async () => {
    vault.deposit(NATIVE_ASSET, 10n);
    vault.blockRecipient(ALICE, "unconfirmed");

    await expect(vault.transferNative(ALICE, 4n)).rejects.toMatchObject({
      name: "TransferPendingError",
      txHash: "memory-1",
    });
    expect(vault.paidTo(ALICE)).toBe(4n);
    expect(vault.holdings(NATIVE_ASSET)).toBe(6n);
  });
});
