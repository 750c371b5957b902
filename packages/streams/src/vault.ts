/**
 * In-memory vault — a TransferGateway over plain balances.
 *
 * Holds the ledger's funds per asset and records what each recipient
 * has been paid. Used by tests, local development and the demo server.
 *
 * Recipients can be blocked to mimic funds a recipient contract rejects
 * ("revert"), a token that reports failure without reverting
 * ("return-false"), or a transfer that goes out but is never confirmed
 * ("unconfirmed").
 */

import { NATIVE_ASSET } from "@capstream/types";
import type { Address, AssetId } from "@capstream/types";
import type { TransferGateway } from "./types.js";
import { normalizeAddress } from "./address.js";
import { checkedAdd, checkedSub, toUint256 } from "./uint-math.js";
import { TransferPendingError } from "./errors.js";

export type BlockMode = "revert" | "return-false" | "unconfirmed";

export class InMemoryVault implements TransferGateway {
  private readonly balances = new Map<AssetId, bigint>();
  private readonly paid = new Map<string, bigint>();
  private readonly blocked = new Map<Address, BlockMode>();
  private transfers = 0;

  // ───────────────────────────────────────────────────────────────────────
  // Funding
  // ───────────────────────────────────────────────────────────────────────

  deposit(asset: string, amount: bigint): bigint {
    const id = normalizeAddress(asset, "asset");
    const next = checkedAdd(this.holdings(id), toUint256(amount, "deposit"));
    this.balances.set(id, next);
    return next;
  }

  holdings(asset: string): bigint {
    return this.balances.get(normalizeAddress(asset, "asset")) ?? 0n;
  }

  paidTo(recipient: string, asset: string = NATIVE_ASSET): bigint {
    return this.paid.get(payoutKey(
      normalizeAddress(asset, "asset"),
      normalizeAddress(recipient, "recipient"),
    )) ?? 0n;
  }

  blockRecipient(recipient: string, mode: BlockMode = "revert"): void {
    this.blocked.set(normalizeAddress(recipient, "recipient"), mode);
  }

  unblockRecipient(recipient: string): void {
    this.blocked.delete(normalizeAddress(recipient, "recipient"));
  }

  // ───────────────────────────────────────────────────────────────────────
  // TransferGateway
  // ───────────────────────────────────────────────────────────────────────

  async transferNative(to: Address, amount: bigint): Promise<boolean> {
    return this.move(NATIVE_ASSET, to, amount);
  }

  async transferToken(token: AssetId, to: Address, amount: bigint): Promise<boolean> {
    return this.move(token, to, amount);
  }

  async balanceOf(asset: AssetId): Promise<bigint> {
    return this.holdings(asset);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private move(asset: AssetId, to: Address, amount: bigint): boolean {
    const recipient = normalizeAddress(to, "recipient");
    const mode = this.blocked.get(recipient);
    if (mode === "revert") {
      throw new Error(`Recipient '${recipient}' rejected the transfer`);
    }
    if (mode === "return-false") {
      return false;
    }

    const held = this.holdings(asset);
    if (held < amount) {
      return false;
    }

    this.balances.set(asset, checkedSub(held, amount));
    const key = payoutKey(asset, recipient);
    this.paid.set(key, checkedAdd(this.paid.get(key) ?? 0n, amount));
    this.transfers += 1;
    if (mode === "unconfirmed") {
      throw new TransferPendingError(`memory-${this.transfers}`);
    }
    return true;
  }
}

function payoutKey(asset: AssetId, recipient: Address): string {
  return `${asset}:${recipient}`;
}
