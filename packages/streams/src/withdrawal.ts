/**
 * Withdrawal Processor — recipient-initiated payouts.
 *
 * A withdrawal runs against one reading of the clock:
 * 1. The caller must have an active stream            → NO_ACTIVE_STREAM
 * 2. The amount must be positive                      → INVALID_AMOUNT
 * 3. The amount must be unlocked                      → NOT_ENOUGH_FUNDS_IN_STREAM
 * 4. The ledger must hold the amount of the asset     → NOT_ENOUGH_FUNDS_IN_CONTRACT
 * 5. The transfer must succeed                        → TRANSFER_FAILED
 *
 * The new checkpoint is computed before the transfer but written only
 * after it succeeds, or after the gateway reports it broadcast but
 * unconfirmed (TransferPendingError). Callers must not interleave other
 * ledger calls with a withdrawal in flight (StreamLedger serializes them).
 */

import type { Address, AssetId } from "@capstream/types";
import { NATIVE_ASSET } from "@capstream/types";
import type { EventStore } from "@capstream/event-store";
import {
  STREAM_EVENTS,
  createStreamEvent,
  recipientStreamId,
} from "@capstream/event-store";
import type { StreamRegistry } from "./registry.js";
import type { Clock, TransferGateway, WithdrawalReceipt } from "./types.js";
import { StreamError, TransferPendingError } from "./errors.js";
import { normalizeAddress } from "./address.js";
import { advanceCheckpoint, unlockedAmount } from "./accrual.js";
import { toIsoTimestamp } from "./clock.js";

type Settlement =
  | { readonly status: "confirmed" }
  | { readonly status: "pending"; readonly txHash: string };

export class WithdrawalProcessor {
  private readonly registry: StreamRegistry;
  private readonly gateway: TransferGateway;
  private readonly clock: Clock;
  private readonly events: EventStore;

  constructor(
    registry: StreamRegistry,
    gateway: TransferGateway,
    clock: Clock,
    events: EventStore,
  ) {
    this.registry = registry;
    this.gateway = gateway;
    this.clock = clock;
    this.events = events;
  }

  async withdraw(
    caller: string,
    amount: bigint,
    memo: string,
  ): Promise<WithdrawalReceipt> {
    const recipient = normalizeAddress(caller, "caller");
    const now = this.clock.now();
    const record = this.registry.get(recipient);

    if (record.cap === 0n) {
      throw new StreamError(
        "NO_ACTIVE_STREAM",
        `Recipient '${recipient}' has no active stream`,
      );
    }

    if (amount <= 0n) {
      throw new StreamError("INVALID_AMOUNT", "Withdrawal amount must be greater than zero");
    }

    // unlocked never exceeds cap, so this also bounds amount to uint256
    const totalUnlocked = unlockedAmount(record, now);
    if (amount > totalUnlocked) {
      throw new StreamError(
        "NOT_ENOUGH_FUNDS_IN_STREAM",
        `Requested ${amount.toString()} but only ${totalUnlocked.toString()} is unlocked`,
      );
    }

    const held = await this.gateway.balanceOf(record.asset);
    if (held < amount) {
      throw new StreamError(
        "NOT_ENOUGH_FUNDS_IN_CONTRACT",
        `Requested ${amount.toString()} but the ledger holds ${held.toString()} of ${record.asset}`,
      );
    }

    const last = advanceCheckpoint(record.last, now, amount, totalUnlocked);

    const settlement = await this.deliver(record.asset, recipient, amount);

    const updated = this.registry.setCheckpoint(recipient, last);
    const base = { recipient, amount: amount.toString(), memo };
    const payload =
      settlement.status === "pending"
        ? { ...base, settlement: settlement.status, txHash: settlement.txHash }
        : { ...base, settlement: settlement.status };
    this.events.append(recipientStreamId(recipient), [
      createStreamEvent(STREAM_EVENTS.WITHDRAWN, payload, {
        actor: recipient,
        timestamp: toIsoTimestamp(now),
      }),
    ]);

    return {
      recipient,
      asset: record.asset,
      amount,
      memo,
      previousLast: record.last,
      last: updated.last,
      remainingUnlocked: unlockedAmount(updated, now),
      withdrawnAt: now,
      ...settlement,
    };
  }

  private async deliver(asset: AssetId, to: Address, amount: bigint): Promise<Settlement> {
    let delivered: boolean;
    try {
      delivered =
        asset === NATIVE_ASSET
          ? await this.gateway.transferNative(to, amount)
          : await this.gateway.transferToken(asset, to, amount);
    } catch (err) {
      if (err instanceof TransferPendingError) {
        return { status: "pending", txHash: err.txHash };
      }
      throw new StreamError(
        "TRANSFER_FAILED",
        `Transfer of ${amount.toString()} ${asset} to '${to}' reverted`,
        { cause: err },
      );
    }
    if (!delivered) {
      throw new StreamError(
        "TRANSFER_FAILED",
        `Transfer of ${amount.toString()} ${asset} to '${to}' was refused`,
      );
    }
    return { status: "confirmed" };
  }
}
