/**
 * Stream Registry — recipient → stream record.
 *
 * Rules:
 * - One record per recipient; creating again replaces it wholesale
 *   (cap, checkpoint and asset), forfeiting unwithdrawn accrual
 * - A fresh record starts one full period in the past, so its whole cap
 *   is immediately withdrawable
 * - Cap updates keep the checkpoint; they never reset accrual
 * - cap === 0n means "no stream"; it cannot be written
 * - All writes are owner-gated through AccessControl
 */

import { EMPTY_STREAM, NATIVE_ASSET } from "@capstream/types";
import type { Address, StreamRecord, StreamView } from "@capstream/types";
import type { EventStore } from "@capstream/event-store";
import {
  STREAM_EVENTS,
  createStreamEvent,
  recipientStreamId,
} from "@capstream/event-store";
import type { AccessControl } from "./access-control.js";
import type { Clock, StreamGrant, StreamStore } from "./types.js";
import { StreamError } from "./errors.js";
import { normalizeAddress } from "./address.js";
import { STREAM_PERIOD, unlockedAmount } from "./accrual.js";
import { toIsoTimestamp } from "./clock.js";
import { toUint256 } from "./uint-math.js";

export class StreamRegistry {
  private readonly store: StreamStore;
  private readonly access: AccessControl;
  private readonly clock: Clock;
  private readonly events: EventStore;

  constructor(
    store: StreamStore,
    access: AccessControl,
    clock: Clock,
    events: EventStore,
  ) {
    this.store = store;
    this.access = access;
    this.clock = clock;
    this.events = events;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  /**
   * The recipient's record, or the zero record if they never had one.
   */
  get(recipient: string): StreamRecord {
    return this.store.get(normalizeAddress(recipient, "recipient")) ?? EMPTY_STREAM;
  }

  view(recipient: string, now: bigint = this.clock.now()): StreamView {
    const address = normalizeAddress(recipient, "recipient");
    const record = this.store.get(address) ?? EMPTY_STREAM;
    return {
      recipient: address,
      ...record,
      unlocked: unlockedAmount(record, now),
    };
  }

  /** Every recipient with an active stream, in insertion order. */
  list(now: bigint = this.clock.now()): readonly StreamView[] {
    const views: StreamView[] = [];
    for (const [recipient, record] of this.store.entries()) {
      if (record.cap === 0n) continue;
      views.push({ recipient, ...record, unlocked: unlockedAmount(record, now) });
    }
    return views;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner writes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a stream, replacing any existing one for the recipient.
   */
  createOrReplace(
    caller: string,
    recipient: string,
    cap: bigint,
    asset: string = NATIVE_ASSET,
  ): StreamRecord {
    this.access.requireOwner(caller);
    const grant = this.validateGrant(recipient, cap, asset);
    return this.applyGrant(grant, this.clock.now(), this.access.owner());
  }

  /**
   * Create a stream only if the recipient has none. STREAM_EXISTS otherwise.
   */
  createIfAbsent(
    caller: string,
    recipient: string,
    cap: bigint,
    asset: string = NATIVE_ASSET,
  ): StreamRecord {
    this.access.requireOwner(caller);
    const grant = this.validateGrant(recipient, cap, asset);
    const existing = this.store.get(grant.recipient);
    if (existing !== undefined && existing.cap !== 0n) {
      throw new StreamError(
        "STREAM_EXISTS",
        `Recipient '${grant.recipient}' already has an active stream`,
      );
    }
    return this.applyGrant(grant, this.clock.now(), this.access.owner());
  }

  /**
   * Change the cap of an existing stream. The checkpoint is untouched.
   */
  updateCap(caller: string, recipient: string, newCap: bigint): StreamRecord {
    this.access.requireOwner(caller);
    const address = normalizeAddress(recipient, "recipient");
    assertCap(newCap);

    const record = this.store.get(address);
    if (record === undefined || record.cap === 0n) {
      throw new StreamError(
        "NO_ACTIVE_STREAM",
        `Recipient '${address}' has no active stream`,
      );
    }

    const updated: StreamRecord = { ...record, cap: newCap };
    this.store.set(address, updated);
    this.events.append(recipientStreamId(address), [
      createStreamEvent(
        STREAM_EVENTS.STREAM_CAP_UPDATED,
        { recipient: address, newCap: newCap.toString() },
        { actor: this.access.owner(), timestamp: toIsoTimestamp(this.clock.now()) },
      ),
    ]);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal (BatchOps, WithdrawalProcessor)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Validate and normalise one grant without writing anything.
   */
  validateGrant(recipient: string, cap: bigint, asset: string): StreamGrant {
    assertCap(cap);
    return {
      recipient: normalizeAddress(recipient, "recipient"),
      cap,
      asset: normalizeAddress(asset, "asset"),
    };
  }

  /**
   * Write a validated grant as a fresh stream. Callers own the
   * authorization check.
   */
  applyGrant(
    grant: StreamGrant,
    now: bigint,
    actor: Address,
    correlationId?: string,
  ): StreamRecord {
    const record: StreamRecord = {
      cap: grant.cap,
      last: now - STREAM_PERIOD,
      asset: grant.asset,
    };
    this.store.set(grant.recipient, record);
    this.events.append(recipientStreamId(grant.recipient), [
      createStreamEvent(
        STREAM_EVENTS.STREAM_CREATED_OR_REPLACED,
        {
          recipient: grant.recipient,
          cap: grant.cap.toString(),
          asset: grant.asset,
        },
        correlationId !== undefined
          ? { actor, correlationId, timestamp: toIsoTimestamp(now) }
          : { actor, timestamp: toIsoTimestamp(now) },
      ),
    ]);
    return record;
  }

  /**
   * Move a recipient's checkpoint. Cap and asset are kept.
   */
  setCheckpoint(recipient: Address, last: bigint): StreamRecord {
    const record = this.store.get(recipient);
    if (record === undefined || record.cap === 0n) {
      throw new StreamError(
        "NO_ACTIVE_STREAM",
        `Recipient '${recipient}' has no active stream`,
      );
    }
    const updated: StreamRecord = { ...record, last };
    this.store.set(recipient, updated);
    return updated;
  }
}

function assertCap(cap: bigint): void {
  if (cap <= 0n) {
    throw new StreamError("INVALID_CAP", "Cap must be greater than zero");
  }
  try {
    toUint256(cap, "cap");
  } catch (err) {
    throw new StreamError("INVALID_CAP", `Cap ${cap.toString()} exceeds uint256`, {
      cause: err,
    });
  }
}
