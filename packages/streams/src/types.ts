/**
 * @capstream/streams domain types.
 *
 * The stream ledger manages capped, linearly-vesting payouts:
 * - An owner grants recipients a cap in one asset each
 * - The cap unlocks continuously over STREAM_PERIOD
 * - Recipients withdraw unlocked funds, bounded by what the ledger holds
 *
 * Collaborators (storage, transfers, time) are injected behind the
 * interfaces below.
 */

import type { Address, AssetId, StreamRecord } from "@capstream/types";
import type { EventStore } from "@capstream/event-store";

// =============================================================================
// Collaborators
// =============================================================================

/** Monotonically non-decreasing time source, in unix seconds. */
export interface Clock {
  now(): bigint;
}

/**
 * Storage for stream records, keyed by checksummed recipient address.
 * `get` returns undefined for recipients that were never written.
 */
export interface StreamStore {
  get(recipient: Address): StreamRecord | undefined;
  set(recipient: Address, record: StreamRecord): void;
  entries(): Iterable<readonly [Address, StreamRecord]>;
}

/**
 * Moves funds out of the ledger's holdings.
 *
 * A `false` result and a rejected promise are both failures with no
 * funds moved, except a rejection with TransferPendingError: the
 * transfer left the ledger and only its confirmation is missing.
 */
export interface TransferGateway {
  transferNative(to: Address, amount: bigint): Promise<boolean>;
  transferToken(token: AssetId, to: Address, amount: bigint): Promise<boolean>;
  /** The ledger's own holdings of an asset. */
  balanceOf(asset: AssetId): Promise<bigint>;
}

// =============================================================================
// Operation inputs / results
// =============================================================================

/** One row of a batch create. */
export interface StreamGrant {
  readonly recipient: Address;
  readonly cap: bigint;
  readonly asset: AssetId;
}

export interface WithdrawalReceipt {
  readonly recipient: Address;
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly memo: string;
  /** Checkpoint before the withdrawal. */
  readonly previousLast: bigint;
  /** Checkpoint after the withdrawal. */
  readonly last: bigint;
  /** Unlocked entitlement left at the withdrawal timestamp. */
  readonly remainingUnlocked: bigint;
  readonly withdrawnAt: bigint;
  /** "pending" when the transfer was broadcast but not confirmed. */
  readonly status: "confirmed" | "pending";
  readonly txHash?: string;
}

// =============================================================================
// Ledger config & snapshot
// =============================================================================

export interface StreamLedgerConfig {
  readonly owner: Address;
  readonly gateway: TransferGateway;
  readonly clock?: Clock;
  readonly store?: StreamStore;
  readonly events?: EventStore;
}

export interface StreamLedgerSnapshot {
  readonly version: 1;
  readonly owner: string;
  readonly streams: readonly {
    readonly recipient: string;
    readonly cap: string;
    readonly last: string;
    readonly asset: string;
  }[];
  readonly asOf: string;
}
