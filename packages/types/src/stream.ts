/**
 * Stream Types
 *
 * Capped, linearly-vesting payment streams.
 *
 * Rules:
 * - Amounts and timestamps are bigint (uint256 smallest units, unix seconds)
 * - One record per recipient; the recipient address is the key
 * - cap === 0n means "no active stream"
 */

/** A 20-byte hex address (EIP-55 checksummed once normalised). */
export type Address = `0x${string}`;

/**
 * The asset a stream pays out in.
 * NATIVE_ASSET (the zero address) means the chain's native currency;
 * anything else is the address of a fungible-token contract.
 */
export type AssetId = Address;

/** Sentinel asset id for the chain's native currency. */
export const NATIVE_ASSET: AssetId = "0x0000000000000000000000000000000000000000";

/** The null identity (renounced owner, unset asset). */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** A recipient's stream, as held in the registry. */
export interface StreamRecord {
  /** Maximum amount unlockable under the current stream generation. */
  readonly cap: bigint;

  /**
   * Checkpoint (unix seconds) from which accrual is measured.
   * Not a literal "last withdrawal" time once partial withdrawals occur.
   */
  readonly last: bigint;

  readonly asset: AssetId;
}

/** The record returned for recipients that have never had a stream. */
export const EMPTY_STREAM: StreamRecord = {
  cap: 0n,
  last: 0n,
  asset: NATIVE_ASSET,
};

/**
 * JSON-safe stream record (bigints as decimal strings).
 * Used by snapshots and the HTTP surface.
 */
export interface SerializedStreamRecord {
  readonly recipient: string;
  readonly cap: string;
  readonly last: string;
  readonly asset: string;
}

/** A read view of one recipient's stream at a point in time. */
export interface StreamView {
  readonly recipient: Address;
  readonly cap: bigint;
  readonly last: bigint;
  readonly asset: AssetId;
  readonly unlocked: bigint;
}
