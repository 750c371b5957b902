/**
 * Accrual Engine — pure conversion of elapsed time into entitlement.
 *
 *   elapsed  = min(now - last, STREAM_PERIOD)     (0 if last is in the future)
 *   unlocked = floor(cap * elapsed / STREAM_PERIOD)
 *
 * and the checkpoint rule applied after a withdrawal of `amount`:
 *
 *   last'    = last + ceil((now - last) * amount / unlocked)
 *
 * The ceiling means each withdrawal forfeits up to one second of accrual
 * (cap / STREAM_PERIOD units). Many small withdrawals forfeit it once
 * per withdrawal.
 *
 * Rules:
 * - cap === 0n (no stream) unlocks nothing
 * - unlocked never exceeds cap
 * - Accrual credit never extends beyond one full period
 * - All products are formed at full width (see uint-math)
 */

import type { StreamRecord } from "@capstream/types";
import { StreamError } from "./errors.js";
import { mulDiv, mulDivUp, minUint } from "./uint-math.js";

/** Duration over which a cap fully unlocks: 30 days, in seconds. */
export const STREAM_PERIOD = 2_592_000n;

/**
 * The checkpoint accrual is actually measured from: never more than one
 * period behind `now`.
 */
export function effectiveCheckpoint(last: bigint, now: bigint): bigint {
  return now - last > STREAM_PERIOD ? now - STREAM_PERIOD : last;
}

/**
 * Entitlement unlocked for `record` at `now`.
 */
export function unlockedAmount(record: StreamRecord, now: bigint): bigint {
  if (record.cap === 0n || now <= record.last) {
    return 0n;
  }
  const elapsed = minUint(now - record.last, STREAM_PERIOD);
  return mulDiv(record.cap, elapsed, STREAM_PERIOD);
}

/**
 * Checkpoint after withdrawing `amount` out of `totalUnlocked` at `now`.
 *
 * Moves the checkpoint forward by the withdrawn fraction of the credited
 * time, so recomputing at `now` yields `totalUnlocked - amount` (less at
 * most one second of accrual, since the advance rounds up). Withdrawing
 * everything lands exactly on `now`.
 */
export function advanceCheckpoint(
  last: bigint,
  now: bigint,
  amount: bigint,
  totalUnlocked: bigint,
): bigint {
  if (amount <= 0n || amount > totalUnlocked) {
    throw new StreamError(
      "INVALID_AMOUNT",
      `Cannot advance checkpoint for ${amount.toString()} of ${totalUnlocked.toString()} unlocked`,
    );
  }
  const from = effectiveCheckpoint(last, now);
  return from + mulDivUp(now - from, amount, totalUnlocked);
}
