/**
 * Time sources.
 */

import type { Clock } from "./types.js";

/** Wall-clock time in whole unix seconds. */
export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/** ISO-8601 form of a unix-seconds reading, for event metadata. */
export function toIsoTimestamp(seconds: bigint): string {
  return new Date(Number(seconds) * 1000).toISOString();
}

/**
 * A clock that only moves when told to. Refuses to go backwards.
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  advance(seconds: bigint): bigint {
    if (seconds < 0n) {
      throw new RangeError("ManualClock cannot move backwards");
    }
    this.current += seconds;
    return this.current;
  }

  set(timestamp: bigint): void {
    if (timestamp < this.current) {
      throw new RangeError("ManualClock cannot move backwards");
    }
    this.current = timestamp;
  }
}
