/**
 * Shared fixtures for stream ledger tests.
 *
 * Addresses are digits-only so their checksummed form equals the literal.
 */

import { InMemoryEventStore } from "@capstream/event-store";
import { AccessControl } from "../src/access-control.js";
import { StreamRegistry } from "../src/registry.js";
import { InMemoryStreamStore } from "../src/store.js";
import { ManualClock } from "../src/clock.js";
import { StreamError } from "../src/errors.js";
import type { StreamErrorCode } from "../src/errors.js";

export const OWNER = "0x1000000000000000000000000000000000000001";
export const ALICE = "0x2000000000000000000000000000000000000002";
export const BOB = "0x3000000000000000000000000000000000000003";
export const TOKEN = "0x4000000000000000000000000000000000000004";

/** 2023-11-14T22:13:20Z */
export const T0 = 1_700_000_000n;

export const ONE_ETHER = 10n ** 18n;

export function createRegistryFixture(start: bigint = T0) {
  const clock = new ManualClock(start);
  const events = new InMemoryEventStore();
  const access = new AccessControl(OWNER, events, clock);
  const store = new InMemoryStreamStore();
  const registry = new StreamRegistry(store, access, clock, events);
  return { clock, events, access, store, registry };
}

/** The code of the StreamError `fn` throws, or undefined if it returns. */
export function codeOf(fn: () => unknown): StreamErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof StreamError) return err.code;
    throw err;
  }
  return undefined;
}

/** The code of the StreamError `promise` rejects with, or undefined. */
export async function rejectionCode(
  promise: Promise<unknown>,
): Promise<StreamErrorCode | undefined> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof StreamError) return err.code;
    throw err;
  }
  return undefined;
}
