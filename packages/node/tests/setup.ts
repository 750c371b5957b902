/**
 * Test helpers for @capstream/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { InMemoryVault, ManualClock, StreamLedger } from "@capstream/streams";
import { NATIVE_ASSET } from "@capstream/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import { CALLER_HEADER } from "../src/middleware/auth.js";

export const OWNER = "0x1000000000000000000000000000000000000001";
export const ALICE = "0x2000000000000000000000000000000000000002";
export const BOB = "0x3000000000000000000000000000000000000003";
export const TOKEN = "0x4000000000000000000000000000000000000004";
export const NATIVE = NATIVE_ASSET;

export const T0 = 1_700_000_000n;
export const ONE_ETHER = 10n ** 18n;

export interface TestApp extends AppInstance {
  readonly vault: InMemoryVault;
  readonly clock: ManualClock;
}

/**
 * Create a test app over a fresh ledger owned by OWNER, an empty
 * in-memory vault and a clock stopped at T0.
 */
export function createTestApp(
  options: Omit<CreateAppOptions, "ledger"> = {},
): TestApp {
  const vault = new InMemoryVault();
  const clock = new ManualClock(T0);
  const ledger = new StreamLedger({ owner: OWNER, gateway: vault, clock });
  return { ...createApp({ ...options, ledger }), vault, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** Headers identifying the request as coming from `address` (open mode). */
export function callerHeaders(address: string): Record<string, string> {
  return { [CALLER_HEADER]: address };
}

export interface StreamBody {
  data: {
    recipient: string;
    cap: string;
    last: string;
    asset: string;
    unlocked: string;
  };
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
