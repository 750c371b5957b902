/**
 * Caller identity middleware.
 *
 * Two modes:
 * 1. Secured: X-Api-Key header → looked up in the configured key registry,
 *    which maps each key to the address it acts for
 * 2. Open (tests, dev): the X-Caller-Address header is taken as given
 *
 * Sets `c.set("caller", address | undefined)`. Requests without an
 * identity may still read; write handlers call `requireCaller`.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@capstream/types";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller-Address";

export interface AuthConfig {
  /** Map of API key → the address it acts for */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

/**
 * Create the caller middleware. Without `config`, runs in open mode.
 * An unknown API key is rejected with 401.
 */
export function callerMiddleware(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (config === undefined) {
      c.set("caller", c.req.header(CALLER_HEADER));
      return next();
    }

    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      c.set("caller", undefined);
      return next();
    }

    const address = config.apiKeys.get(apiKey);
    if (address === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("caller", address);
    return next();
  };
}

/**
 * The caller's address, or an UNAUTHORIZED ApiError.
 * Takes `c.get("caller")`.
 */
export function requireCaller(caller: string | undefined): string {
  if (caller === undefined) {
    throw new ApiError("UNAUTHORIZED", "Caller identity required");
  }
  return caller;
}
