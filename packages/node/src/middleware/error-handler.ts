/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (StreamError, ApiError) to appropriate
 * HTTP status codes.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { StreamError } from "@capstream/streams";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Stream ledger errors
  NO_ACTIVE_STREAM: 404,
  NOT_ENOUGH_FUNDS_IN_STREAM: 422,
  NOT_ENOUGH_FUNDS_IN_CONTRACT: 422,
  TRANSFER_FAILED: 502,
  INVALID_ARRAY_INPUT: 400,
  NOT_OWNER: 403,
  INVALID_ADDRESS: 400,
  INVALID_CAP: 400,
  INVALID_AMOUNT: 400,
  STREAM_EXISTS: 409,
  ARITHMETIC_OVERFLOW: 400,
  INVALID_SNAPSHOT: 400,

  // API errors
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
};

function domainCode(err: Error): string | undefined {
  if (err instanceof StreamError || err instanceof ApiError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

export type UnexpectedErrorFn = (err: Error, requestId: string) => void;

/**
 * Create the global error handler. Registered as Hono's onError handler.
 *
 * Errors without a mapped code become 500s; they are passed to `report`
 * and their message is not sent to the client.
 */
export function createErrorHandler(
  report?: UnexpectedErrorFn,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const code = domainCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status === 500) {
      report?.(err, c.get("requestId"));
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
