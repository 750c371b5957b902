/**
 * @capstream/event-store — Stream ledger event definitions.
 *
 * The records observers see when the ledger changes.
 *
 * Naming convention: `<entity>.<action>`
 *
 * Amounts and timestamps travel as decimal strings so payloads stay
 * JSON-safe and canonicalizable.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@capstream/types";

export const STREAM_EVENTS = {
  STREAM_CREATED_OR_REPLACED: "stream.created-or-replaced",
  STREAM_CAP_UPDATED: "stream.cap-updated",
  WITHDRAWN: "stream.withdrawn",
  OWNERSHIP_TRANSFERRED: "ownership.transferred",
} as const;

export type StreamEventType = (typeof STREAM_EVENTS)[keyof typeof STREAM_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export interface StreamCreatedOrReplacedPayload {
  readonly recipient: string;
  readonly cap: string;
  readonly asset: string;
}

export interface StreamCapUpdatedPayload {
  readonly recipient: string;
  readonly newCap: string;
}

export interface WithdrawnPayload {
  readonly recipient: string;
  readonly amount: string;
  readonly memo: string;
  /** "pending" when the transfer was broadcast but its receipt never arrived. */
  readonly settlement: "confirmed" | "pending";
  readonly txHash?: string;
}

export interface OwnershipTransferredPayload {
  readonly previousOwner: string;
  readonly newOwner: string;
}

interface PayloadByType {
  "stream.created-or-replaced": StreamCreatedOrReplacedPayload;
  "stream.cap-updated": StreamCapUpdatedPayload;
  "stream.withdrawn": WithdrawnPayload;
  "ownership.transferred": OwnershipTransferredPayload;
}

const SOURCE_BY_TYPE: Readonly<Record<StreamEventType, EventSource>> = {
  "stream.created-or-replaced": "registry",
  "stream.cap-updated": "registry",
  "stream.withdrawn": "withdrawals",
  "ownership.transferred": "access-control",
};

// =============================================================================
// Stream IDs
// =============================================================================

/** Event stream holding one recipient's history. */
export function recipientStreamId(recipient: string): string {
  return `stream:${recipient}`;
}

export const OWNERSHIP_STREAM_ID = "ownership";

// =============================================================================
// Factory
// =============================================================================

export interface StreamEventContext {
  readonly actor: string;
  readonly correlationId?: string;
  /** ISO 8601 time of the change, from the ledger's clock. */
  readonly timestamp: string;
}

/**
 * Build a typed domain event. The metadata source is derived from the type.
 */
export function createStreamEvent<T extends StreamEventType>(
  type: T,
  payload: PayloadByType[T],
  context: StreamEventContext,
): DomainEvent {
  const eventId = randomUUID();
  return {
    type,
    metadata: {
      eventId,
      timestamp: context.timestamp,
      actor: context.actor,
      correlationId: context.correlationId ?? eventId,
      source: SOURCE_BY_TYPE[type],
    },
    payload: { ...payload },
  };
}
