/**
 * Ledger event logging.
 *
 * Forwards every event the ledger appends to a log function, one
 * structured entry per event. main.ts wires this to pino.
 */

import type { EventStore, Subscription } from "@capstream/event-store";

export interface LedgerEventLogEntry {
  readonly type: string;
  readonly streamId: string;
  readonly globalPosition: number;
  readonly actor: string;
  readonly correlationId: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

export function logLedgerEvents(
  events: EventStore,
  log: (entry: LedgerEventLogEntry) => void,
): Subscription {
  return events.subscribeAll((stored) => {
    log({
      type: stored.event.type,
      streamId: stored.streamId,
      globalPosition: stored.globalPosition,
      actor: stored.event.metadata.actor,
      correlationId: stored.event.metadata.correlationId,
      payload: stored.event.payload,
    });
  });
}
