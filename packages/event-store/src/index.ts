/**
 * @capstream/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore, the ledger's append-only log, and its in-memory implementation
 * - Hash-chain verification for tamper evidence
 * - Stream ledger event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Stream ledger events
export {
  STREAM_EVENTS,
  OWNERSHIP_STREAM_ID,
  recipientStreamId,
  createStreamEvent,
} from "./stream-events.js";
export type {
  StreamEventType,
  StreamEventContext,
  StreamCreatedOrReplacedPayload,
  StreamCapUpdatedPayload,
  WithdrawnPayload,
  OwnershipTransferredPayload,
} from "./stream-events.js";
