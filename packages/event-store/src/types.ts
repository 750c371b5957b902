/**
 * @capstream/event-store — Core types.
 *
 * The ledger's event log: every registry, withdrawal and ownership change
 * is recorded once, in order, and chained to its predecessor by hash.
 */

import type { DomainEvent } from "@capstream/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A ledger event as recorded in the log.
 *
 * `version` counts events within one stream (a recipient's history, or
 * the ownership history); `globalPosition` counts across the whole log.
 * Both start at 1.
 */
export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  /** Log time, from the store's timestamp source. */
  readonly appendedAt: string;
}

/** A stored event with its link into the hash chain. */
export interface HashedStoredEvent extends StoredEvent {
  readonly hash: string;
  readonly previousHash: string;
}

// =============================================================================
// Reads
// =============================================================================

export interface ReadOptions {
  /** First stream version to return. Default 1. */
  readonly fromVersion?: number;
  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** First global position to return. Default 1. */
  readonly fromPosition?: number;
  readonly maxCount?: number;
}

export type EventHandler = (event: HashedStoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event before the first break (0 if none) */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only ledger event log.
 *
 * Invariants:
 * - Nothing appended is ever changed or removed
 * - Stream versions and global positions run 1, 2, 3, ... without gaps
 * - Subscribers see each event once, in global order, before `append` returns
 */
export interface EventStore {
  /** Record events on a stream and return them as stored. */
  append(streamId: string, events: readonly DomainEvent[]): readonly HashedStoredEvent[];

  /** One stream's events in version order (empty for an unknown stream). */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Every stream's events in global order. */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  /** Position of the last event, or 0 if the log is empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  constructor(code: EventStoreErrorCode, message: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
  }
}
