/**
 * @capstream/event-store — In-memory event log.
 *
 * Holds the whole log in one array with a per-stream index. Nothing is
 * durable; a restarted ledger starts a new log from its snapshot.
 */

import type { DomainEvent } from "@capstream/types";
import type {
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Defaults to wall-clock ISO time. */
  readonly timestamp?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly log: HashedStoredEvent[] = [];
  private readonly byStream = new Map<string, HashedStoredEvent[]>();
  private readonly handlers = new Set<EventHandler>();
  private readonly timestamp: () => string;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this.timestamp = options.timestamp ?? (() => new Date().toISOString());
  }

  append(streamId: string, events: readonly DomainEvent[]): readonly HashedStoredEvent[] {
    if (streamId === "") {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", `Nothing to append to "${streamId}"`);
    }

    const history = this.byStream.get(streamId) ?? [];
    const appendedAt = this.timestamp();
    const appended: HashedStoredEvent[] = [];

    for (const event of events) {
      const previous = appended[appended.length - 1] ?? this.log[this.log.length - 1];
      const unhashed: StoredEvent = {
        event,
        streamId,
        version: history.length + appended.length + 1,
        globalPosition: this.log.length + appended.length + 1,
        appendedAt,
      };
      const previousHash = previous?.hash ?? GENESIS_HASH;
      appended.push({
        ...unhashed,
        hash: computeEventHash(unhashed, previousHash),
        previousHash,
      });
    }

    history.push(...appended);
    this.byStream.set(streamId, history);
    this.log.push(...appended);

    for (const stored of appended) {
      for (const handler of this.handlers) handler(stored);
    }
    return appended;
  }

  read(streamId: string, options: ReadOptions = {}): readonly HashedStoredEvent[] {
    const history = this.byStream.get(streamId) ?? [];
    const from = Math.max(options.fromVersion ?? 1, 1);
    return window(history, from - 1, options.maxCount);
  }

  readAll(options: ReadAllOptions = {}): readonly HashedStoredEvent[] {
    const from = Math.max(options.fromPosition ?? 1, 1);
    return window(this.log, from - 1, options.maxCount);
  }

  subscribeAll(handler: EventHandler): Subscription {
    this.handlers.add(handler);
    return {
      unsubscribe: () => {
        this.handlers.delete(handler);
      },
    };
  }

  globalPosition(): number {
    return this.log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this.log);
  }
}

// Versions and positions are dense, so index = number - 1.
function window<T>(items: readonly T[], start: number, maxCount: number | undefined): T[] {
  const end = maxCount === undefined ? undefined : start + Math.max(maxCount, 0);
  return items.slice(start, end);
}
