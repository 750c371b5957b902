/**
 * StreamLedger — top-level coordinator.
 *
 * Composes:
 * - AccessControl: single-owner gate
 * - StreamRegistry: recipient → stream record
 * - BatchOps: bulk create/replace
 * - WithdrawalProcessor: recipient payouts through a TransferGateway
 * - EventStore: the emitted records
 *
 * Every mutating call goes through one SerialExecutor, so calls never
 * interleave, even across the awaited transfer of a withdrawal.
 */

import type { Address, StreamRecord, StreamView } from "@capstream/types";
import { isAddressLike, isSerializedStreamRecord } from "@capstream/types";
import { InMemoryEventStore } from "@capstream/event-store";
import type { EventStore } from "@capstream/event-store";
import type {
  Clock,
  StreamLedgerConfig,
  StreamLedgerSnapshot,
  WithdrawalReceipt,
} from "./types.js";
import { AccessControl } from "./access-control.js";
import { StreamRegistry } from "./registry.js";
import { BatchOps } from "./batch.js";
import { WithdrawalProcessor } from "./withdrawal.js";
import { InMemoryStreamStore } from "./store.js";
import { SerialExecutor } from "./serial.js";
import { systemClock, toIsoTimestamp } from "./clock.js";
import { StreamError } from "./errors.js";
import { normalizeAddress } from "./address.js";
import { parseTimestamp, parseUint } from "./uint-math.js";

// =============================================================================
// StreamLedger
// =============================================================================

export class StreamLedger {
  private readonly access: AccessControl;
  private readonly registry: StreamRegistry;
  private readonly batch: BatchOps;
  private readonly withdrawals: WithdrawalProcessor;
  private readonly eventStore: EventStore;
  private readonly clock: Clock;
  private readonly executor = new SerialExecutor();

  constructor(config: StreamLedgerConfig) {
    const clock = config.clock ?? systemClock;
    this.clock = clock;
    this.eventStore =
      config.events ??
      new InMemoryEventStore({ timestamp: () => toIsoTimestamp(clock.now()) });
    this.access = new AccessControl(config.owner, this.eventStore, clock);
    this.registry = new StreamRegistry(
      config.store ?? new InMemoryStreamStore(),
      this.access,
      clock,
      this.eventStore,
    );
    this.batch = new BatchOps(this.registry, this.access, clock);
    this.withdrawals = new WithdrawalProcessor(
      this.registry,
      config.gateway,
      clock,
      this.eventStore,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  owner(): Address {
    return this.access.owner();
  }

  getStream(recipient: string): StreamRecord {
    return this.registry.get(recipient);
  }

  unlocked(recipient: string): bigint {
    return this.registry.view(recipient).unlocked;
  }

  describe(recipient: string): StreamView {
    return this.registry.view(recipient);
  }

  /** Views for many recipients at one timestamp; unknown ones read as zero. */
  describeMany(recipients: readonly string[]): readonly StreamView[] {
    const addresses = recipients.map((r) => normalizeAddress(r, "recipient"));
    const now = this.clock.now();
    return addresses.map((r) => this.registry.view(r, now));
  }

  listStreams(): readonly StreamView[] {
    return this.registry.list();
  }

  events(): EventStore {
    return this.eventStore;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner operations
  // ───────────────────────────────────────────────────────────────────────

  createOrReplace(
    caller: string,
    recipient: string,
    cap: bigint,
    asset?: string,
  ): Promise<StreamRecord> {
    return this.executor.run(() =>
      this.registry.createOrReplace(caller, recipient, cap, asset),
    );
  }

  createIfAbsent(
    caller: string,
    recipient: string,
    cap: bigint,
    asset?: string,
  ): Promise<StreamRecord> {
    return this.executor.run(() =>
      this.registry.createIfAbsent(caller, recipient, cap, asset),
    );
  }

  updateCap(caller: string, recipient: string, newCap: bigint): Promise<StreamRecord> {
    return this.executor.run(() =>
      this.registry.updateCap(caller, recipient, newCap),
    );
  }

  addBatch(
    caller: string,
    recipients: readonly string[],
    caps: readonly bigint[],
    assets: readonly string[],
  ): Promise<readonly StreamRecord[]> {
    return this.executor.run(() =>
      this.batch.addBatch(caller, recipients, caps, assets),
    );
  }

  transferOwnership(caller: string, newOwner: string): Promise<Address> {
    return this.executor.run(() => this.access.transferOwnership(caller, newOwner));
  }

  renounceOwnership(caller: string): Promise<void> {
    return this.executor.run(() => this.access.renounceOwnership(caller));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recipient operations
  // ───────────────────────────────────────────────────────────────────────

  withdraw(caller: string, amount: bigint, memo = ""): Promise<WithdrawalReceipt> {
    return this.executor.run(() => this.withdrawals.withdraw(caller, amount, memo));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): StreamLedgerSnapshot {
    return {
      version: 1,
      owner: this.access.owner(),
      streams: this.registry.list().map((view) => ({
        recipient: view.recipient,
        cap: view.cap.toString(),
        last: view.last.toString(),
        asset: view.asset,
      })),
      asOf: toIsoTimestamp(this.clock.now()),
    };
  }

  /**
   * Rebuild a ledger from a snapshot. The snapshot's owner wins over any
   * owner in `config`; a renounced owner stays renounced.
   */
  static fromSnapshot(
    snap: unknown,
    config: Omit<StreamLedgerConfig, "owner">,
  ): StreamLedger {
    const parsed = parseSnapshot(snap);
    let owner: Address;
    let records: [Address, StreamRecord][];
    try {
      owner = normalizeAddress(parsed.owner, "owner");
      records = parsed.streams.map((entry): [Address, StreamRecord] => [
        normalizeAddress(entry.recipient, "recipient"),
        {
          cap: parseUint(entry.cap, "cap"),
          last: parseTimestamp(entry.last, "last"),
          asset: normalizeAddress(entry.asset, "asset"),
        },
      ]);
    } catch (err) {
      if (err instanceof StreamError) {
        throw new StreamError("INVALID_SNAPSHOT", `Snapshot rejected: ${err.message}`, {
          cause: err,
        });
      }
      throw err;
    }
    const store = config.store ?? new InMemoryStreamStore();
    for (const [recipient, record] of records) {
      store.set(recipient, record);
    }
    return new StreamLedger({ ...config, owner, store });
  }
}

function parseSnapshot(snap: unknown): StreamLedgerSnapshot {
  if (snap === null || typeof snap !== "object") {
    throw new StreamError("INVALID_SNAPSHOT", "Snapshot must be an object");
  }
  const v = snap as Record<string, unknown>;
  if (v.version !== 1) {
    throw new StreamError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(v.version)}`);
  }
  if (!isAddressLike(v.owner)) {
    throw new StreamError("INVALID_SNAPSHOT", "Snapshot owner is not an address");
  }
  if (!Array.isArray(v.streams) || !v.streams.every(isSerializedStreamRecord)) {
    throw new StreamError("INVALID_SNAPSHOT", "Snapshot streams are malformed");
  }
  if (typeof v.asOf !== "string") {
    throw new StreamError("INVALID_SNAPSHOT", "Snapshot asOf must be a string");
  }
  return { version: 1, owner: v.owner, streams: v.streams, asOf: v.asOf };
}
