/**
 * In-memory StreamStore.
 *
 * Plain Map keyed by checksummed recipient address. Swap in another
 * StreamStore to persist elsewhere; accrual logic never touches storage.
 */

import type { Address, StreamRecord } from "@capstream/types";
import type { StreamStore } from "./types.js";

export class InMemoryStreamStore implements StreamStore {
  private readonly records = new Map<Address, StreamRecord>();

  get(recipient: Address): StreamRecord | undefined {
    return this.records.get(recipient);
  }

  set(recipient: Address, record: StreamRecord): void {
    this.records.set(recipient, record);
  }

  entries(): Iterable<readonly [Address, StreamRecord]> {
    return this.records.entries();
  }
}
