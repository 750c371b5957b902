/**
 * Access Control — single-owner capability.
 *
 * A standalone object holding the current owner. Components that need
 * gating receive it and call `requireOwner` explicitly.
 *
 * Rules:
 * - Exactly one owner at a time
 * - Ownership moves only by the current owner's hand
 * - Renouncing sets the owner to the zero address, permanently
 *   disabling every gated operation
 */

import { ZERO_ADDRESS } from "@capstream/types";
import type { Address } from "@capstream/types";
import type { EventStore } from "@capstream/event-store";
import {
  OWNERSHIP_STREAM_ID,
  STREAM_EVENTS,
  createStreamEvent,
} from "@capstream/event-store";
import { StreamError } from "./errors.js";
import { normalizeAddress } from "./address.js";
import { toIsoTimestamp } from "./clock.js";
import type { Clock } from "./types.js";

export class AccessControl {
  private current: Address;
  private readonly events: EventStore;
  private readonly clock: Clock;

  constructor(owner: string, events: EventStore, clock: Clock) {
    this.current = normalizeAddress(owner, "owner");
    this.events = events;
    this.clock = clock;
  }

  owner(): Address {
    return this.current;
  }

  isRenounced(): boolean {
    return this.current === ZERO_ADDRESS;
  }

  /**
   * Throws NOT_OWNER unless `caller` is the live owner.
   */
  requireOwner(caller: string): void {
    if (this.isRenounced()) {
      throw new StreamError("NOT_OWNER", "Ownership has been renounced");
    }
    if (normalizeAddress(caller, "caller") !== this.current) {
      throw new StreamError("NOT_OWNER", `'${caller}' is not the owner`);
    }
  }

  transferOwnership(caller: string, newOwner: string): Address {
    this.requireOwner(caller);
    const next = normalizeAddress(newOwner, "new owner");
    if (next === ZERO_ADDRESS) {
      throw new StreamError(
        "INVALID_ADDRESS",
        "New owner is the zero address; use renounceOwnership",
      );
    }
    this.setOwner(next);
    return next;
  }

  renounceOwnership(caller: string): void {
    this.requireOwner(caller);
    this.setOwner(ZERO_ADDRESS);
  }

  private setOwner(next: Address): void {
    const previous = this.current;
    this.current = next;
    this.events.append(OWNERSHIP_STREAM_ID, [
      createStreamEvent(
        STREAM_EVENTS.OWNERSHIP_TRANSFERRED,
        { previousOwner: previous, newOwner: next },
        { actor: previous, timestamp: toIsoTimestamp(this.clock.now()) },
      ),
    ]);
  }
}
