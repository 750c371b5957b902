/**
 * Tests for AccessControl — single-owner gating and ownership moves.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ZERO_ADDRESS } from "@capstream/types";
import { InMemoryEventStore, OWNERSHIP_STREAM_ID } from "@capstream/event-store";
import { AccessControl } from "../src/access-control.js";
import { ManualClock } from "../src/clock.js";
import { ALICE, BOB, OWNER, T0, codeOf } from "./helpers.js";

describe("AccessControl", () => {
  let events: InMemoryEventStore;
  let clock: ManualClock;
  let access: AccessControl;

  beforeEach(() => {
    events = new InMemoryEventStore();
    clock = new ManualClock(T0);
    access = new AccessControl(OWNER, events, clock);
  });

  it("starts with the configured owner", () => {
    expect(access.owner()).toBe(OWNER);
    expect(access.isRenounced()).toBe(false);
  });

  it("rejects an invalid initial owner", () => {
    expect(codeOf(() => new AccessControl("not-an-address", events, clock))).toBe(
      "INVALID_ADDRESS",
    );
  });

  // ─── requireOwner ───────────────────────────────────────────────────

  describe("requireOwner", () => {
    it("admits the owner in any letter case", () => {
      const mixed = new AccessControl("0xabcdefabcdefabcdefabcdefabcdefabcdefabcd", events, clock);
      expect(() =>
        mixed.requireOwner("0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD"),
      ).not.toThrow();
    });

    it("rejects anyone else", () => {
      expect(codeOf(() => access.requireOwner(ALICE))).toBe("NOT_OWNER");
    });

    it("rejects a malformed caller", () => {
      expect(codeOf(() => access.requireOwner("0x1234"))).toBe("INVALID_ADDRESS");
    });
  });

  // ─── transferOwnership ──────────────────────────────────────────────

  describe("transferOwnership", () => {
    it("hands the capability to the new owner", () => {
      expect(access.transferOwnership(OWNER, ALICE)).toBe(ALICE);
      expect(access.owner()).toBe(ALICE);
      expect(codeOf(() => access.requireOwner(OWNER))).toBe("NOT_OWNER");
      expect(() => access.requireOwner(ALICE)).not.toThrow();
    });

    it("records the move on the ownership stream", () => {
      access.transferOwnership(OWNER, ALICE);

      const stored = events.read(OWNERSHIP_STREAM_ID);
      expect(stored).toHaveLength(1);
      expect(stored[0]?.event.type).toBe("ownership.transferred");
      expect(stored[0]?.event.payload).toEqual({
        previousOwner: OWNER,
        newOwner: ALICE,
      });
      expect(stored[0]?.event.metadata.actor).toBe(OWNER);
      expect(stored[0]?.event.metadata.source).toBe("access-control");
      expect(stored[0]?.event.metadata.timestamp).toBe("2023-11-14T22:13:20.000Z");
    });

    it("is owner-only", () => {
      expect(codeOf(() => access.transferOwnership(BOB, BOB))).toBe("NOT_OWNER");
      expect(codeOf(() => access.renounceOwnership(BOB))).toBe("NOT_OWNER");
      expect(access.owner()).toBe(OWNER);
      expect(events.globalPosition()).toBe(0);
    });

    it("refuses the zero address", () => {
      expect(codeOf(() => access.transferOwnership(OWNER, ZERO_ADDRESS))).toBe(
        "INVALID_ADDRESS",
      );
      expect(events.read(OWNERSHIP_STREAM_ID)).toEqual([]);
    });
  });

  // ─── renounceOwnership ──────────────────────────────────────────────

  describe("renounceOwnership", () => {
    it("leaves no one able to pass the gate", () => {
      access.renounceOwnership(OWNER);

      expect(access.isRenounced()).toBe(true);
      expect(access.owner()).toBe(ZERO_ADDRESS);
      expect(codeOf(() => access.requireOwner(OWNER))).toBe("NOT_OWNER");
      expect(codeOf(() => access.requireOwner(ZERO_ADDRESS))).toBe("NOT_OWNER");
      expect(codeOf(() => access.transferOwnership(ZERO_ADDRESS, ALICE))).toBe(
        "NOT_OWNER",
      );
    });

    it("records the renounce with the zero address as new owner", () => {
      access.renounceOwnership(OWNER);

      const [stored] = events.read(OWNERSHIP_STREAM_ID);
      expect(stored?.event.payload).toEqual({
        previousOwner: OWNER,
        newOwner: ZERO_ADDRESS,
      });
    });
  });
});
