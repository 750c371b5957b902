/**
 * Tests for ledger event logging.
 */

import { describe, it, expect } from "vitest";
import { InMemoryVault, ManualClock, StreamLedger } from "@capstream/streams";
import { logLedgerEvents } from "../src/event-log.js";
import type { LedgerEventLogEntry } from "../src/event-log.js";
import { ALICE, BOB, NATIVE, OWNER, T0 } from "./setup.js";

function makeLedger(): StreamLedger {
  return new StreamLedger({
    owner: OWNER,
    gateway: new InMemoryVault(),
    clock: new ManualClock(T0),
  });
}

describe("logLedgerEvents", () => {
  it("logs each appended event", async () => {
    const ledger = makeLedger();
    const entries: LedgerEventLogEntry[] = [];
    logLedgerEvents(ledger.events(), (entry) => entries.push(entry));

    await ledger.createOrReplace(OWNER, ALICE, 1000n);

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      type: "stream.created-or-replaced",
      streamId: `stream:${ALICE}`,
      globalPosition: 1,
      actor: OWNER,
      payload: { recipient: ALICE, cap: "1000", asset: NATIVE },
    });
  });

  it("shares one correlation id across a batch", async () => {
    const ledger = makeLedger();
    const entries: LedgerEventLogEntry[] = [];
    logLedgerEvents(ledger.events(), (entry) => entries.push(entry));

    await ledger.addBatch(OWNER, [ALICE, BOB], [1n, 2n], [NATIVE, NATIVE]);

    expect(entries).toHaveLength(2);
    expect(entries[0]?.correlationId).toMatch(/^batch:/);
    expect(entries[1]?.correlationId).toBe(entries[0]?.correlationId);
  });

  it("stops after unsubscribe", async () => {
    const ledger = makeLedger();
    const entries: LedgerEventLogEntry[] = [];
    const subscription = logLedgerEvents(ledger.events(), (entry) => entries.push(entry));

    subscription.unsubscribe();
    await ledger.createOrReplace(OWNER, ALICE, 1000n);

    expect(entries).toEqual([]);
  });
});
