/**
 * Batch Ops — create or replace many streams in one call.
 *
 * Rules:
 * - Owner-only
 * - The three sequences must have equal length → INVALID_ARRAY_INPUT
 * - Every row is validated before the first write; any failure leaves
 *   the registry untouched
 * - Rows apply in index order; a recipient listed twice keeps the later row
 * - All rows share one clock reading and one correlation id
 */

import { randomUUID } from "node:crypto";
import type { StreamRecord } from "@capstream/types";
import type { AccessControl } from "./access-control.js";
import type { StreamRegistry } from "./registry.js";
import type { Clock, StreamGrant } from "./types.js";
import { StreamError } from "./errors.js";

export class BatchOps {
  private readonly registry: StreamRegistry;
  private readonly access: AccessControl;
  private readonly clock: Clock;

  constructor(registry: StreamRegistry, access: AccessControl, clock: Clock) {
    this.registry = registry;
    this.access = access;
    this.clock = clock;
  }

  addBatch(
    caller: string,
    recipients: readonly string[],
    caps: readonly bigint[],
    assets: readonly string[],
  ): readonly StreamRecord[] {
    this.access.requireOwner(caller);

    if (recipients.length !== caps.length || recipients.length !== assets.length) {
      throw new StreamError(
        "INVALID_ARRAY_INPUT",
        `Array lengths differ: ${recipients.length} recipients, ${caps.length} caps, ${assets.length} assets`,
      );
    }

    const grants: StreamGrant[] = recipients.map((recipient, i) => {
      const cap = caps[i];
      const asset = assets[i];
      if (cap === undefined || asset === undefined) {
        throw new StreamError("INVALID_ARRAY_INPUT", `Missing entry at index ${i}`);
      }
      try {
        return this.registry.validateGrant(recipient, cap, asset);
      } catch (err) {
        if (err instanceof StreamError) {
          throw new StreamError(err.code, `Batch row ${i}: ${err.message}`, { cause: err });
        }
        throw err;
      }
    });

    const now = this.clock.now();
    const owner = this.access.owner();
    const correlationId = `batch:${randomUUID()}`;
    return grants.map((grant) =>
      this.registry.applyGrant(grant, now, owner, correlationId),
    );
  }
}
