/**
 * @capstream/event-store — Hash chain.
 *
 *   hash(e₁) = sha256(jcs(e₁) ‖ "genesis")
 *   hash(eₙ) = sha256(jcs(eₙ) ‖ hash(eₙ₋₁))
 *
 * jcs is RFC 8785 canonical JSON of everything in the stored event except
 * its own link fields. Editing, dropping or reordering an event breaks the
 * chain at that position.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

export function computeEventHash(event: StoredEvent, previousHash: string): string {
  const { event: domainEvent, streamId, version, globalPosition, appendedAt } = event;
  const content = canonicalize({ event: domainEvent, streamId, version, globalPosition, appendedAt });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Check every link of a log given in global order. Each stored hash is
 * what the next event must point at, so one edited event is reported once.
 */
export function verifyHashChain(
  events: readonly HashedStoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let expectedPrevious = GENESIS_HASH;

  for (const stored of events) {
    const position = stored.globalPosition;
    if (stored.previousHash !== expectedPrevious) {
      errors.push({
        position,
        reason: `position ${position} links to "${stored.previousHash}", expected "${expectedPrevious}"`,
      });
    }
    const recomputed = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== recomputed) {
      errors.push({
        position,
        reason: `position ${position} content does not match its hash`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = position;
    }
    expectedPrevious = stored.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
