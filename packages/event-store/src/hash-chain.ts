/**
 * @navsync/event-store — Hash chain over the pool journal.
 *
 *   hash[0] = sha256(canonicalize(event[0]) + "genesis")
 *   hash[n] = sha256(canonicalize(event[n]) + hash[n-1])
 *
 * Canonical form is RFC 8785 (JCS), so key order never affects a hash.
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

export function computeEventHash(stored: StoredEvent, previousHash: string): string {
  const { event, streamId, version, globalPosition, appendedAt } = stored;
  const content = canonicalize({
    event: { type: event.type, metadata: event.metadata, payload: event.payload },
    streamId,
    version,
    globalPosition,
    appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Attach the chain link that follows `previousHash`.
 */
export function linkEvent(stored: StoredEvent, previousHash: string): HashedStoredEvent {
  return { ...stored, hash: computeEventHash(stored, previousHash), previousHash };
}

/**
 * Check a sequence of events in global order, starting from genesis.
 * Every broken link and every content mismatch is reported.
 */
export function verifyHashChain(events: readonly HashedStoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    const position = stored.globalPosition;
    if (stored.previousHash !== expectedPrevious) {
      errors.push({
        position,
        reason: `previousHash mismatch at position ${String(position)}: expected "${expectedPrevious}", got "${stored.previousHash}"`,
      });
    }
    const recomputed = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== recomputed) {
      errors.push({
        position,
        reason: `Hash mismatch at position ${String(position)}: expected "${recomputed}", got "${stored.hash}"`,
      });
    }
    expectedPrevious = stored.hash;
    lastVerifiedPosition = position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
