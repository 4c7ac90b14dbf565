/**
 * @popchain/event-store: Hash chain for the tamper-evident audit log.
 *
 * An event's hash is SHA-256 over the RFC 8785 (JCS) canonical form of
 * the event together with its predecessor's hash:
 *
 *   hash[1] = sha256(jcs({ ...event[1], previousHash: "genesis" }))
 *   hash[n] = sha256(jcs({ ...event[n], previousHash: hash[n - 1] }))
 *
 * Editing, dropping or reordering any event breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnchainedEvent,
} from "./types.js";

/** `previousHash` of the event at global position 1. */
export const GENESIS_HASH = "genesis";

/**
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(event: UnchainedEvent, previousHash: string): string {
  const content = canonicalize({
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
    event: event.event,
    previousHash,
  });
  return createHash("sha256").update(content).digest("hex");
}

/** Attach `hash` and `previousHash` to an event. */
export function linkEvent(event: UnchainedEvent, previousHash: string): StoredEvent {
  return { ...event, hash: computeEventHash(event, previousHash), previousHash };
}

/**
 * Check every link of a log given in global position order.
 * Each broken event is reported once, with the first reason found.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;

  for (const stored of events) {
    const reason = brokenLink(stored, expectedPrevious);
    if (reason !== undefined) {
      errors.push({ position: stored.globalPosition, reason });
    }
    expectedPrevious = stored.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition: events.at(-1)?.globalPosition ?? 0,
    errors,
  };
}

function brokenLink(stored: StoredEvent, expectedPrevious: string): string | undefined {
  const at = stored.globalPosition;
  if (stored.previousHash !== expectedPrevious) {
    return `previousHash mismatch at position ${at}: expected "${expectedPrevious}", got "${stored.previousHash}"`;
  }
  const recomputed = computeEventHash(stored, stored.previousHash);
  if (stored.hash !== recomputed) {
    return `Hash mismatch at position ${at}: expected "${recomputed}", got "${stored.hash}"`;
  }
  return undefined;
}
