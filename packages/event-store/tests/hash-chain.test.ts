/**
 * Tests for the event store hash chain: tamper-evident audit log.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@popchain/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { PendingEvent, StoredEvent, UnchainedEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0xfeed",
      correlationId: "tx-1",
      source: "certificates",
    },
    payload,
  };
}

function inStream(streamId: string, events: readonly DomainEvent[]): PendingEvent[] {
  return events.map((event) => ({ streamId, event }));
}

const UNCHAINED: UnchainedEvent = {
  event: makeEvent("test", { x: 1 }),
  streamId: "s",
  version: 1,
  globalPosition: 1,
  appendedAt: "2025-01-01T00:00:00.000Z",
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(UNCHAINED, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeEventHash(UNCHAINED, GENESIS_HASH)).toBe(
      computeEventHash(UNCHAINED, GENESIS_HASH),
    );
  });

  it("depends on the previous hash", () => {
    expect(computeEventHash(UNCHAINED, GENESIS_HASH)).not.toBe(
      computeEventHash(UNCHAINED, "other"),
    );
  });

  it("ignores payload key order", () => {
    const a = { ...UNCHAINED, event: makeEvent("test", { a: 1, b: 2 }) };
    const b = { ...UNCHAINED, event: makeEvent("test", { b: 2, a: 1 }) };

    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });
});

describe("linkEvent", () => {
  it("attaches the computed hash and the given predecessor", () => {
    const linked = linkEvent(UNCHAINED, GENESIS_HASH);

    expect(linked.previousHash).toBe("genesis");
    expect(linked.hash).toBe(computeEventHash(UNCHAINED, GENESIS_HASH));
    expect(linked.version).toBe(1);
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts a chain produced by the store", () => {
    const store = new InMemoryEventStore();
    store.append(inStream("a", [makeEvent("one"), makeEvent("two")]));
    store.append(inStream("b", [makeEvent("three")]));

    const result = store.verifyIntegrity();

    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(3);
  });

  it("detects a modified payload", () => {
    const store = new InMemoryEventStore();
    store.append(inStream("a", [makeEvent("one", { n: 1 }), makeEvent("two", { n: 2 })]));

    const events = store.readAll();
    const tampered: StoredEvent[] = events.map((e) =>
      e.globalPosition === 1 ? { ...e, event: { ...e.event, payload: { n: 99 } } } : e,
    );

    const result = verifyHashChain(tampered);

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.position).toBe(1);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 1/);
  });

  it("detects a removed event", () => {
    const store = new InMemoryEventStore();
    store.append(inStream("a", [makeEvent("one"), makeEvent("two"), makeEvent("three")]));

    const [first, , third] = store.readAll();
    const result = verifyHashChain([first, third].filter((e): e is StoredEvent => e !== undefined));

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });
});
