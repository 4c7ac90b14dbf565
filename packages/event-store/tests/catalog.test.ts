/**
 * Tests for EventCatalog and the Popchain event definitions.
 *
 * Verifies:
 * - Schema registration and lookup
 * - Payload validation against schemas
 * - Popchain catalog factory (both audit event types)
 */

import { describe, it, expect } from "vitest";
import type { EventMetadata } from "@popchain/types";
import type { EventSchema } from "../src/catalog.js";
import { EventCatalog } from "../src/catalog.js";
import { POPCHAIN_EVENTS, createPopchainCatalog } from "../src/popchain-events.js";

// =============================================================================
// Helpers
// =============================================================================

function makeSchema(
  type: string,
  version = 1,
  source: EventMetadata["source"] = "certificates",
): EventSchema {
  return {
    type,
    version,
    description: `Test schema for ${type}`,
    source,
    validate: (p) => typeof p === "object" && p !== null && "id" in p,
  };
}

// =============================================================================
// Registration
// =============================================================================

describe("registration", () => {
  it("registers and looks up a schema", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("thing.created"));

    expect(catalog.getSchema("thing.created")?.version).toBe(1);
    expect(catalog.getSchema("thing.deleted")).toBeUndefined();
  });

  it("replaces a schema on re-registration", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("thing.created", 1));
    catalog.register(makeSchema("thing.created", 2));

    expect(catalog.getSchema("thing.created")?.version).toBe(2);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe("validate", () => {
  it("returns false for unregistered types", () => {
    expect(new EventCatalog().validate("unknown", { id: "x" })).toBe(false);
  });

  it("delegates to the schema validator", () => {
    const catalog = new EventCatalog();
    catalog.register(makeSchema("thing.created"));

    expect(catalog.validate("thing.created", { id: "x" })).toBe(true);
    expect(catalog.validate("thing.created", { name: "x" })).toBe(false);
  });
});

// =============================================================================
// Popchain catalog
// =============================================================================

describe("createPopchainCatalog", () => {
  const catalog = createPopchainCatalog();

  it("registers both certificate events from the certificates source", () => {
    expect(catalog.getSchema(POPCHAIN_EVENTS.CERTIFICATE_MINTED)?.source).toBe("certificates");
    expect(
      catalog.getSchema(POPCHAIN_EVENTS.CERTIFICATE_TRANSFERRED_TO_WALLET)?.source,
    ).toBe("certificates");
  });

  it("accepts a minted payload with a linked or escrowed recipient", () => {
    const payload = {
      certificateId: "0x01",
      eventId: "E1",
      tierName: "PopBadge",
      issuedTo: "0xabc",
      issuedAt: 1_700_000_000_000,
      mintPrice: "30000000",
    };

    expect(catalog.validate(POPCHAIN_EVENTS.CERTIFICATE_MINTED, payload)).toBe(true);
    expect(
      catalog.validate(POPCHAIN_EVENTS.CERTIFICATE_MINTED, { ...payload, issuedTo: null }),
    ).toBe(true);
  });

  it("rejects a minted payload with a non-decimal price", () => {
    expect(
      catalog.validate(POPCHAIN_EVENTS.CERTIFICATE_MINTED, {
        certificateId: "0x01",
        eventId: "E1",
        tierName: "PopBadge",
        issuedTo: null,
        issuedAt: 0,
        mintPrice: "-5",
      }),
    ).toBe(false);
  });

  it("requires an address recipient on transfer payloads", () => {
    const payload = { certificateId: "0x01", accountId: "acct-1", recipient: "0xabc" };

    expect(
      catalog.validate(POPCHAIN_EVENTS.CERTIFICATE_TRANSFERRED_TO_WALLET, payload),
    ).toBe(true);
    expect(
      catalog.validate(POPCHAIN_EVENTS.CERTIFICATE_TRANSFERRED_TO_WALLET, {
        ...payload,
        recipient: null,
      }),
    ).toBe(false);
  });
});
