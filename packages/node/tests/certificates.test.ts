/**
 * Tests for tier and certificate routes.
 *
 * Covers:
 * - The default tier catalog, with prices as strings
 * - Minting with a default tier or a custom tier, linked and escrowed
 * - Certificate lookup with custodian
 * - Escrow release through the transfer route
 * - Error mapping for every rejection
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest, SERVICE_WALLET, TEST_NOW } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";
import type { CertificateResponse, TierDto } from "../src/types/dto.js";

const META_URL = "https://popchain.example/meta/E1.json";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
  instance.service.registerAccount("alice", "0xabc");
  instance.service.registerAccount("bob", null);
  instance.service.registerAccount("carol", "0xc0ffee");
});

function mintRequest(body: Record<string, unknown>): Request {
  return jsonRequest("/api/v1/certificates", "POST", {
    eventId: "E1",
    url: META_URL,
    ...body,
  });
}

async function errorOf(res: Response): Promise<ErrorBody["error"]> {
  return ((await res.json()) as ErrorBody).error;
}

// =============================================================================
// Tiers
// =============================================================================

describe("GET /api/v1/tiers/default", () => {
  it("lists the four default tiers with string prices", async () => {
    const res = await instance.app.request("/api/v1/tiers/default");
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: TierDto[] };
    expect(body.data.map((t) => t.price)).toEqual([
      "10000000",
      "30000000",
      "50000000",
      "70000000",
    ]);
    expect(body.data[1]).toEqual({
      name: "PopBadge",
      description: "Badge for active participants",
      url: "https://popchain.example/tiers/pop-badge.png",
      price: "30000000",
    });
  });
});

// =============================================================================
// Mint
// =============================================================================

describe("POST /api/v1/certificates", () => {
  it("mints to a linked account", async () => {
    const res = await instance.app.request(mintRequest({ accountId: "alice", tierIndex: 1 }));
    expect(res.status).toBe(201);

    const body = (await res.json()) as { data: CertificateResponse };
    expect(body.data).toEqual({
      id: "C1",
      eventId: "E1",
      tierName: "PopBadge",
      url: META_URL,
      tierUrl: "https://popchain.example/tiers/pop-badge.png",
      issuedTo: "0xabc",
      issuedAt: TEST_NOW,
      mintPrice: "30000000",
      custodian: "0xabc",
    });
  });

  it("escrows with the service wallet for an unlinked account", async () => {
    const res = await instance.app.request(mintRequest({ accountId: "bob", tierIndex: 0 }));
    const body = (await res.json()) as { data: CertificateResponse };

    expect(body.data.issuedTo).toBeNull();
    expect(body.data.custodian).toBe(SERVICE_WALLET);
    expect(instance.service.getAccount("bob")?.certificateIds).toEqual(["C1"]);
  });

  it("mints from a custom tier", async () => {
    const res = await instance.app.request(
      mintRequest({
        accountId: "alice",
        tier: { name: "VIP", description: "Backstage", url: "https://popchain.example/vip.png", price: "5" },
      }),
    );
    expect(res.status).toBe(201);

    const body = (await res.json()) as { data: CertificateResponse };
    expect(body.data.tierName).toBe("VIP");
    expect(body.data.tierUrl).toBe("https://popchain.example/vip.png");
    expect(body.data.mintPrice).toBe("5");
  });

  it("returns 400 INVALID_PRICE for a price beyond 64 bits", async () => {
    const res = await instance.app.request(
      mintRequest({
        accountId: "alice",
        tier: { name: "Big", description: "", url: "", price: "18446744073709551616" },
      }),
    );
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("INVALID_PRICE");
  });

  it("requires exactly one of tierIndex and tier", async () => {
    const res = await instance.app.request(
      mintRequest({
        accountId: "alice",
        tierIndex: 0,
        tier: { name: "VIP", description: "", url: "", price: "5" },
      }),
    );
    expect(res.status).toBe(400);

    const error = await errorOf(res);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.details).toEqual({
      issues: [{ path: "tierIndex", message: "Exactly one of tierIndex or tier is required" }],
    });
  });

  it("rejects a tierIndex past the catalog", async () => {
    const res = await instance.app.request(mintRequest({ accountId: "alice", tierIndex: 4 }));
    expect(res.status).toBe(400);
    expect((await errorOf(res)).details).toEqual({
      issues: [{ path: "tierIndex", message: "Must be between 0 and 3" }],
    });
  });

  it("returns 404 UNKNOWN_ACCOUNT for an unknown account", async () => {
    const res = await instance.app.request(mintRequest({ accountId: "nobody", tierIndex: 0 }));
    expect(res.status).toBe(404);
    expect((await errorOf(res)).code).toBe("UNKNOWN_ACCOUNT");
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/certificates", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{",
      }),
    );
    expect(res.status).toBe(400);

    const error = await errorOf(res);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.message).toBe("Invalid JSON in request body");
  });
});

// =============================================================================
// Lookup
// =============================================================================

describe("GET /api/v1/certificates/:id", () => {
  it("returns the certificate with its custodian", async () => {
    await instance.app.request(mintRequest({ accountId: "bob", tierIndex: 3 }));

    const res = await instance.app.request("/api/v1/certificates/C1");
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: CertificateResponse };
    expect(body.data.tierName).toBe("PopTrophy");
    expect(body.data.mintPrice).toBe("70000000");
    expect(body.data.custodian).toBe(SERVICE_WALLET);
  });

  it("returns 404 NOT_FOUND for an unknown id", async () => {
    const res = await instance.app.request("/api/v1/certificates/C9");
    expect(res.status).toBe(404);
    expect(await errorOf(res)).toEqual({
      code: "NOT_FOUND",
      message: "Certificate 'C9' not found",
    });
  });
});

// =============================================================================
// Transfer
// =============================================================================

describe("POST /api/v1/certificates/:id/transfer", () => {
  const transfer = (id: string, body: Record<string, unknown>): Promise<Response> =>
    Promise.resolve(
      instance.app.request(jsonRequest(`/api/v1/certificates/${id}/transfer`, "POST", body)),
    );

  it("releases an escrowed certificate once the account links a wallet", async () => {
    await instance.app.request(mintRequest({ accountId: "bob", tierIndex: 0 }));
    await instance.app.request(
      jsonRequest("/api/v1/accounts/bob/wallet", "PUT", { owner: "0xB0B" }),
    );

    const res = await transfer("C1", { accountId: "bob" });
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: CertificateResponse };
    expect(body.data.custodian).toBe("0xb0b");
    expect(body.data.issuedTo).toBeNull();
  });

  it("returns 422 INVALID_ADDRESS while the account is unlinked", async () => {
    await instance.app.request(mintRequest({ accountId: "bob", tierIndex: 0 }));

    const res = await transfer("C1", { accountId: "bob" });
    expect(res.status).toBe(422);
    expect(await errorOf(res)).toEqual({
      code: "INVALID_ADDRESS",
      message: 'Account "bob" has no linked wallet',
    });
  });

  it("returns 403 UNAUTHORIZED for an account that doesn't list the certificate", async () => {
    await instance.app.request(mintRequest({ accountId: "bob", tierIndex: 0 }));

    const res = await transfer("C1", { accountId: "carol" });
    expect(res.status).toBe(403);
    expect((await errorOf(res)).code).toBe("UNAUTHORIZED");
  });

  it("returns 403 NOT_CUSTODIAN when the sender doesn't hold the certificate", async () => {
    await instance.app.request(mintRequest({ accountId: "alice", tierIndex: 0 }));

    const res = await transfer("C1", { accountId: "alice" });
    expect(res.status).toBe(403);
    expect((await errorOf(res)).code).toBe("NOT_CUSTODIAN");
  });

  it("accepts an explicit sender", async () => {
    await instance.app.request(mintRequest({ accountId: "alice", tierIndex: 0 }));

    const res = await transfer("C1", { accountId: "alice", sender: "0xABC" });
    expect(res.status).toBe(200);
  });

  it("returns 404 UNKNOWN_OBJECT for an unknown certificate", async () => {
    const res = await transfer("C9", { accountId: "alice" });
    expect(res.status).toBe(404);
    expect((await errorOf(res)).code).toBe("UNKNOWN_OBJECT");
  });

  it("rejects a malformed sender", async () => {
    const res = await transfer("C1", { accountId: "alice", sender: "alice" });
    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("VALIDATION_ERROR");
  });
});
