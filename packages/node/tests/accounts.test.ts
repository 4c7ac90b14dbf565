/**
 * Tests for account routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

const register = (body: Record<string, unknown>): Response | Promise<Response> =>
  instance.app.request(jsonRequest("/api/v1/accounts", "POST", body));

describe("POST /api/v1/accounts", () => {
  it("registers a linked account with a normalized owner", async () => {
    const res = await register({ id: "alice", owner: "0xABC" });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { id: "alice", owner: "0xabc", certificateIds: [] },
    });
  });

  it("registers an unlinked account by default", async () => {
    const res = await register({ id: "bob" });
    expect(await res.json()).toEqual({
      data: { id: "bob", owner: null, certificateIds: [] },
    });
  });

  it("returns 409 DUPLICATE_ACCOUNT_ID for a second registration", async () => {
    await register({ id: "alice" });
    const res = await register({ id: "alice" });

    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("DUPLICATE_ACCOUNT_ID");
  });

  it("validates the owner address", async () => {
    const res = await register({ id: "alice", owner: "alice" });

    expect(res.status).toBe(400);
    const { error } = (await res.json()) as ErrorBody;
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.details).toEqual({
      issues: [{ path: "owner", message: "Expected 0x followed by 1-64 hex digits" }],
    });
  });
});

describe("GET /api/v1/accounts/:id", () => {
  it("lists minted certificate ids in order", async () => {
    const { service, app } = instance;
    service.registerAccount("alice", "0xabc");
    const tier = service.defaultTiers()[0];
    service.mint({ eventId: "E1", url: "", accountId: "alice", tier });
    service.mint({ eventId: "E2", url: "", accountId: "alice", tier });

    const res = await app.request("/api/v1/accounts/alice");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { id: "alice", owner: "0xabc", certificateIds: ["C1", "C2"] },
    });
  });

  it("returns 404 NOT_FOUND for an unknown account", async () => {
    const res = await instance.app.request("/api/v1/accounts/nobody");
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error.code).toBe("NOT_FOUND");
  });
});

describe("PUT /api/v1/accounts/:id/wallet", () => {
  const link = (id: string, owner: string): Response | Promise<Response> =>
    instance.app.request(jsonRequest(`/api/v1/accounts/${id}/wallet`, "PUT", { owner }));

  it("links a wallet once", async () => {
    await register({ id: "bob" });

    const first = await link("bob", "0xb0b");
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({
      data: { id: "bob", owner: "0xb0b", certificateIds: [] },
    });

    const second = await link("bob", "0xb0b2");
    expect(second.status).toBe(409);
    expect(((await second.json()) as ErrorBody).error.code).toBe("WALLET_ALREADY_LINKED");
  });

  it("returns 404 UNKNOWN_ACCOUNT for an unknown account", async () => {
    const res = await link("nobody", "0xb0b");
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error.code).toBe("UNKNOWN_ACCOUNT");
  });
});
