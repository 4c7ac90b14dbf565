/**
 * Certificate routes.
 *
 * POST /api/v1/certificates              : Mint a certificate
 * GET  /api/v1/certificates/:id          : Get a certificate and its custodian
 * POST /api/v1/certificates/:id/transfer : Release to the account's wallet
 */

import { Hono } from "hono";
import { createTier } from "@popchain/certificates";
import type { Tier } from "@popchain/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  MintCertificateSchema,
  TransferCertificateSchema,
  toCertificateResponse,
} from "../types/dto.js";
import type { MintCertificateDto } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { parseBody } from "../middleware/validate.js";
import type { PopchainService } from "../services/popchain-service.js";

function resolveTier(service: PopchainService, body: MintCertificateDto): Tier {
  if (body.tier !== undefined) {
    const { name, description, url, price } = body.tier;
    return createTier(name, description, url, BigInt(price));
  }

  const tiers = service.defaultTiers();
  const index = body.tierIndex ?? 0;
  const tier = tiers[index];
  if (tier === undefined) {
    throw new ApiError("VALIDATION_ERROR", "Request body validation failed", {
      issues: [
        { path: "tierIndex", message: `Must be between 0 and ${tiers.length - 1}` },
      ],
    });
  }
  return tier;
}

export function createCertificateRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/certificates: Mint
  routes.post("/", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, MintCertificateSchema);

    const certificate = service.mint({
      eventId: body.eventId,
      url: body.url,
      accountId: body.accountId,
      tier: resolveTier(service, body),
    });

    return c.json({ data: toCertificateResponse(certificate) }, 201);
  });

  // GET /api/v1/certificates/:id
  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const certificate = c.get("service").getCertificate(id);

    if (certificate === undefined) {
      throw new ApiError("NOT_FOUND", `Certificate '${id}' not found`);
    }

    return c.json({ data: toCertificateResponse(certificate) });
  });

  // POST /api/v1/certificates/:id/transfer
  routes.post("/:id/transfer", async (c) => {
    const service = c.get("service");
    const id = c.req.param("id");
    const body = await parseBody(c, TransferCertificateSchema);

    const certificate = service.transfer(id, body.accountId, body.sender);
    return c.json({ data: toCertificateResponse(certificate) });
  });

  return routes;
}
