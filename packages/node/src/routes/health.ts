/**
 * Health check route.
 *
 * GET /health: Liveness probe. Reports the audit-log head position only;
 * full hash-chain verification is O(n) and lives at /api/v1/events/integrity.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { PopchainService } from "../services/popchain-service.js";

export function createHealthRoutes(service: PopchainService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      events: service.eventPosition(),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
