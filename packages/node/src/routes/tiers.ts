/**
 * Tier routes.
 *
 * GET /api/v1/tiers/default: The standard tier catalog
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toTierDto } from "../types/dto.js";

export function createTierRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/default", (c) => {
    const tiers = c.get("service").defaultTiers();
    return c.json({ data: tiers.map(toTierDto) });
  });

  return routes;
}
