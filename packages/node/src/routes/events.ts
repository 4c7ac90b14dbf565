/**
 * Audit event routes.
 *
 * GET /api/v1/events           : List all events (cursor pagination)
 * GET /api/v1/events/integrity : Recompute the hash chain
 * GET /api/v1/events/:streamId : List events for a stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListEventsQuerySchema);
    const events = c.get("service").readAllEvents(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );

    return c.json(
      paginate(events, query, (e) => e.globalPosition, "globalPosition"),
    );
  });

  // Registered before /:streamId so it isn't taken for a stream name
  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  routes.get("/:streamId", (c) => {
    const query = parseQuery(c, ListStreamEventsQuerySchema);
    const events = c.get("service").readStreamEvents(
      c.req.param("streamId"),
      query.afterVersion !== undefined
        ? { fromVersion: query.afterVersion + 1 }
        : undefined,
    );

    return c.json(paginate(events, query, (e) => e.version, "version"));
  });

  return routes;
}
