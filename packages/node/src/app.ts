/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { PopchainService } from "./services/popchain-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTierRoutes } from "./routes/tiers.js";
import { createCertificateRoutes } from "./routes/certificates.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: PopchainService;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: PopchainService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.onError(handleError);

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/tiers", createTierRoutes());
  app.route("/api/v1/certificates", createCertificateRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
