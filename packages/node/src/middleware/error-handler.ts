/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors keep their code; the code picks the HTTP status:
 * - explicit entries in STATUS_MAP
 * - UNKNOWN_* → 404, DUPLICATE_* → 409
 * - anything else → 500 with a generic message
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // HTTP layer
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,

  // Certificate errors
  INVALID_ADDRESS: 422,
  UNAUTHORIZED: 403,
  LENGTH_MISMATCH: 400,
  ENCODING_FAILURE: 400,
  INVALID_PRICE: 400,

  // Ledger errors
  NOT_CUSTODIAN: 403,
  INVALID_ACCOUNT_ID: 400,
  WALLET_ALREADY_LINKED: 409,
};

function hasCode(err: unknown): err is Error & { readonly code: string } {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function statusForCode(code: string): ContentfulStatusCode {
  const mapped = STATUS_MAP[code];
  if (mapped !== undefined) return mapped;
  if (code.startsWith("UNKNOWN_")) return 404;
  if (code.startsWith("DUPLICATE_")) return 409;
  return 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = hasCode(err) ? err.code : "INTERNAL_ERROR";
  const status = statusForCode(code);

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope(code, "Internal server error"), status);
  }

  const details = err instanceof ApiError ? err.details : undefined;
  return c.json(createErrorEnvelope(code, err.message, details), status);
}
