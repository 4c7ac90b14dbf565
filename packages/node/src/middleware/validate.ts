/**
 * Zod request validation.
 *
 * Failures throw ApiError("VALIDATION_ERROR"), which the global error
 * handler renders as 400 with the zod issues in `details.issues`.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ApiError } from "../types/error.js";

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parse and validate the JSON request body.
 */
export async function parseBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new ApiError("VALIDATION_ERROR", "Invalid JSON in request body", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return parseWith(schema, body, "Request body validation failed");
}

/**
 * Validate query parameters.
 */
export function parseQuery<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parseWith(schema, c.req.query(), "Invalid query parameters");
}

function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  message: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", message, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}
