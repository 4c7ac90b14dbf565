/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: lastSeenKey }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 * Keys are positive integers (event positions and stream versions).
 */

import { isRecord } from "@popchain/types";

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(field: string, key: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: key })).toString("base64url");
}

/**
 * @returns Decoded cursor, or undefined if the cursor is malformed.
 */
export function decodeCursor(cursor: string): { field: string; key: number } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (isRecord(data) && typeof data.f === "string" && Number.isSafeInteger(data.v)) {
    return { field: data.f, key: Number(data.v) };
  }
  return undefined;
}

/**
 * Page through items sorted ascending by `getKey`.
 *
 * A cursor for a different field, or one that doesn't decode, is
 * ignored and paging starts from the first item.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      filtered = filtered.filter((item) => getKey(item) > decoded.key);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
