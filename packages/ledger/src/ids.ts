/**
 * @popchain/ledger: Object id allocation.
 */

import { randomBytes } from "node:crypto";
import type { IdAllocator } from "./types.js";

/**
 * Random 32-byte object ids, `0x`-prefixed hex.
 */
export const randomIdAllocator: IdAllocator = () =>
  `0x${randomBytes(32).toString("hex")}`;

/**
 * Deterministic ids: `<prefix>1`, `<prefix>2`, …
 * For tests and replayable fixtures.
 */
export function sequentialIdAllocator(prefix = "0x"): IdAllocator {
  let next = 1;
  return () => `${prefix}${next++}`;
}
