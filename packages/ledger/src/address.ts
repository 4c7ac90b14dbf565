/**
 * @popchain/ledger: Address normalization.
 */

import { canonicalAddress, isAddress } from "@popchain/types";
import type { Address } from "@popchain/types";
import { LedgerError } from "./types.js";

/**
 * Validate an address and return its canonical spelling.
 * Throws LedgerError("INVALID_ADDRESS") for anything that isn't `0x` + hex.
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${value}"`);
  }
  return canonicalAddress(value);
}
