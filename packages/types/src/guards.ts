/**
 * Runtime Type Guards
 *
 * Narrowing functions for Popchain domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, ledger object reads, external integrations).
 */

import type { Address, WalletLink } from "./address.js";
import type { CertificateNFT } from "./certificate.js";

const U64_MAX = (1n << 64n) - 1n;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{1,64}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Address guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Canonical spelling of a valid address: lower case, no leading zero
 * digits ("0x00ABc" and "0xabc" are the same wallet; "0x000" is "0x0").
 */
export function canonicalAddress(address: Address): Address {
  const digits = address.slice(2).toLowerCase().replace(/^0+(?=[0-9a-f])/, "");
  return `0x${digits}`;
}

export function isWalletLink(value: unknown): value is WalletLink {
  return value === null || isAddress(value);
}

/** True for a bigint in the unsigned 64-bit range. */
export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}

// =============================================================================
// Certificate guards
// =============================================================================

export function isCertificate(value: unknown): value is CertificateNFT {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.eventId === "string" &&
    typeof value.tierName === "string" &&
    typeof value.url === "string" &&
    typeof value.tierUrl === "string" &&
    isWalletLink(value.issuedTo) &&
    typeof value.issuedAt === "number" &&
    Number.isInteger(value.issuedAt) &&
    isU64(value.mintPrice)
  );
}
