/**
 * @popchain/types: Shared domain types for the Popchain stack.
 *
 * These types are used across all Popchain packages:
 * - Wallet addresses and the "no wallet linked" state
 * - Tiers and certificates
 * - Accounts
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 * - No semantic interpretation in types: meaning lives in consuming code
 */

// Address types
export type { Address, WalletLink } from "./address.js";

// Certificate types
export type { Tier } from "./tier.js";
export type { CertificateNFT } from "./certificate.js";
export type { Account } from "./account.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isRecord,
  isAddress,
  canonicalAddress,
  isWalletLink,
  isU64,
  isCertificate,
} from "./guards.js";
