/**
 * @popchain/event-store: Popchain audit event definitions.
 *
 * Naming convention: `<entity>.<action>`
 *
 * Each event type defines:
 * - A payload interface (what data the event carries)
 * - A schema registration (type + version + validation)
 *
 * Payloads are JSON-safe: prices travel as decimal strings.
 */

import { isAddress, isRecord, isWalletLink } from "@popchain/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

export const POPCHAIN_EVENTS = {
  CERTIFICATE_MINTED: "certificate.minted",
  CERTIFICATE_TRANSFERRED_TO_WALLET: "certificate.transferred_to_wallet",
} as const;

export type PopchainEventType =
  (typeof POPCHAIN_EVENTS)[keyof typeof POPCHAIN_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export type CertificateMintedPayload = {
  readonly certificateId: string;
  readonly eventId: string;
  readonly tierName: string;
  /** Account owner at mint time; null when escrowed */
  readonly issuedTo: string | null;
  /** Milliseconds since epoch */
  readonly issuedAt: number;
  /** Decimal string, minor currency units */
  readonly mintPrice: string;
};

export type CertificateTransferredToWalletPayload = {
  readonly certificateId: string;
  readonly accountId: string;
  readonly recipient: string;
};

// =============================================================================
// Schemas
// =============================================================================

function hasString(v: Record<string, unknown>, key: string): boolean {
  return typeof v[key] === "string";
}

const CERTIFICATE_SCHEMAS: readonly EventSchema[] = [
  {
    type: POPCHAIN_EVENTS.CERTIFICATE_MINTED,
    version: 1,
    description: "A certificate was minted from a tier for an event",
    source: "certificates",
    validate: (p) =>
      isRecord(p) &&
      hasString(p, "certificateId") &&
      hasString(p, "eventId") &&
      hasString(p, "tierName") &&
      isWalletLink(p.issuedTo) &&
      typeof p.issuedAt === "number" &&
      typeof p.mintPrice === "string" &&
      /^\d+$/.test(p.mintPrice),
  },
  {
    type: POPCHAIN_EVENTS.CERTIFICATE_TRANSFERRED_TO_WALLET,
    version: 1,
    description: "Custody of a certificate was released to an account's wallet",
    source: "certificates",
    validate: (p) =>
      isRecord(p) &&
      hasString(p, "certificateId") &&
      hasString(p, "accountId") &&
      isAddress(p.recipient),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every Popchain audit event registered.
 */
export function createPopchainCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of CERTIFICATE_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
