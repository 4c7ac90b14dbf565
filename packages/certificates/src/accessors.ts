/**
 * Read-only certificate accessors.
 */

import type { CertificateNFT, WalletLink } from "@popchain/types";

export function getEventId(certificate: CertificateNFT): string {
  return certificate.eventId;
}

export function getCertificateTierName(certificate: CertificateNFT): string {
  return certificate.tierName;
}

/** Metadata URL supplied at mint. */
export function getMetadataUrl(certificate: CertificateNFT): string {
  return certificate.url;
}

/** Tier artwork URL copied at mint. */
export function getTierUrl(certificate: CertificateNFT): string {
  return certificate.tierUrl;
}

/** Wallet the certificate was issued to, or null if minted into escrow. */
export function getIssuedTo(certificate: CertificateNFT): WalletLink {
  return certificate.issuedTo;
}

export function getIssuedAt(certificate: CertificateNFT): number {
  return certificate.issuedAt;
}

export function getMintPrice(certificate: CertificateNFT): bigint {
  return certificate.mintPrice;
}
