/**
 * Certificate Registry: Minting.
 *
 * Mints a certificate for an account inside a ledger transaction.
 * The certificate snapshots the tier, the event and the account's
 * linked wallet at mint time.
 *
 * Custody:
 * - Account linked to a wallet → the wallet holds the certificate
 * - Account not linked (owner null) → the service wallet holds it
 *   in escrow until transferCertificateToWallet() releases it
 *
 * Price is recorded, not collected.
 */

import { isAddress } from "@popchain/types";
import type { Address, CertificateNFT, Tier } from "@popchain/types";
import { POPCHAIN_EVENTS } from "@popchain/event-store";
import type { CertificateMintedPayload } from "@popchain/event-store";
import type { Transaction } from "@popchain/ledger";
import { CertificateError } from "./errors.js";

export interface MintRequest {
  readonly eventId: string;
  /** Metadata URL for this certificate */
  readonly url: string;
  readonly tier: Tier;
  readonly accountId: string;
  /** Escrow custodian for accounts with no linked wallet */
  readonly serviceWallet: Address;
}

/** Audit stream for one certificate. */
export function certificateStreamId(certificateId: string): string {
  return `certificate-${certificateId}`;
}

/**
 * Mint a certificate and record it on the account.
 *
 * @returns The new certificate's id
 * @throws CertificateError("INVALID_ADDRESS") if serviceWallet is malformed
 * @throws LedgerError("UNKNOWN_ACCOUNT") if the account doesn't exist
 */
export function mintCertificate(tx: Transaction, request: MintRequest): string {
  if (!isAddress(request.serviceWallet)) {
    throw new CertificateError(
      "INVALID_ADDRESS",
      `Service wallet is not a valid address: "${request.serviceWallet}"`,
    );
  }

  const issuedAt = tx.now();
  const account = tx.account(request.accountId);
  const owner = account.owner;

  const certificate: CertificateNFT = {
    id: tx.freshId(),
    eventId: request.eventId,
    tierName: request.tier.name,
    url: request.url,
    tierUrl: request.tier.url,
    issuedTo: owner,
    issuedAt,
    mintPrice: request.tier.price,
  };

  tx.deliver(certificate, owner ?? request.serviceWallet);
  account.appendCertificateId(certificate.id);

  const payload: CertificateMintedPayload = {
    certificateId: certificate.id,
    eventId: certificate.eventId,
    tierName: certificate.tierName,
    issuedTo: certificate.issuedTo,
    issuedAt: certificate.issuedAt,
    mintPrice: certificate.mintPrice.toString(),
  };
  tx.emit(certificateStreamId(certificate.id), POPCHAIN_EVENTS.CERTIFICATE_MINTED, payload);

  return certificate.id;
}
