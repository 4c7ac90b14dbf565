/**
 * Transfer Authorizer: Releases a certificate to its account's wallet.
 *
 * The transaction sender must currently hold the certificate (for an
 * escrowed certificate, the service wallet). The certificate moves to
 * the account owner's wallet when:
 *
 * 1. the account has a linked wallet,
 * 2. the certificate was issued to that wallet or to no wallet, and
 * 3. the certificate id is recorded on the account.
 *
 * `issuedTo` keeps the original recipient; custody is tracked by the ledger.
 */

import { isCertificate } from "@popchain/types";
import { POPCHAIN_EVENTS } from "@popchain/event-store";
import type { CertificateTransferredToWalletPayload } from "@popchain/event-store";
import type { Transaction } from "@popchain/ledger";
import { CertificateError } from "./errors.js";
import { certificateStreamId } from "./registry.js";

/**
 * @throws LedgerError("UNKNOWN_OBJECT" | "NOT_CUSTODIAN") if the sender can't hand the certificate over
 * @throws CertificateError("INVALID_ADDRESS") if the account has no linked wallet
 * @throws CertificateError("UNAUTHORIZED") on a recipient mismatch or an id missing from the account
 */
export function transferCertificateToWallet(
  tx: Transaction,
  accountId: string,
  certificateId: string,
): void {
  const certificate = tx.takeObject(certificateId, isCertificate);
  const account = tx.account(accountId);

  const owner = account.owner;
  if (owner === null) {
    throw new CertificateError(
      "INVALID_ADDRESS",
      `Account "${accountId}" has no linked wallet`,
    );
  }

  if (certificate.issuedTo !== null && certificate.issuedTo !== owner) {
    throw new CertificateError(
      "UNAUTHORIZED",
      `Certificate "${certificateId}" was issued to ${certificate.issuedTo}, not ${owner}`,
    );
  }

  if (!account.certificateIds.includes(certificateId)) {
    throw new CertificateError(
      "UNAUTHORIZED",
      `Certificate "${certificateId}" is not recorded on account "${accountId}"`,
    );
  }

  tx.deliver(certificate, owner);

  const payload: CertificateTransferredToWalletPayload = {
    certificateId,
    accountId,
    recipient: owner,
  };
  tx.emit(
    certificateStreamId(certificateId),
    POPCHAIN_EVENTS.CERTIFICATE_TRANSFERRED_TO_WALLET,
    payload,
  );
}
