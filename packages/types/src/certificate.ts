/**
 * Certificate Types
 *
 * A CertificateNFT is a uniquely identified, issued instance of a tier,
 * bound to one event. It lives on the host ledger as an object with
 * exactly one custodian at a time.
 *
 * Rules:
 * - Every field is immutable once minted
 * - `issuedTo` is the ORIGINAL intended recipient, not the current custodian
 * - Current custody is tracked by the ledger's object store
 */

import type { WalletLink } from "./address.js";

export interface CertificateNFT {
  /** Globally unique identifier allocated by the ledger */
  readonly id: string;

  /** Event this certificate attests participation in (opaque foreign id) */
  readonly eventId: string;

  /** Tier name at mint time */
  readonly tierName: string;

  /** Metadata URL supplied at mint time */
  readonly url: string;

  /** Tier artwork URL at mint time */
  readonly tierUrl: string;

  /** Account owner at mint time; `null` if the account had no wallet */
  readonly issuedTo: WalletLink;

  /** Mint timestamp, milliseconds since epoch */
  readonly issuedAt: number;

  /** Tier price at mint time, minor currency units */
  readonly mintPrice: bigint;
}
