/**
 * @popchain/certificates: Tiered proof-of-participation certificates.
 *
 * - Tier catalog: default and custom tier templates
 * - Registry: mint a certificate for an account, escrowing it with the
 *   service wallet when the account has no linked wallet
 * - Authorizer: release a held certificate to the account's wallet
 * - Accessors for certificate fields
 *
 * All state changes run inside a @popchain/ledger transaction.
 */

// Errors
export { CertificateError } from "./errors.js";
export type { CertificateErrorCode } from "./errors.js";

// Tiers
export {
  createTier,
  createTierFromBytes,
  defaultPopchainTiers,
  createCustomTiers,
  getTierPrice,
  getTierName,
} from "./tiers.js";

// Mint & transfer
export { mintCertificate, certificateStreamId } from "./registry.js";
export type { MintRequest } from "./registry.js";
export { transferCertificateToWallet } from "./authorizer.js";

// Accessors
export {
  getEventId,
  getCertificateTierName,
  getMetadataUrl,
  getTierUrl,
  getIssuedTo,
  getIssuedAt,
  getMintPrice,
} from "./accessors.js";
