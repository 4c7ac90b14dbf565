/**
 * Address Types
 *
 * Wallet addresses on the host ledger.
 *
 * Rules:
 * - Addresses are `0x`-prefixed hex, normalized to lower case without
 *   leading zero digits
 * - "No wallet linked" is `null`, never a reserved address value
 */

/**
 * A normalized wallet address (e.g., "0xabc", "0xff").
 */
export type Address = string;

/**
 * The owner of an account or the recorded recipient of a certificate.
 * `null` means the account has not been linked to a wallet yet.
 */
export type WalletLink = Address | null;
