/**
 * Account Types
 *
 * A user account as the certificate core sees it: an optional linked
 * wallet and the ordered list of certificates issued to it.
 */

import type { WalletLink } from "./address.js";

export interface Account {
  /** Unique account identifier */
  readonly id: string;

  /** Linked wallet; `null` until the account is claimed by a wallet */
  readonly owner: WalletLink;

  /** Certificate ids issued to this account, in mint order (append-only) */
  readonly certificateIds: readonly string[];
}
