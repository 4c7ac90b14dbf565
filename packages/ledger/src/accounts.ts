/**
 * @popchain/ledger: Account registry.
 *
 * Holds the accounts certificates are issued to. The certificate core
 * only reads an account's owner and certificate list and appends to
 * that list; linking a wallet is the one other change an account sees.
 *
 * Rules:
 * - No duplicate account IDs
 * - A wallet can be linked once; it is never unlinked or replaced
 * - Certificate lists are append-only
 * - Reads return snapshots, never the live record
 */

import type { Account, Address } from "@popchain/types";
import { LedgerError } from "./types.js";

interface AccountRecord {
  readonly id: string;
  owner: Address | null;
  readonly certificateIds: string[];
}

function snapshot(record: AccountRecord): Account {
  return {
    id: record.id,
    owner: record.owner,
    certificateIds: [...record.certificateIds],
  };
}

export class AccountRegistry {
  private readonly _accounts: Map<string, AccountRecord> = new Map();

  /**
   * Register a new account, optionally already linked to a wallet.
   * Throws if the account ID already exists.
   */
  register(id: string, owner: Address | null): Account {
    if (id.length === 0) {
      throw new LedgerError("INVALID_ACCOUNT_ID", "Account ID must be a non-empty string");
    }
    if (this._accounts.has(id)) {
      throw new LedgerError("DUPLICATE_ACCOUNT_ID", `Account already exists: "${id}"`);
    }

    const record: AccountRecord = { id, owner, certificateIds: [] };
    this._accounts.set(id, record);
    return snapshot(record);
  }

  /**
   * Link a wallet to an account that has none yet.
   */
  linkWallet(id: string, owner: Address): Account {
    const record = this._record(id);
    if (record.owner !== null) {
      throw new LedgerError(
        "WALLET_ALREADY_LINKED",
        `Account "${id}" is already linked to ${record.owner}`,
      );
    }
    record.owner = owner;
    return snapshot(record);
  }

  /**
   * Append certificate ids to the end of an account's list.
   */
  appendCertificateIds(id: string, certificateIds: readonly string[]): void {
    this._record(id).certificateIds.push(...certificateIds);
  }

  get(id: string): Account | undefined {
    const record = this._accounts.get(id);
    return record === undefined ? undefined : snapshot(record);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(id: string): Account {
    return snapshot(this._record(id));
  }

  private _record(id: string): AccountRecord {
    const record = this._accounts.get(id);
    if (record === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return record;
  }
}
