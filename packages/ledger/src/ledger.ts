/**
 * @popchain/ledger: Core Ledger class.
 *
 * The host ledger the certificate core runs on: an object store in
 * which every object has exactly one custodian, the account registry,
 * and an append-only audit log.
 *
 * API surface:
 * - registerAccount() / linkWallet(): Host-side account management
 * - transact(): Run one operation atomically (the only way to touch objects)
 * - getObject() / custodianOf() / objectsOwnedBy(): Custody queries
 * - eventStore: The audit log
 *
 * There is NO update() or delete() on objects. Custody changes only
 * through a committed transaction.
 */

import type { Account, Address } from "@popchain/types";
import { InMemoryEventStore } from "@popchain/event-store";
import type { EventCatalog, EventStore } from "@popchain/event-store";
import { AccountRegistry } from "./accounts.js";
import { normalizeAddress } from "./address.js";
import { randomIdAllocator } from "./ids.js";
import { Transaction } from "./transaction.js";
import type { StagedChanges } from "./transaction.js";
import type {
  Clock,
  IdAllocator,
  LedgerOptions,
  LedgerValue,
  ObjectGuard,
  StoredObject,
} from "./types.js";

/**
 * In-memory host ledger.
 *
 * Every transact() call is all-or-nothing: if the operation throws,
 * no custody change, account append or event from it is observable.
 */
export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _objects: Map<string, StoredObject> = new Map();
  private readonly _clock: Clock;
  private readonly _allocateId: IdAllocator;
  private readonly _catalog: EventCatalog | undefined;
  private readonly _eventStore: EventStore;
  private _transactionCount = 0;

  constructor(options?: LedgerOptions) {
    this._clock = options?.clock ?? Date.now;
    this._allocateId = options?.idAllocator ?? randomIdAllocator;
    this._catalog = options?.catalog;
    this._eventStore = new InMemoryEventStore({ clock: () => new Date(this._clock()) });
  }

  // ─── Account Management ──────────────────────────────────────────────

  /**
   * Register a new account, linked to `owner` or to no wallet (`null`).
   */
  registerAccount(id: string, owner: string | null = null): Account {
    return this._accounts.register(id, owner === null ? null : normalizeAddress(owner));
  }

  /**
   * Link a wallet to an account that has none yet.
   */
  linkWallet(accountId: string, owner: string): Account {
    return this._accounts.linkWallet(accountId, normalizeAddress(owner));
  }

  getAccount(id: string): Account | undefined {
    return this._accounts.get(id);
  }

  // ─── Transactions ────────────────────────────────────────────────────

  /**
   * Run `operation` as one atomic transaction signed by `sender`.
   *
   * The operation's writes are staged on the Transaction it receives
   * and applied together when it returns. If it throws, they are
   * discarded and the error propagates unchanged.
   */
  transact<T>(sender: string, operation: (tx: Transaction) => T): T {
    const tx = new Transaction({
      sender: normalizeAddress(sender),
      digest: `tx-${this._transactionCount + 1}`,
      timestamp: this._clock(),
      accounts: this._accounts,
      objects: this._objects,
      allocateId: this._allocateId,
      catalog: this._catalog,
    });

    let result: T;
    let changes: StagedChanges;
    try {
      result = operation(tx);
      changes = tx.seal();
    } catch (err) {
      tx.discard();
      throw err;
    }

    this._commit(changes);
    return result;
  }

  /**
   * Only the event append can throw here, and it writes all or nothing.
   * It must run before any other write.
   */
  private _commit(changes: StagedChanges): void {
    if (changes.events.length > 0) {
      this._eventStore.append(changes.events);
    }
    this._transactionCount++;
    for (const stored of changes.delivered) {
      this._objects.set(stored.value.id, stored);
    }
    for (const [accountId, certificateIds] of changes.appends) {
      this._accounts.appendCertificateIds(accountId, certificateIds);
    }
  }

  // ─── Custody Queries ─────────────────────────────────────────────────

  /**
   * Read an object, narrowed by `guard`.
   * Returns undefined if it doesn't exist or isn't of that kind.
   */
  getObject<T extends LedgerValue>(id: string, guard: ObjectGuard<T>): T | undefined {
    const value = this._objects.get(id)?.value;
    return guard(value) ? value : undefined;
  }

  /**
   * The address currently holding an object, or undefined if unknown.
   */
  custodianOf(id: string): Address | undefined {
    return this._objects.get(id)?.custodian;
  }

  /**
   * Ids of every object held by `address`, in creation order.
   */
  objectsOwnedBy(address: string): readonly string[] {
    const custodian = normalizeAddress(address);
    return [...this._objects.values()]
      .filter((o) => o.custodian === custodian)
      .map((o) => o.value.id);
  }

  get eventStore(): EventStore {
    return this._eventStore;
  }

  get objectCount(): number {
    return this._objects.size;
  }

  get transactionCount(): number {
    return this._transactionCount;
  }
}
