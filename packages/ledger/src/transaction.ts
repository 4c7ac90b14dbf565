/**
 * @popchain/ledger: Transaction.
 *
 * A Transaction is the execution context handed to one atomic ledger
 * operation. Every write is staged here and only reaches the ledger
 * when the operation returns; if it throws, the staged writes are
 * dropped with the transaction.
 *
 * Staged writes:
 * - takeObject(): remove an object from the sender's custody
 * - deliver(): place an object (new or taken) with a custodian
 * - account(id).appendCertificateId(): extend an account's list
 * - emit(): publish an audit event
 *
 * Reads inside the transaction see its own staged writes.
 */

import type { Address, WalletLink } from "@popchain/types";
import type { EventCatalog, PendingEvent } from "@popchain/event-store";
import type { AccountRegistry } from "./accounts.js";
import { normalizeAddress } from "./address.js";
import type {
  IdAllocator,
  LedgerValue,
  ObjectGuard,
  StoredObject,
  TxContext,
} from "./types.js";
import { LedgerError } from "./types.js";

// ─── Scope & Staged Changes ──────────────────────────────────────────────

/**
 * Ledger state a transaction reads from. Supplied by Ledger.transact().
 */
export interface TransactionScope {
  readonly sender: Address;
  readonly digest: string;
  readonly timestamp: number;
  readonly accounts: AccountRegistry;
  readonly objects: ReadonlyMap<string, StoredObject>;
  readonly allocateId: IdAllocator;
  readonly catalog: EventCatalog | undefined;
}

/**
 * Everything a finished transaction wants applied, in one batch.
 */
export interface StagedChanges {
  /** Objects whose custody changed or that were created */
  readonly delivered: readonly StoredObject[];

  /** Certificate ids to append, per account, in staging order */
  readonly appends: ReadonlyMap<string, readonly string[]>;

  /** Events in emission order */
  readonly events: readonly PendingEvent[];
}

// ─── Account Handle ──────────────────────────────────────────────────────

/**
 * Mutable view of one account for the duration of a transaction.
 */
export interface AccountHandle {
  readonly id: string;
  readonly owner: WalletLink;
  readonly certificateIds: readonly string[];
  appendCertificateId(certificateId: string): void;
}

// ─── Transaction ─────────────────────────────────────────────────────────

export class Transaction implements TxContext {
  private readonly _scope: TransactionScope;
  private readonly _taken = new Set<string>();
  private readonly _delivered = new Map<string, StoredObject>();
  private readonly _appends = new Map<string, string[]>();
  private readonly _events: PendingEvent[] = [];
  private _closed = false;

  constructor(scope: TransactionScope) {
    this._scope = scope;
  }

  get sender(): Address {
    return this._scope.sender;
  }

  get digest(): string {
    return this._scope.digest;
  }

  now(): number {
    return this._scope.timestamp;
  }

  freshId(): string {
    this._assertOpen();
    return this._scope.allocateId();
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Borrow an account for the rest of the transaction.
   * Throws LedgerError("UNKNOWN_ACCOUNT") if it doesn't exist.
   */
  account(id: string): AccountHandle {
    this._assertOpen();
    const account = this._scope.accounts.assertExists(id);
    const staged = (): readonly string[] => this._appends.get(id) ?? [];

    return {
      id: account.id,
      owner: account.owner,
      get certificateIds(): readonly string[] {
        return [...account.certificateIds, ...staged()];
      },
      appendCertificateId: (certificateId: string): void => {
        this._assertOpen();
        const list = this._appends.get(id);
        if (list === undefined) {
          this._appends.set(id, [certificateId]);
        } else {
          list.push(certificateId);
        }
      },
    };
  }

  // ─── Custody ─────────────────────────────────────────────────────────

  /**
   * Take an object out of the sender's custody.
   *
   * The object must then be delivered before the transaction ends;
   * an object taken and never delivered aborts the commit.
   */
  takeObject<T extends LedgerValue>(id: string, guard: ObjectGuard<T>): T {
    this._assertOpen();

    // An object already taken in this transaction is no longer available
    const stored =
      this._delivered.get(id) ??
      (this._taken.has(id) ? undefined : this._scope.objects.get(id));
    if (stored === undefined) {
      throw new LedgerError("UNKNOWN_OBJECT", `Unknown object: "${id}"`);
    }
    if (stored.custodian !== this._scope.sender) {
      throw new LedgerError(
        "NOT_CUSTODIAN",
        `Object "${id}" is held by ${stored.custodian}, not by sender ${this._scope.sender}`,
      );
    }

    const value = stored.value;
    if (!guard(value)) {
      throw new LedgerError("UNKNOWN_OBJECT", `Object "${id}" is not of the requested kind`);
    }

    this._delivered.delete(id);
    this._taken.add(id);
    return value;
  }

  /**
   * Give custody of an object to `recipient`.
   *
   * The object is either new (its id has never been stored) or was
   * taken earlier in this transaction. Delivering a stored object that
   * wasn't taken would copy it, and is refused.
   */
  deliver<T extends LedgerValue>(object: T, recipient: Address): void {
    this._assertOpen();

    const custodian = normalizeAddress(recipient);
    const existing = this._scope.objects.has(object.id);
    if (this._delivered.has(object.id) || (existing && !this._taken.has(object.id))) {
      throw new LedgerError("DUPLICATE_OBJECT_ID", `Object already exists: "${object.id}"`);
    }

    this._taken.delete(object.id);
    this._delivered.set(object.id, { value: Object.freeze({ ...object }), custodian });
  }

  // ─── Events ──────────────────────────────────────────────────────────

  /**
   * Publish an audit event when the transaction commits.
   * Nothing is returned; a rejected transaction publishes nothing.
   */
  emit(streamId: string, type: string, payload: Readonly<Record<string, unknown>>): void {
    this._assertOpen();

    if (streamId.length === 0) {
      throw new LedgerError("INVALID_EVENT", "Event stream ID must be a non-empty string");
    }

    const catalog = this._scope.catalog;
    if (catalog !== undefined && !catalog.validate(type, payload)) {
      throw new LedgerError(
        "INVALID_EVENT",
        `Event "${type}" is not registered or its payload is invalid`,
      );
    }

    const index = this._events.length + 1;
    this._events.push({
      streamId,
      event: {
        type,
        metadata: {
          eventId: `${this._scope.digest}:${index}`,
          timestamp: new Date(this._scope.timestamp).toISOString(),
          actor: this._scope.sender,
          correlationId: this._scope.digest,
          source: catalog?.getSchema(type)?.source ?? "ledger",
        },
        payload,
      },
    });
  }

  // ─── Completion ──────────────────────────────────────────────────────

  /**
   * Close the transaction and hand back its staged writes.
   * Throws LedgerError("UNCONSUMED_OBJECT") if a taken object was never delivered.
   */
  seal(): StagedChanges {
    this._assertOpen();
    this._closed = true;

    const [orphan] = this._taken;
    if (orphan !== undefined) {
      throw new LedgerError(
        "UNCONSUMED_OBJECT",
        `Object "${orphan}" was taken but never delivered`,
      );
    }

    return {
      delivered: [...this._delivered.values()],
      appends: new Map(this._appends),
      events: [...this._events],
    };
  }

  /** Close the transaction without applying anything. */
  discard(): void {
    this._closed = true;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new LedgerError("TRANSACTION_CLOSED", `Transaction ${this._scope.digest} is closed`);
    }
  }
}
