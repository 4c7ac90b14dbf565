/**
 * @popchain/ledger: Internal types for the host ledger.
 *
 * These extend the shared @popchain/types with ledger-specific
 * structures: object custody, the execution context handed to
 * transactions, and the ledger's error taxonomy.
 *
 * Rules:
 * - Every ledger object has exactly one custodian
 * - Custody moves, it is never copied
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@popchain/types";
import type { EventCatalog } from "@popchain/event-store";

// ─── Objects ─────────────────────────────────────────────────────────────

/** Anything the ledger can hold in custody: a value with a unique id. */
export interface LedgerValue {
  readonly id: string;
}

/** A ledger-resident object and the address currently holding it. */
export interface StoredObject {
  readonly value: LedgerValue;
  readonly custodian: Address;
}

/** Narrowing check used when reading an object back out of the store. */
export type ObjectGuard<T extends LedgerValue> = (value: unknown) => value is T;

// ─── Execution Context ───────────────────────────────────────────────────

/**
 * Capabilities the host supplies to every transaction.
 */
export interface TxContext {
  /** Address that signed the transaction */
  readonly sender: Address;

  /** Identifier of this transaction (correlates its events) */
  readonly digest: string;

  /** Transaction timestamp, milliseconds since epoch (fixed per transaction) */
  now(): number;

  /** Allocate a fresh globally-unique object identifier */
  freshId(): string;
}

/** Source of transaction timestamps (ms since epoch). */
export type Clock = () => number;

/** Source of fresh object identifiers. */
export type IdAllocator = () => string;

/**
 * Options for constructing a Ledger.
 */
export interface LedgerOptions {
  /** Default: Date.now */
  readonly clock?: Clock | undefined;

  /** Default: random 32-byte hex ids */
  readonly idAllocator?: IdAllocator | undefined;

  /** When set, every emitted event must validate against it */
  readonly catalog?: EventCatalog | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_ACCOUNT_ID"
  | "UNKNOWN_ACCOUNT"
  | "DUPLICATE_ACCOUNT_ID"
  | "WALLET_ALREADY_LINKED"
  | "UNKNOWN_OBJECT"
  | "NOT_CUSTODIAN"
  | "DUPLICATE_OBJECT_ID"
  | "UNCONSUMED_OBJECT"
  | "INVALID_EVENT"
  | "TRANSACTION_CLOSED";

/**
 * Structured error from the host ledger.
 * Always thrown: never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
