/**
 * @popchain/ledger: Host ledger for the certificate core.
 *
 * A pure TypeScript object ledger:
 * - Every object has exactly one custodian; custody moves, never copies
 * - Operations run as all-or-nothing transactions
 * - Transactions supply the execution context (sender, clock, fresh ids)
 * - Events emitted by a transaction reach the audit log only on commit
 *
 * Design rules:
 * - All public types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Clock and id allocation are injectable for deterministic tests
 */

// Core engine
export { Ledger } from "./ledger.js";
export { Transaction } from "./transaction.js";
export type {
  AccountHandle,
  StagedChanges,
  TransactionScope,
} from "./transaction.js";

// Account registry
export { AccountRegistry } from "./accounts.js";

// Addresses & ids
export { normalizeAddress } from "./address.js";
export { randomIdAllocator, sequentialIdAllocator } from "./ids.js";

// Types
export type {
  LedgerValue,
  StoredObject,
  ObjectGuard,
  TxContext,
  Clock,
  IdAllocator,
  LedgerOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
