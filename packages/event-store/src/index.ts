/**
 * @popchain/event-store: Append-only audit log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Popchain audit event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  PendingEvent,
  UnchainedEvent,
  StoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog } from "./catalog.js";

// Popchain domain events
export { POPCHAIN_EVENTS, createPopchainCatalog } from "./popchain-events.js";
export type {
  PopchainEventType,
  CertificateMintedPayload,
  CertificateTransferredToWalletPayload,
} from "./popchain-events.js";
