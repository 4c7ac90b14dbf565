/**
 * @popchain/event-store: Core types.
 *
 * The audit log is append-only: stored events are never updated or
 * removed, and each one is linked to its predecessor by a SHA-256 hash.
 */

import type { DomainEvent } from "@popchain/types";

// =============================================================================
// Events
// =============================================================================

/**
 * An event waiting to be written, tagged with the stream it belongs to.
 */
export interface PendingEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

/**
 * A written event before it is linked into the chain.
 */
export interface UnchainedEvent extends PendingEvent {
  /** Position within its stream, from 1 */
  readonly version: number;

  /** Position across all streams, from 1 */
  readonly globalPosition: number;

  /** When the store wrote it (store time, not domain time) */
  readonly appendedAt: string;
}

export interface StoredEvent extends UnchainedEvent {
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH for position 1 */
  readonly previousHash: string;
}

// =============================================================================
// Reads
// =============================================================================

export interface ReadOptions {
  /** First version to return (inclusive). Default: 1 */
  readonly fromVersion?: number;
}

export interface ReadAllOptions {
  /** First global position to return (inclusive). Default: 1 */
  readonly fromPosition?: number;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  /** Global position of the offending event */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose link was checked */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - An append writes all of its events or none of them
 */
export interface EventStore {
  /**
   * Write a batch of events, possibly spanning several streams, in order.
   *
   * @throws EventStoreError if the batch is empty or any entry has an
   *   empty stream id; nothing is written in that case
   */
  append(entries: readonly PendingEvent[]): readonly StoredEvent[];

  /** Events of one stream in version order (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  /** Recompute the hash chain over every stored event. O(n). */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode = "INVALID_STREAM_ID" | "EMPTY_APPEND";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
