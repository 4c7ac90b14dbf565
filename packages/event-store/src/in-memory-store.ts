/**
 * @popchain/event-store: In-memory EventStore.
 *
 * Backs the host ledger's audit log for the lifetime of the process.
 * Nothing survives a restart.
 */

import type {
  EventStore,
  EventStoreIntegrityResult,
  PendingEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: wall clock */
  readonly clock?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  /** Every event in global order; position n lives at index n - 1 */
  private readonly _log: StoredEvent[] = [];
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _clock: () => Date;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date());
  }

  append(entries: readonly PendingEvent[]): readonly StoredEvent[] {
    if (entries.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events");
    }
    const blank = entries.find((e) => e.streamId.length === 0);
    if (blank !== undefined) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        `Stream ID must be a non-empty string (event "${blank.event.type}")`,
      );
    }

    // Link the whole batch first; the log and streams change only after.
    const appendedAt = this._clock().toISOString();
    const versions = new Map<string, number>();
    let previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;

    const linked = entries.map(({ streamId, event }, i) => {
      const version = (versions.get(streamId) ?? this.streamLength(streamId)) + 1;
      versions.set(streamId, version);

      const stored = linkEvent(
        { streamId, event, version, globalPosition: this._log.length + i + 1, appendedAt },
        previousHash,
      );
      previousHash = stored.hash;
      return stored;
    });

    for (const stored of linked) {
      this._log.push(stored);
      const stream = this._streams.get(stored.streamId);
      if (stream === undefined) {
        this._streams.set(stored.streamId, [stored]);
      } else {
        stream.push(stored);
      }
    }
    return linked;
  }

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    const stream = this._streams.get(streamId) ?? [];
    return stream.slice(Math.max(options?.fromVersion ?? 1, 1) - 1);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    return this._log.slice(Math.max(options?.fromPosition ?? 1, 1) - 1);
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  private streamLength(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }
}
