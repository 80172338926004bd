/**
 * @navsync/event-store — In-memory pool journal.
 *
 * Keeps each stream in an array plus one global log that carries the
 * hash chain. Nothing is durable; a service that needs durability ships
 * the log elsewhere.
 */

import type { DomainEvent } from "@navsync/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadOptions,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";
import { isPoolEvent } from "./pool-events.js";
import type { PoolEvent } from "./pool-events.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Defaults to the wall clock. */
  readonly clock?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();

  /** Every stream, in append order */
  private readonly _log: HashedStoredEvent[] = [];

  private readonly _clock: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._clock = options.clock ?? (() => new Date());
  }

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    requireStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    // Validate the whole batch before anything is written.
    const poolEvents = events.map((event) => toPoolEvent(event, streamId));

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const appendedAt = this._clock().toISOString();
    let previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;

    for (const event of poolEvents) {
      const stored = linkEvent(
        {
          event,
          streamId,
          version: stream.length + 1,
          globalPosition: this._log.length + 1,
          appendedAt,
        },
        previousHash,
      );
      previousHash = stored.hash;
      stream.push(stored);
      this._log.push(stored);
    }

    return { streamId, fromVersion, toVersion: stream.length };
  }

  read(streamId: string, options: ReadOptions = {}): readonly HashedStoredEvent[] {
    requireStreamId(streamId);
    const fromVersion = options.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    const end = options.maxCount !== undefined ? fromVersion - 1 + options.maxCount : undefined;
    return stream.slice(fromVersion - 1, end);
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }
}

function requireStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function toPoolEvent(event: DomainEvent, streamId: string): PoolEvent {
  if (!isPoolEvent(event)) {
    throw new EventStoreError(
      "INVALID_PAYLOAD",
      `Invalid payload for event "${event.type}"`,
      streamId,
    );
  }
  return event;
}
