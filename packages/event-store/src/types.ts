/**
 * @navsync/event-store — Core types.
 *
 * The journal is append-only: one stream per pool, every event linked
 * into a single SHA-256 hash chain across streams.
 */

import type { DomainEvent } from "@navsync/types";
import type { PoolEvent } from "./pool-events.js";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A pool event as persisted, before its hash-chain link.
 */
export interface StoredEvent {
  readonly event: PoolEvent;

  readonly streamId: string;

  /** Position within the stream, from 1 */
  readonly version: number;

  /** Position across all streams, from 1 */
  readonly globalPosition: number;

  /** Store time, distinct from the event's own timestamp */
  readonly appendedAt: string;
}

export interface HashedStoredEvent extends StoredEvent {
  /** SHA-256 of this event's canonical content plus previousHash */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
}

export interface ReadOptions {
  /** First version to return. Default: 1 */
  readonly fromVersion?: number;

  /** Default: unlimited */
  readonly maxCount?: number;
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only pool journal.
 *
 * Stream versions and global positions are contiguous. Events that are
 * not valid pool events are refused.
 */
export interface EventStore {
  /**
   * @throws EventStoreError("INVALID_PAYLOAD") if any event is not a pool event
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Events of one stream in version order. Empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Version of the last event in the stream, or 0 */
  streamVersion(streamId: string): number;

  verifyIntegrity(): EventStoreIntegrityResult;
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

  /** Global position of the last event checked */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "INVALID_PAYLOAD";

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
