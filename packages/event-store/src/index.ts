/**
 * @navsync/event-store — Append-only pool journal.
 *
 * Provides:
 * - EventStore interface for per-pool event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - Pool event definitions (donation locked, tokens received)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  ReadOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Pool domain events
export {
  POOL_EVENTS,
  poolStreamId,
  createPoolEvent,
  isPoolEvent,
  isPoolEventType,
  isDonationLockedPayload,
  isTokensReceivedPayload,
} from "./pool-events.js";
export type {
  PoolEvent,
  PoolEventType,
  PoolEventPayloads,
  DonationLockedPayload,
  TokensReceivedPayload,
} from "./pool-events.js";
