/**
 * @navsync/event-store — Pool Event Definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 * - pool.donation.locked
 * - pool.tokens.received
 *
 * Every pool journals into its own stream, `pool:<address>`. Amounts in
 * payloads are base-10 strings so that events stay JSON-safe.
 */

import type { DomainEvent, EventMetadata, OpType } from "@navsync/types";
import { isEventMetadata, isOpType } from "@navsync/types";
import { EventStoreError } from "./types.js";

export const POOL_EVENTS = {
  DONATION_LOCKED: "pool.donation.locked",
  TOKENS_RECEIVED: "pool.tokens.received",
} as const;

export type PoolEventType = (typeof POOL_EVENTS)[keyof typeof POOL_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

// Object type aliases rather than interfaces: payloads must be assignable
// to DomainEvent's Record<string, unknown>.

export type DonationLockedPayload = {
  readonly pool: string;
  readonly token: string;
  /** Wallet balance of the token when the session opened */
  readonly storedBalance: string;
  /** Unitary value when the session opened */
  readonly storedNav: string;
};

export type TokensReceivedPayload = {
  readonly pool: string;
  /** Token credited to the pool (NATIVE_TOKEN after an unwrap) */
  readonly token: string;
  /** Nominal amount declared by the bridge */
  readonly amount: string;
  /** Wallet balance increase observed between lock and finalize */
  readonly amountDelta: string;
  readonly opType: OpType;
  readonly unwrapped: boolean;
  readonly syncMultiplier: number;
  readonly receivedValue: string;
  readonly virtualBalanceDelta: string;
  readonly virtualSupplyDelta: string;
  readonly navBefore: string;
  readonly navAfter: string;
};

export interface PoolEventPayloads {
  readonly "pool.donation.locked": DonationLockedPayload;
  readonly "pool.tokens.received": TokensReceivedPayload;
}

/**
 * A journaled pool event, discriminated by `type`.
 */
export type PoolEvent = {
  [K in PoolEventType]: {
    readonly type: K;
    readonly metadata: EventMetadata;
    readonly payload: PoolEventPayloads[K];
  };
}[PoolEventType];

// =============================================================================
// Validation
// =============================================================================

const INTEGER_STRING = /^-?\d+$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasInteger(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && INTEGER_STRING.test(value);
}

export function isDonationLockedPayload(p: unknown): p is DonationLockedPayload {
  return (
    isObject(p) &&
    hasString(p, "pool") &&
    hasString(p, "token") &&
    hasInteger(p, "storedBalance") &&
    hasInteger(p, "storedNav")
  );
}

export function isTokensReceivedPayload(p: unknown): p is TokensReceivedPayload {
  return (
    isObject(p) &&
    hasString(p, "pool") &&
    hasString(p, "token") &&
    hasInteger(p, "amount") &&
    hasInteger(p, "amountDelta") &&
    isOpType(p.opType) &&
    typeof p.unwrapped === "boolean" &&
    typeof p.syncMultiplier === "number" &&
    hasInteger(p, "receivedValue") &&
    hasInteger(p, "virtualBalanceDelta") &&
    hasInteger(p, "virtualSupplyDelta") &&
    hasInteger(p, "navBefore") &&
    hasInteger(p, "navAfter")
  );
}

const VALIDATORS: Readonly<Record<PoolEventType, (payload: unknown) => boolean>> = {
  [POOL_EVENTS.DONATION_LOCKED]: isDonationLockedPayload,
  [POOL_EVENTS.TOKENS_RECEIVED]: isTokensReceivedPayload,
};

export function isPoolEventType(type: string): type is PoolEventType {
  return Object.values<string>(POOL_EVENTS).includes(type);
}

export function isPoolEvent(event: DomainEvent): event is PoolEvent {
  return (
    isPoolEventType(event.type) &&
    isEventMetadata(event.metadata) &&
    VALIDATORS[event.type](event.payload)
  );
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Stream that holds every event of one pool.
 */
export function poolStreamId(pool: string): string {
  return `pool:${pool.toLowerCase()}`;
}

/**
 * Build a pool event, validating its payload.
 *
 * @throws EventStoreError("INVALID_PAYLOAD") when the payload does not match the type
 */
export function createPoolEvent<T extends PoolEventType>(
  type: T,
  payload: PoolEventPayloads[T],
  metadata: EventMetadata,
): PoolEvent {
  const event: DomainEvent = { type, metadata, payload: { ...payload } };
  if (!isPoolEvent(event)) {
    throw new EventStoreError("INVALID_PAYLOAD", `Invalid payload for event "${type}"`);
  }
  return event;
}
