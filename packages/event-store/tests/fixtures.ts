/**
 * Shared pool events for event-store tests.
 */

import type { EventMetadata } from "@navsync/types";
import { POOL_EVENTS, createPoolEvent } from "../src/pool-events.js";
import type { PoolEvent } from "../src/pool-events.js";

export const POOL = "0x1111111111111111111111111111111111111111";
export const USDC = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";

export function metadata(n: number): EventMetadata {
  return {
    eventId: `evt-${String(n)}`,
    timestamp: "2026-01-01T00:00:00.000Z",
    actor: "reconciler",
    correlationId: `session-${String(n)}`,
    source: "reconciler",
  };
}

export function lockedEvent(n: number): PoolEvent {
  return createPoolEvent(
    POOL_EVENTS.DONATION_LOCKED,
    { pool: POOL, token: USDC, storedBalance: String(n), storedNav: "1000000" },
    metadata(n),
  );
}

export function receivedEvent(n: number): PoolEvent {
  return createPoolEvent(
    POOL_EVENTS.TOKENS_RECEIVED,
    {
      pool: POOL,
      token: USDC,
      amount: String(n),
      amountDelta: String(n),
      opType: "transfer",
      unwrapped: false,
      syncMultiplier: 0,
      receivedValue: String(n),
      virtualBalanceDelta: "0",
      virtualSupplyDelta: String(n),
      navBefore: "1000000",
      navAfter: "1000000",
    },
    metadata(n),
  );
}

/** Alternating lock and receipt events numbered from `start`. */
export function sessionEvents(count: number, start = 1): PoolEvent[] {
  return Array.from({ length: count }, (_, i) =>
    (start + i) % 2 === 1 ? lockedEvent(start + i) : receivedEvent(start + i),
  );
}
