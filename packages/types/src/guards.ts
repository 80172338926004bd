/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used at system boundaries (decoded bridge messages, config, events).
 */

import type { Address } from "./chain.js";
import type { DestinationMessageParams, OpType } from "./bridge.js";
import { BPS_DENOMINATOR, OP_TYPES } from "./bridge.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Chain guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Lower-case an address so it can be used as a map key.
 * Throws on malformed input.
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new TypeError(`Invalid address: "${value}"`);
  }
  const lower = value.toLowerCase();
  return `0x${lower.slice(2)}`;
}

// =============================================================================
// Bridge guards
// =============================================================================

export function isOpType(value: unknown): value is OpType {
  return typeof value === "string" && (OP_TYPES as readonly string[]).includes(value);
}

export function isSyncMultiplier(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= BPS_DENOMINATOR
  );
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object";
}

export function isDestinationMessageParams(
  value: unknown,
): value is DestinationMessageParams {
  if (!isRecord(value)) return false;
  return (
    isOpType(value.opType) &&
    typeof value.shouldUnwrapNative === "boolean" &&
    isSyncMultiplier(value.syncMultiplier)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set(["reconciler", "nav", "across"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
