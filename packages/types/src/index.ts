/**
 * @navsync/types — Shared domain types for the navsync stack.
 *
 * These types are used across all navsync packages:
 * - EVM addressing and token amounts
 * - Bridge message parameters
 * - NAV readings
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Chain types
export type { Address, ChainId, TokenAmount, TokenRef } from "./chain.js";
export { NATIVE_TOKEN } from "./chain.js";

// Bridge types
export type { OpType, DestinationMessageParams } from "./bridge.js";
export { OP_TYPES, BPS_DENOMINATOR } from "./bridge.js";

// Financial types
export type { NavData, TokenBalance } from "./financial.js";

// Event types
export type { DomainEvent, EventMetadata } from "./event.js";

// Runtime type guards
export {
  isAddress,
  normalizeAddress,
  isOpType,
  isSyncMultiplier,
  isDestinationMessageParams,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
