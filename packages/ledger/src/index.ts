/**
 * @navsync/ledger — Signed virtual ledger and fixed-point math.
 *
 * Tracks, per pool, the value and share claims that live on other chains:
 * - Virtual balances per token (signed, base-token units)
 * - Virtual supply (signed, share units)
 * - int256-bounded arithmetic (no silent wrap-around)
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Fail-closed: invalid values throw, never silently succeed
 * - Snapshots are JSON-safe (amounts as strings)
 */

// Core ledger
export { SignedLedger } from "./ledger.js";
export type { VirtualLedgerReader } from "./ledger.js";

// Fixed-point arithmetic
export {
  INT256_MAX,
  INT256_MIN,
  assertInt256,
  checkedAdd,
  mulDiv,
  applyBps,
  minBigInt,
  maxBigInt,
  pow10,
} from "./money-math.js";

// Types
export type {
  LedgerSnapshot,
  VirtualBalanceRecord,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
