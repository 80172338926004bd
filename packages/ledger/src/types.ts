/**
 * @navsync/ledger — Internal types for the virtual ledger.
 *
 * Rules:
 * - Virtual balances are signed and denominated in base-token units
 * - Snapshot amounts are decimal strings (JSON-safe)
 * - Fail-closed: invalid arithmetic throws, never wraps or clamps
 */

import type { Address } from "@navsync/types";

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * One virtual-balance line in a snapshot.
 */
export interface VirtualBalanceRecord {
  readonly token: Address;
  /** Signed integer as a base-10 string. */
  readonly amount: string;
}

/**
 * Serializable snapshot of a pool's virtual ledger.
 * Used for persistence and for rolling back a failed finalize.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly virtualBalances: readonly VirtualBalanceRecord[];
  readonly virtualSupply: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "OVERFLOW"
  | "DIVISION_BY_ZERO"
  | "INVALID_AMOUNT"
  | "INVALID_BPS"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
