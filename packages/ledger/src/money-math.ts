/**
 * @navsync/ledger — Deterministic signed fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Results are bounded to the int256 range
 * so that every value can be written back to a 256-bit storage word.
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero (bigint semantics)
 * - Out-of-range results throw LedgerError("OVERFLOW")
 */

import { BPS_DENOMINATOR } from "@navsync/types";
import { LedgerError } from "./types.js";

// ─── Bounds ──────────────────────────────────────────────────────────────

export const INT256_MAX = 2n ** 255n - 1n;
export const INT256_MIN = -(2n ** 255n);

/**
 * Assert a value fits a signed 256-bit word.
 */
export function assertInt256(value: bigint, context: string): bigint {
  if (value > INT256_MAX || value < INT256_MIN) {
    throw new LedgerError(
      "OVERFLOW",
      `${context} overflows int256: ${value.toString()}`,
    );
  }
  return value;
}

/**
 * Add two signed values, rejecting int256 overflow.
 */
export function checkedAdd(a: bigint, b: bigint, context = "addition"): bigint {
  return assertInt256(a + b, context);
}

/**
 * Compute `a * b / denominator` with a single rounding step.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  return assertInt256((a * b) / denominator, "mulDiv");
}

/**
 * Take `bps` basis points of an amount.
 *
 * applyBps(1000n, 2500) → 250n
 */
export function applyBps(amount: bigint, bps: number): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps > BPS_DENOMINATOR) {
    throw new LedgerError(
      "INVALID_BPS",
      `Basis points must be an integer in [0, ${String(BPS_DENOMINATOR)}], got ${String(bps)}`,
    );
  }
  return mulDiv(amount, BigInt(bps), BigInt(BPS_DENOMINATOR));
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * 10^decimals as bigint.
 */
export function pow10(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 77) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Decimals must be an integer in [0, 77], got ${String(decimals)}`,
    );
  }
  return 10n ** BigInt(decimals);
}
