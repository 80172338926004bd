/**
 * @navsync/nav — Cross-chain NAV comparison.
 *
 * The same pool may quote its unitary value with different decimals on
 * different chains (USDC has 6 decimals on Ethereum, 18 on BSC). These
 * helpers bring two readings to one scale and compare them within a
 * basis-point tolerance.
 */

import { BPS_DENOMINATOR } from "@navsync/types";
import { applyBps, pow10 } from "@navsync/ledger";

/**
 * Rescale a unitary value from one precision to another.
 * Scaling down truncates.
 *
 * normalizeNav(1_000_000n, 6, 18) → 1_000_000_000_000_000_000n
 */
export function normalizeNav(nav: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return nav;
  if (toDecimals > fromDecimals) {
    return nav * pow10(toDecimals - fromDecimals);
  }
  return nav / pow10(fromDecimals - toDecimals);
}

export interface NavRange {
  readonly min: bigint;
  readonly max: bigint;
}

/**
 * Inclusive range of values within `toleranceBps` of `nav`.
 */
export function navToleranceRange(nav: bigint, toleranceBps: number): NavRange {
  const delta = applyBps(nav < 0n ? -nav : nav, toleranceBps);
  return { min: nav - delta, max: nav + delta };
}

/**
 * Whether `candidate` lies within `toleranceBps` of `reference`.
 * Both values must use the same decimals.
 */
export function isWithinTolerance(
  reference: bigint,
  candidate: bigint,
  toleranceBps: number,
): boolean {
  const { min, max } = navToleranceRange(reference, toleranceBps);
  return candidate >= min && candidate <= max;
}

/**
 * Deviation of `candidate` from `reference` in basis points, truncated.
 * Returns null when the reference is zero.
 */
export function deviationBps(reference: bigint, candidate: bigint): bigint | null {
  if (reference === 0n) return null;
  const diff = candidate - reference;
  const abs = diff < 0n ? -diff : diff;
  const ref = reference < 0n ? -reference : reference;
  return (abs * BigInt(BPS_DENOMINATOR)) / ref;
}
