/**
 * Financial Types
 *
 * NAV primitives for pool accounting.
 *
 * Rules:
 * - All amounts are bigint (no floating point)
 * - Values are expressed in base-token units unless named otherwise
 * - Unitary values are scaled by 10^decimals of the base token
 */

import type { Address } from "./chain.js";

/**
 * Point-in-time NAV reading for a pool.
 */
export interface NavData {
  /** Net asset value in base-token units (wallet + apps + virtual balances). */
  readonly totalValue: bigint;

  /** Value of one share, base-token units scaled by 10^decimals. */
  readonly unitaryValue: bigint;

  /** Unix time (seconds) of the reading. */
  readonly timestamp: number;
}

/**
 * Wallet balance of a token held by a pool.
 */
export interface TokenBalance {
  readonly token: Address;
  readonly balance: bigint;
}
