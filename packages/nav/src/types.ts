/**
 * @navsync/nav — Collaborator interfaces and error types.
 *
 * The NAV engine never talks to a chain directly. It reads balances and
 * prices through the interfaces below so that tests and off-chain views can
 * plug in their own implementations.
 *
 * Rules:
 * - All amounts are bigint in the token's smallest unit
 * - Values are base-token units unless named otherwise
 * - A missing price route aborts the whole computation
 */

import type { Address, TokenAmount } from "@navsync/types";

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * Read-only wallet balances.
 */
export interface BalanceReader {
  balanceOf(token: Address, holder: Address): Promise<bigint>;
}

/**
 * Token custody seen from a pool: balances plus native unwrapping.
 */
export interface WalletLedger extends BalanceReader {
  /** Convert `amount` of the wrapped native token held by `holder` into native. */
  unwrapNative(holder: Address, amount: bigint): Promise<void>;
}

/**
 * Price oracle. Converts amounts between tokens at the current rate.
 */
export interface ValueConverter {
  /**
   * Convert `amount` of `tokenIn` into units of `tokenOut`.
   * Throws PriceRouteError when no route exists.
   */
  convert(tokenIn: Address, amount: bigint, tokenOut: Address): Promise<bigint>;

  hasPriceFeed(token: Address): Promise<boolean>;
}

/**
 * Positions a pool holds inside external applications (staking, lending).
 */
export interface ApplicationAggregator {
  getAppTokenBalances(pool: Address): Promise<readonly TokenAmount[]>;
}

// ─── NAV Components ──────────────────────────────────────────────────────

/**
 * Every intermediate figure of one NAV computation.
 */
export interface NavComponents {
  /** Net value per share, scaled by 10^decimals. */
  readonly unitaryValue: bigint;
  /** Gross value plus virtual balances. */
  readonly netTotalValue: bigint;
  /** Wallet and application value, before virtual balances. */
  readonly grossAssetValue: bigint;
  readonly totalSupply: bigint;
  readonly virtualSupply: bigint;
  /** totalSupply + virtualSupply */
  readonly effectiveSupply: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type NavErrorCode =
  | "EFFECTIVE_SUPPLY_ZERO"
  | "NEGATIVE_NET_VALUE"
  | "INVALID_POOL"
  | "INVALID_UNITARY_VALUE"
  | "UNPRICED_TOKEN"
  | "TOO_MANY_TOKENS"
  | "INSUFFICIENT_BALANCE"
  | "UNWRAP_UNAVAILABLE";

export class NavError extends Error {
  public readonly code: NavErrorCode;
  public readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: NavErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "NavError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

export type PriceRouteErrorCode = "NO_PRICE_ROUTE";

/**
 * Raised by a ValueConverter that cannot price a pair.
 */
export class PriceRouteError extends Error {
  public readonly code: PriceRouteErrorCode;
  public readonly tokenIn: Address;
  public readonly tokenOut: Address;

  constructor(tokenIn: Address, tokenOut: Address) {
    super(`No price route from ${tokenIn} to ${tokenOut}`);
    this.name = "PriceRouteError";
    this.code = "NO_PRICE_ROUTE";
    this.tokenIn = tokenIn;
    this.tokenOut = tokenOut;
  }
}
