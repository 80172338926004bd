/**
 * @navsync/nav — Off-chain NAV view.
 *
 * Read-only accessors for dashboards and keepers. Nothing here writes to
 * the pool: getNavData() runs the same computation as a finalize but
 * discards the result.
 */

import type { NavData, TokenAmount, TokenBalance } from "@navsync/types";
import type { NavEngine } from "./nav-engine.js";
import { deviationBps, isWithinTolerance, normalizeNav } from "./normalization.js";
import type { PoolAccount } from "./pool-account.js";

export interface NavViewOptions {
  /** Milliseconds since epoch. Defaults to Date.now. */
  readonly clock?: () => number;
}

/**
 * Result of comparing the local unitary value with another chain's.
 */
export interface NavComparison {
  /** Local unitary value at the remote precision. */
  readonly local: bigint;
  readonly remote: bigint;
  readonly decimals: number;
  readonly deviationBps: bigint | null;
  readonly withinTolerance: boolean;
}

export class NavView {
  private readonly clock: () => number;

  constructor(
    private readonly pool: PoolAccount,
    private readonly engine: NavEngine,
    options: NavViewOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
  }

  async getNavData(): Promise<NavData> {
    const nav = await this.engine.compute(this.pool);
    return {
      totalValue: nav.netTotalValue,
      unitaryValue: nav.unitaryValue,
      timestamp: Math.floor(this.clock() / 1000),
    };
  }

  /**
   * Base token first, then active tokens. Active tokens with a zero
   * balance are skipped; the base token is always listed.
   */
  async getAllTokensAndBalances(): Promise<readonly TokenBalance[]> {
    const wallet = await this.engine.walletBalances(this.pool);
    return wallet
      .filter(({ token, amount }) => token === this.pool.baseToken || amount > 0n)
      .map(({ token, amount }) => ({ token, balance: amount }));
  }

  async getAppTokensAndBalances(): Promise<readonly TokenAmount[]> {
    return this.engine.applicationBalances(this.pool);
  }

  /**
   * Compare the live unitary value with one reported by another chain.
   */
  async compareWithRemote(
    remoteUnitaryValue: bigint,
    remoteDecimals: number,
    toleranceBps: number,
  ): Promise<NavComparison> {
    const nav = await this.engine.compute(this.pool);
    const local = normalizeNav(nav.unitaryValue, this.pool.decimals, remoteDecimals);
    return {
      local,
      remote: remoteUnitaryValue,
      decimals: remoteDecimals,
      deviationBps: deviationBps(local, remoteUnitaryValue),
      withinTolerance: isWithinTolerance(local, remoteUnitaryValue, toleranceBps),
    };
  }
}
