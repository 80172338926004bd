/**
 * @navsync/nav — NAV engine.
 *
 * Prices a pool from its wallet balances, application positions and
 * virtual ledger:
 *
 *   gross      = wallet(base) + Σ convert(wallet(token)) + Σ convert(app)
 *   net        = gross + Σ virtualBalance
 *   effective  = totalSupply + virtualSupply
 *   unitary    = net * 10^decimals / effective
 *
 * compute() is a pure read. update() additionally stores a positive
 * unitary value on the pool.
 */

import type { Address, TokenAmount } from "@navsync/types";
import { checkedAdd, mulDiv, pow10 } from "@navsync/ledger";
import type { PoolAccount } from "./pool-account.js";
import type {
  ApplicationAggregator,
  BalanceReader,
  NavComponents,
  ValueConverter,
} from "./types.js";
import { NavError } from "./types.js";

export interface NavEngineOptions {
  readonly balances: BalanceReader;
  readonly converter: ValueConverter;
  readonly applications?: ApplicationAggregator;
}

export class NavEngine {
  private readonly balances: BalanceReader;
  private readonly converter: ValueConverter;
  private readonly applications: ApplicationAggregator | undefined;

  constructor(options: NavEngineOptions) {
    this.balances = options.balances;
    this.converter = options.converter;
    this.applications = options.applications;
  }

  // ─── Valuation ───────────────────────────────────────────────────────

  /**
   * Value of `amount` of `token` in the pool's base token.
   */
  async valueInBase(pool: PoolAccount, token: Address, amount: bigint): Promise<bigint> {
    if (amount === 0n || token.toLowerCase() === pool.baseToken) {
      return amount;
    }
    return this.converter.convert(token, amount, pool.baseToken);
  }

  /**
   * Wallet balances of the base token and every active token.
   * The base token comes first.
   */
  async walletBalances(pool: PoolAccount): Promise<readonly TokenAmount[]> {
    const tokens = [pool.baseToken, ...pool.activeTokens()];
    const amounts = await Promise.all(
      tokens.map((token) => this.balances.balanceOf(token, pool.address)),
    );
    return tokens.map((token, i) => ({ token, amount: amounts[i] ?? 0n }));
  }

  async applicationBalances(pool: PoolAccount): Promise<readonly TokenAmount[]> {
    if (!this.applications) return [];
    return this.applications.getAppTokenBalances(pool.address);
  }

  /**
   * Wallet plus application value, in base-token units.
   */
  async grossAssetValue(pool: PoolAccount): Promise<bigint> {
    const [wallet, apps] = await Promise.all([
      this.walletBalances(pool),
      this.applicationBalances(pool),
    ]);

    let gross = 0n;
    for (const { token, amount } of [...wallet, ...apps]) {
      const value = await this.valueInBase(pool, token, amount);
      gross = checkedAdd(gross, value, "gross asset value");
    }
    return gross;
  }

  // ─── NAV ─────────────────────────────────────────────────────────────

  async compute(pool: PoolAccount): Promise<NavComponents> {
    const grossAssetValue = await this.grossAssetValue(pool);
    const netTotalValue = checkedAdd(
      grossAssetValue,
      pool.ledger.virtualBalanceTotal(),
      "net total value",
    );

    const totalSupply = pool.totalSupply;
    const virtualSupply = pool.ledger.getVirtualSupply();
    const effectiveSupply = checkedAdd(totalSupply, virtualSupply, "effective supply");

    let unitaryValue: bigint;
    if (effectiveSupply > 0n) {
      if (netTotalValue < 0n) {
        throw new NavError("NEGATIVE_NET_VALUE", "Net total value is negative", {
          pool: pool.address,
          netTotalValue: netTotalValue.toString(),
        });
      }
      unitaryValue = mulDiv(netTotalValue, pow10(pool.decimals), effectiveSupply);
    } else if (netTotalValue > 0n) {
      throw new NavError(
        "EFFECTIVE_SUPPLY_ZERO",
        "Pool holds value but has no effective supply",
        {
          pool: pool.address,
          netTotalValue: netTotalValue.toString(),
          effectiveSupply: effectiveSupply.toString(),
        },
      );
    } else {
      unitaryValue = pool.unitaryValue;
    }

    return {
      unitaryValue,
      netTotalValue,
      grossAssetValue,
      totalSupply,
      virtualSupply,
      effectiveSupply,
    };
  }

  /**
   * Compute and store the unitary value. Zero results are not stored.
   */
  async update(pool: PoolAccount): Promise<NavComponents> {
    const nav = await this.compute(pool);
    if (nav.unitaryValue > 0n) {
      pool.recordUnitaryValue(nav.unitaryValue);
    }
    return nav;
  }
}
