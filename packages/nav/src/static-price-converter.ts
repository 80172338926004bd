/**
 * @navsync/nav — Fixed-rate ValueConverter.
 *
 * Every token is quoted against one reference unit (for example USD with
 * 8 decimals). Conversion goes through that unit:
 *
 *   out = amount * priceIn * 10^decimalsOut / (10^decimalsIn * priceOut)
 *
 * Used by tests, simulations, and off-chain views that already hold
 * oracle prices.
 */

import type { Address } from "@navsync/types";
import { normalizeAddress } from "@navsync/types";
import { pow10 } from "@navsync/ledger";
import type { ValueConverter } from "./types.js";
import { NavError, PriceRouteError } from "./types.js";

export interface TokenPrice {
  readonly decimals: number;
  /** Reference units per one whole token. Must be positive. */
  readonly price: bigint;
}

export class StaticPriceConverter implements ValueConverter {
  private readonly prices = new Map<Address, TokenPrice>();

  constructor(prices: Iterable<readonly [Address, TokenPrice]> = []) {
    for (const [token, price] of prices) {
      this.setPrice(token, price);
    }
  }

  setPrice(token: Address, price: TokenPrice): void {
    if (price.price <= 0n) {
      throw new NavError("UNPRICED_TOKEN", `Price for ${token} must be positive`);
    }
    if (!Number.isInteger(price.decimals) || price.decimals < 0 || price.decimals > 36) {
      throw new NavError("UNPRICED_TOKEN", `Invalid decimals for ${token}: ${String(price.decimals)}`);
    }
    this.prices.set(normalizeAddress(token), price);
  }

  removePrice(token: Address): void {
    this.prices.delete(normalizeAddress(token));
  }

  async hasPriceFeed(token: Address): Promise<boolean> {
    return this.prices.has(normalizeAddress(token));
  }

  async convert(tokenIn: Address, amount: bigint, tokenOut: Address): Promise<bigint> {
    const inKey = normalizeAddress(tokenIn);
    const outKey = normalizeAddress(tokenOut);
    if (inKey === outKey) return amount;

    const priceIn = this.prices.get(inKey);
    const priceOut = this.prices.get(outKey);
    if (!priceIn || !priceOut) {
      throw new PriceRouteError(inKey, outKey);
    }

    return (
      (amount * priceIn.price * pow10(priceOut.decimals)) /
      (pow10(priceIn.decimals) * priceOut.price)
    );
  }
}
