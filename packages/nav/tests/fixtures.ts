/**
 * Shared addresses and prices for nav tests.
 */

import type { Address } from "@navsync/types";
import { StaticPriceConverter } from "../src/static-price-converter.js";

export const POOL: Address = "0x1111111111111111111111111111111111111111";
export const USDC: Address = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";
export const WETH: Address = "0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2";
export const DAI: Address = "0x6b175474e89094c44da98b954eedeac495271d0f";

/** 1 USDC = $1, 1 WETH = $2000, prices with 8 decimals. DAI is unpriced. */
export function createConverter(): StaticPriceConverter {
  return new StaticPriceConverter([
    [USDC, { decimals: 6, price: 100_000_000n }],
    [WETH, { decimals: 18, price: 200_000_000_000n }],
  ]);
}
