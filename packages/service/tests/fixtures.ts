/**
 * Shared setup for service tests: one funded pool on a $1 base token.
 */

import type { Address } from "@navsync/types";
import { InMemoryWallet, StaticPriceConverter } from "@navsync/nav";
import type { PoolAccountInit } from "@navsync/nav";
import type { PoolDefaults } from "../src/services/pool-registry.js";

export const E18 = 10n ** 18n;
export const POOL_A: Address = "0x1111111111111111111111111111111111111111";
export const POOL_B: Address = "0x2222222222222222222222222222222222222222";
export const BASE: Address = "0x6b175474e89094c44da98b954eedeac495271d0f";
export const SPOKE_POOL: Address = "0x5c7bcd6e7de5423a257d81b442095a1a6ced35c5";

export const clock = (): Date => new Date("2026-01-01T00:00:00.000Z");

export function poolInit(address: Address): PoolAccountInit {
  return { address, baseToken: BASE, decimals: 18, unitaryValue: E18, totalSupply: 1000n * E18 };
}

export function createDefaults(): { wallet: InMemoryWallet; defaults: PoolDefaults } {
  const wallet = new InMemoryWallet();
  wallet.credit(BASE, POOL_A, 1000n * E18);
  wallet.credit(BASE, POOL_B, 1000n * E18);
  return {
    wallet,
    defaults: {
      wallet,
      converter: new StaticPriceConverter([[BASE, { decimals: 18, price: 100_000_000n }]]),
      crossChainTokens: [BASE],
      spokePool: SPOKE_POOL,
      clock,
    },
  };
}
