/**
 * Shared pool setup for reconciler tests.
 *
 * Base token has 18 decimals and is worth $1. The pool starts with
 * 1000 base tokens against 1000 shares (unitary value 1e18).
 */

import type { Logger } from "pino";
import type { Address, DestinationMessageParams } from "@navsync/types";
import { NATIVE_TOKEN } from "@navsync/types";
import { InMemoryWallet, PoolAccount, StaticPriceConverter } from "@navsync/nav";
import type { ApplicationAggregator, WalletLedger } from "@navsync/nav";
import { InMemoryEventStore } from "@navsync/event-store";
import { ReconciliationSession } from "../src/reconciliation-session.js";

export const E18 = 10n ** 18n;

export const POOL: Address = "0x1111111111111111111111111111111111111111";
export const BASE: Address = "0x6b175474e89094c44da98b954eedeac495271d0f";
export const WETH: Address = "0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2";
export const USDC: Address = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";
/** Priced, but not accepted from the bridge */
export const WBTC: Address = "0x2260fac5e5542a773aa44fbcfedf7c193bc2c599";

export const TRANSFER: DestinationMessageParams = {
  opType: "transfer",
  shouldUnwrapNative: false,
  syncMultiplier: 0,
};

export function syncParams(syncMultiplier: number): DestinationMessageParams {
  return { opType: "sync", shouldUnwrapNative: false, syncMultiplier };
}

export function createConverter(): StaticPriceConverter {
  return new StaticPriceConverter([
    [BASE, { decimals: 18, price: 100_000_000n }],
    [USDC, { decimals: 6, price: 100_000_000n }],
    [WETH, { decimals: 18, price: 200_000_000_000n }],
    [NATIVE_TOKEN, { decimals: 18, price: 200_000_000_000n }],
    [WBTC, { decimals: 8, price: 6_000_000_000_000n }],
  ]);
}

/**
 * Wallet whose reads wait on `gate` while it is set.
 */
export class GatedWallet implements WalletLedger {
  gate: Promise<void> | undefined;

  constructor(private readonly inner: WalletLedger) {}

  async balanceOf(token: Address, holder: Address): Promise<bigint> {
    if (this.gate !== undefined) {
      await this.gate;
    }
    return this.inner.balanceOf(token, holder);
  }

  async unwrapNative(holder: Address, amount: bigint): Promise<void> {
    return this.inner.unwrapNative(holder, amount);
  }
}

export interface HarnessOptions {
  readonly unitaryValue?: bigint;
  readonly totalSupply?: bigint;
  readonly baseBalance?: bigint;
  readonly wallet?: (inner: InMemoryWallet) => WalletLedger;
  readonly applications?: ApplicationAggregator;
  readonly logger?: Logger;
}

export interface Harness {
  readonly wallet: InMemoryWallet;
  /** What the session reads balances from; `wallet` unless wrapped */
  readonly ledger: WalletLedger;
  readonly pool: PoolAccount;
  readonly session: ReconciliationSession;
  readonly eventStore: InMemoryEventStore;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const wallet = new InMemoryWallet({ wrappedNative: WETH });
  wallet.credit(BASE, POOL, options.baseBalance ?? 1000n * E18);

  const pool = new PoolAccount({
    address: POOL,
    baseToken: BASE,
    decimals: 18,
    unitaryValue: options.unitaryValue ?? E18,
    totalSupply: options.totalSupply ?? 1000n * E18,
  });

  const clock = (): Date => new Date("2026-01-01T00:00:00.000Z");
  const eventStore = new InMemoryEventStore({ clock });

  const ledger = options.wallet ? options.wallet(wallet) : wallet;

  let nextId = 0;
  const session = new ReconciliationSession({
    pool,
    wallet: ledger,
    converter: createConverter(),
    applications: options.applications,
    crossChainTokens: [BASE, USDC, WETH],
    wrappedNative: WETH,
    eventStore,
    logger: options.logger,
    clock,
    idGenerator: () => {
      nextId += 1;
      return `id-${String(nextId)}`;
    },
  });

  return { wallet, ledger, pool, session, eventStore };
}
