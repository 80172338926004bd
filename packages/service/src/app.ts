/**
 * @navsync/service — Application factory.
 *
 * Turns a validated AppConfig into a PoolRegistry. Wallet and price
 * source are supplied by the host; the config fixes the bridge side.
 * With RPC_URL set, NAV views read balances from the chain.
 */

import type { Logger } from "pino";
import { EvmBalanceReader, isSupportedChain } from "@navsync/nav";
import type { ApplicationAggregator, ValueConverter, WalletLedger } from "@navsync/nav";
import type { EventStore } from "@navsync/event-store";
import type { AppConfig } from "./config.js";
import { parseTokenList } from "./config.js";
import { PoolRegistry } from "./services/pool-registry.js";

export interface CreateAppOptions {
  readonly config: AppConfig;
  readonly wallet: WalletLedger;
  readonly converter: ValueConverter;
  readonly applications?: ApplicationAggregator;
  readonly eventStore?: EventStore;
  readonly logger: Logger;
  readonly clock?: () => Date;
}

export function createApp(options: CreateAppOptions): PoolRegistry {
  const { config, logger } = options;
  const crossChainTokens = parseTokenList(config.CROSSCHAIN_TOKENS);

  const registry = new PoolRegistry({
    wallet: options.wallet,
    converter: options.converter,
    applications: options.applications,
    balanceReader: createBalanceReader(config),
    crossChainTokens,
    spokePool: config.SPOKE_POOL_ADDRESS,
    wrappedNative: config.WRAPPED_NATIVE_ADDRESS,
    maxActiveTokens: config.MAX_ACTIVE_TOKENS,
    eventStore: options.eventStore,
    logger,
    clock: options.clock,
  });

  logger.info(
    {
      chainId: config.CHAIN_ID,
      spokePool: config.SPOKE_POOL_ADDRESS,
      crossChainTokens: crossChainTokens.length,
      liveBalances: config.RPC_URL !== undefined,
    },
    "Pool registry ready",
  );
  return registry;
}

/**
 * Live balance reader for the configured chain, or undefined when no
 * RPC endpoint is set.
 */
export function createBalanceReader(config: AppConfig): EvmBalanceReader | undefined {
  if (config.RPC_URL === undefined) {
    return undefined;
  }
  if (!isSupportedChain(config.CHAIN_ID)) {
    throw new Error(`CHAIN_ID ${String(config.CHAIN_ID)} has no viem chain definition`);
  }
  return new EvmBalanceReader({ chainId: config.CHAIN_ID, rpcUrl: config.RPC_URL });
}
