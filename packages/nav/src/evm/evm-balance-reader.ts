/**
 * EVM Balance Reader — live wallet balances through viem.
 *
 * Implements BalanceReader so a NavEngine can price a deployed pool:
 * - NATIVE_TOKEN → eth_getBalance
 * - any other token → ERC-20 balanceOf
 *
 * Read-only. Never signs or submits transactions.
 */

import {
  createPublicClient,
  http,
  parseAbiItem,
  type PublicClient,
  type HttpTransport,
  type Chain,
} from "viem";
import {
  mainnet,
  sepolia,
  base,
  arbitrum,
  optimism,
  polygon,
  bsc,
} from "viem/chains";
import type { Address, ChainId } from "@navsync/types";
import { NATIVE_TOKEN, normalizeAddress } from "@navsync/types";
import type { BalanceReader } from "../types.js";

// =============================================================================
// Chain ID to viem Chain mapping
// =============================================================================

const VIEM_CHAINS: Record<number, Chain> = {
  1: mainnet,
  11155111: sepolia,
  8453: base,
  42161: arbitrum,
  10: optimism,
  137: polygon,
  56: bsc,
};

const ERC20_BALANCE_OF = parseAbiItem(
  "function balanceOf(address owner) view returns (uint256)"
);

export interface EvmBalanceReaderConfig {
  readonly chainId: ChainId;
  readonly rpcUrl: string;
  readonly timeoutMs?: number;
}

export function isSupportedChain(chainId: ChainId): boolean {
  return VIEM_CHAINS[chainId] !== undefined;
}

// =============================================================================
// EVM Balance Reader
// =============================================================================

export class EvmBalanceReader implements BalanceReader {
  readonly chainId: ChainId;
  private readonly client: PublicClient<HttpTransport, Chain>;

  constructor(config: EvmBalanceReaderConfig) {
    const viemChain = VIEM_CHAINS[config.chainId];
    if (!viemChain) {
      throw new Error(
        `EvmBalanceReader: unsupported chain ${String(config.chainId)}. ` +
          `Supported: ${Object.keys(VIEM_CHAINS).join(", ")}`
      );
    }

    this.chainId = config.chainId;
    this.client = createPublicClient({
      chain: viemChain,
      transport: http(config.rpcUrl, {
        timeout: config.timeoutMs ?? 30_000,
      }),
    });
  }

  async balanceOf(token: Address, holder: Address): Promise<bigint> {
    const tokenAddress = normalizeAddress(token);
    const owner = normalizeAddress(holder);

    if (tokenAddress === NATIVE_TOKEN) {
      return this.client.getBalance({ address: owner });
    }

    return this.client.readContract({
      address: tokenAddress,
      abi: [ERC20_BALANCE_OF],
      functionName: "balanceOf",
      args: [owner],
    });
  }
}
