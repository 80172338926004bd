/**
 * Chain Types
 *
 * EVM addressing primitives shared by every package.
 *
 * Rules:
 * - Addresses are 0x-prefixed, 20-byte hex strings
 * - Comparison is case-insensitive; packages normalize with `normalizeAddress`
 * - Amounts are bigint in the token's smallest unit
 */

/**
 * A 20-byte EVM address (`0x` + 40 hex chars).
 * Structurally identical to viem's `Address`.
 */
export type Address = `0x${string}`;

/**
 * EIP-155 numeric chain identifier (1 = Ethereum, 42161 = Arbitrum, ...).
 */
export type ChainId = number;

/**
 * The native token (ETH on most chains) is keyed by the zero address.
 */
export const NATIVE_TOKEN: Address = "0x0000000000000000000000000000000000000000";

/**
 * An amount of a specific token, in the token's smallest unit.
 */
export interface TokenAmount {
  readonly token: Address;
  readonly amount: bigint;
}

/**
 * Reference to a token on a specific chain.
 */
export interface TokenRef {
  readonly chainId: ChainId;
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;
}
