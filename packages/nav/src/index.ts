/**
 * @navsync/nav — Pool NAV computation.
 *
 * Prices a pool from wallet balances, application positions and its
 * signed virtual ledger:
 * - PoolAccount: per-pool state with checkpoint/restore
 * - NavEngine: unitary value, net value and effective supply
 * - TokenRegistry: idempotent, price-gated token activation
 * - NavView: read-only NAV data for off-chain consumers
 *
 * Design rules:
 * - bigint everywhere; no floating point
 * - Collaborators (balances, prices, applications) are interfaces
 * - Missing price routes and empty supplies throw, never return zero
 */

// Pool state
export { PoolAccount } from "./pool-account.js";
export type { PoolAccountInit, PoolCheckpoint } from "./pool-account.js";

// Engine
export { NavEngine } from "./nav-engine.js";
export type { NavEngineOptions } from "./nav-engine.js";

// Activation
export { TokenRegistry, DEFAULT_MAX_ACTIVE_TOKENS } from "./token-registry.js";
export type { TokenRegistryOptions } from "./token-registry.js";

// Collaborator implementations
export { StaticPriceConverter } from "./static-price-converter.js";
export type { TokenPrice } from "./static-price-converter.js";
export { InMemoryWallet } from "./in-memory-wallet.js";
export type { InMemoryWalletOptions } from "./in-memory-wallet.js";
export { EvmBalanceReader, isSupportedChain } from "./evm/evm-balance-reader.js";
export type { EvmBalanceReaderConfig } from "./evm/evm-balance-reader.js";

// Views
export { NavView } from "./nav-view.js";
export type { NavViewOptions, NavComparison } from "./nav-view.js";
export {
  normalizeNav,
  navToleranceRange,
  isWithinTolerance,
  deviationBps,
} from "./normalization.js";
export type { NavRange } from "./normalization.js";

// Types
export type {
  BalanceReader,
  WalletLedger,
  ValueConverter,
  ApplicationAggregator,
  NavComponents,
  NavErrorCode,
  PriceRouteErrorCode,
} from "./types.js";
export { NavError, PriceRouteError } from "./types.js";
