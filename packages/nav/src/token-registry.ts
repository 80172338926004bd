/**
 * @navsync/nav — Active token registry.
 *
 * A token counts toward NAV once it is active. Activation is idempotent
 * and requires a price feed, so every active token can always be valued.
 */

import type { Address } from "@navsync/types";
import { normalizeAddress } from "@navsync/types";
import type { PoolAccount } from "./pool-account.js";
import type { ValueConverter } from "./types.js";
import { NavError } from "./types.js";

export const DEFAULT_MAX_ACTIVE_TOKENS = 128;

export interface TokenRegistryOptions {
  /** Upper bound on active tokens besides the base token. */
  readonly maxActiveTokens?: number;
}

export class TokenRegistry {
  readonly maxActiveTokens: number;

  constructor(
    private readonly pool: PoolAccount,
    private readonly converter: ValueConverter,
    options: TokenRegistryOptions = {},
  ) {
    const max = options.maxActiveTokens ?? DEFAULT_MAX_ACTIVE_TOKENS;
    if (!Number.isInteger(max) || max < 0) {
      throw new NavError("TOO_MANY_TOKENS", `Invalid token limit: ${String(max)}`);
    }
    this.maxActiveTokens = max;
  }

  isActive(token: Address): boolean {
    return this.pool.isActive(token);
  }

  /**
   * Activate `token` unless it already is.
   * Returns whether the token was active before the call.
   */
  async addIfNew(token: Address): Promise<boolean> {
    const key = normalizeAddress(token);
    if (this.pool.isActive(key)) {
      return true;
    }

    if (!(await this.converter.hasPriceFeed(key))) {
      throw new NavError("UNPRICED_TOKEN", `Token ${key} has no price feed`, {
        token: key,
      });
    }

    if (this.pool.activeTokens().length >= this.maxActiveTokens) {
      throw new NavError(
        "TOO_MANY_TOKENS",
        `Pool already holds ${String(this.maxActiveTokens)} active tokens`,
        { token: key, maxActiveTokens: this.maxActiveTokens },
      );
    }

    this.pool.activate(key);
    return false;
  }
}
