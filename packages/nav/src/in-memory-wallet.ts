/**
 * @navsync/nav — In-memory WalletLedger.
 *
 * Simulates token custody for tests and dry runs. Incoming bridge fills
 * are modelled with credit(); the wrapped native token unwraps 1:1 into
 * NATIVE_TOKEN.
 */

import type { Address } from "@navsync/types";
import { NATIVE_TOKEN, normalizeAddress } from "@navsync/types";
import type { WalletLedger } from "./types.js";
import { NavError } from "./types.js";

export interface InMemoryWalletOptions {
  readonly wrappedNative?: Address;
}

export class InMemoryWallet implements WalletLedger {
  private readonly balances = new Map<string, bigint>();
  private readonly wrappedNative: Address | undefined;

  constructor(options: InMemoryWalletOptions = {}) {
    this.wrappedNative =
      options.wrappedNative !== undefined
        ? normalizeAddress(options.wrappedNative)
        : undefined;
  }

  async balanceOf(token: Address, holder: Address): Promise<bigint> {
    return this.balances.get(key(token, holder)) ?? 0n;
  }

  credit(token: Address, holder: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new NavError("INSUFFICIENT_BALANCE", "Credit amount cannot be negative");
    }
    const k = key(token, holder);
    this.balances.set(k, (this.balances.get(k) ?? 0n) + amount);
  }

  debit(token: Address, holder: Address, amount: bigint): void {
    const k = key(token, holder);
    const current = this.balances.get(k) ?? 0n;
    if (amount < 0n || amount > current) {
      throw new NavError(
        "INSUFFICIENT_BALANCE",
        `Cannot debit ${amount.toString()} of ${token}: balance is ${current.toString()}`,
      );
    }
    this.balances.set(k, current - amount);
  }

  async unwrapNative(holder: Address, amount: bigint): Promise<void> {
    if (this.wrappedNative === undefined) {
      throw new NavError("UNWRAP_UNAVAILABLE", "No wrapped native token configured");
    }
    this.debit(this.wrappedNative, holder, amount);
    this.credit(NATIVE_TOKEN, holder, amount);
  }
}

function key(token: Address, holder: Address): string {
  return `${normalizeAddress(token)}:${normalizeAddress(holder)}`;
}
