/**
 * @navsync/ledger — Signed virtual ledger.
 *
 * Per-pool bookkeeping for value that exists on another chain:
 * - virtual balances, one signed entry per token, in base-token units
 * - a single signed virtual-supply counter, in share units
 *
 * API surface:
 * - getVirtualBalance() / updateVirtualBalance()
 * - getVirtualSupply() / updateVirtualSupply()
 * - virtualBalanceTotal() — sum used by the NAV engine
 * - snapshot() / fromSnapshot() — persistence and rollback
 *
 * The ledger does not know who may write to it. The reconciliation
 * session is its only writer; everything else reads.
 */

import type { Address } from "@navsync/types";
import { isAddress, normalizeAddress } from "@navsync/types";
import { assertInt256, checkedAdd } from "./money-math.js";
import type { LedgerSnapshot, VirtualBalanceRecord } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Read-only view of a virtual ledger.
 */
export interface VirtualLedgerReader {
  getVirtualBalance(token: Address): bigint;
  getVirtualSupply(): bigint;
  virtualBalanceTotal(): bigint;
}

export class SignedLedger implements VirtualLedgerReader {
  private readonly _virtualBalances = new Map<Address, bigint>();
  private _virtualSupply = 0n;

  // ─── Virtual Balances ────────────────────────────────────────────────

  getVirtualBalance(token: Address): bigint {
    return this._virtualBalances.get(normalizeAddress(token)) ?? 0n;
  }

  /**
   * Add a signed delta to a token's virtual balance.
   * Returns the new balance. Zero balances are dropped from the map.
   */
  updateVirtualBalance(token: Address, delta: bigint): bigint {
    const key = normalizeAddress(token);
    const next = checkedAdd(
      this._virtualBalances.get(key) ?? 0n,
      delta,
      `virtual balance of ${key}`,
    );

    if (next === 0n) {
      this._virtualBalances.delete(key);
    } else {
      this._virtualBalances.set(key, next);
    }
    return next;
  }

  /**
   * Sum of all virtual balances. Entries are already in base-token
   * units, so no conversion happens here.
   */
  virtualBalanceTotal(): bigint {
    let total = 0n;
    for (const amount of this._virtualBalances.values()) {
      total = checkedAdd(total, amount, "virtual balance total");
    }
    return total;
  }

  /**
   * Tokens with a non-zero virtual balance.
   */
  tokens(): readonly Address[] {
    return [...this._virtualBalances.keys()];
  }

  // ─── Virtual Supply ──────────────────────────────────────────────────

  getVirtualSupply(): bigint {
    return this._virtualSupply;
  }

  updateVirtualSupply(delta: bigint): bigint {
    this._virtualSupply = checkedAdd(this._virtualSupply, delta, "virtual supply");
    return this._virtualSupply;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    const virtualBalances: VirtualBalanceRecord[] = [];
    for (const [token, amount] of this._virtualBalances) {
      virtualBalances.push({ token, amount: amount.toString() });
    }
    return {
      version: 1,
      virtualBalances,
      virtualSupply: this._virtualSupply.toString(),
    };
  }

  /**
   * Replace this ledger's contents with a snapshot taken earlier.
   */
  restore(snapshot: LedgerSnapshot): void {
    const parsed = parseSnapshot(snapshot);
    this._virtualBalances.clear();
    for (const [token, amount] of parsed.balances) {
      this._virtualBalances.set(token, amount);
    }
    this._virtualSupply = parsed.supply;
  }

  static fromSnapshot(snapshot: LedgerSnapshot): SignedLedger {
    const ledger = new SignedLedger();
    ledger.restore(snapshot);
    return ledger;
  }
}

// ─── Internal Helpers ────────────────────────────────────────────────────

function parseSigned(value: string, field: string): bigint {
  if (!/^-?\d+$/.test(value)) {
    throw new LedgerError("INVALID_SNAPSHOT", `${field} is not an integer: "${value}"`);
  }
  return assertInt256(BigInt(value), field);
}

/**
 * Validate a whole snapshot before any of it is applied.
 */
function parseSnapshot(snapshot: LedgerSnapshot): {
  balances: Map<Address, bigint>;
  supply: bigint;
} {
  if (snapshot.version !== 1) {
    throw new LedgerError(
      "INVALID_SNAPSHOT",
      `Unsupported ledger snapshot version: ${String(snapshot.version)}`,
    );
  }

  const balances = new Map<Address, bigint>();
  for (const record of snapshot.virtualBalances) {
    if (!isAddress(record.token)) {
      throw new LedgerError("INVALID_SNAPSHOT", `Invalid token address: "${record.token}"`);
    }
    const token = normalizeAddress(record.token);
    if (balances.has(token)) {
      throw new LedgerError("INVALID_SNAPSHOT", `Duplicate virtual balance for ${token}`);
    }
    const amount = parseSigned(record.amount, `virtual balance of ${token}`);
    if (amount !== 0n) {
      balances.set(token, amount);
    }
  }

  return {
    balances,
    supply: parseSigned(snapshot.virtualSupply, "virtual supply"),
  };
}
