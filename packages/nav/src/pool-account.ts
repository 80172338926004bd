/**
 * @navsync/nav — Per-pool NAV state.
 *
 * Holds what the NAV engine and the reconciliation session read and write
 * for one pool: base token, precision, stored unitary value, real supply,
 * active tokens, and the signed virtual ledger.
 *
 * Rules:
 * - baseToken and decimals are fixed at construction
 * - Only positive unitary values are stored
 * - checkpoint() / restore() cover every mutable field
 */

import type { Address } from "@navsync/types";
import { isAddress, normalizeAddress } from "@navsync/types";
import { SignedLedger } from "@navsync/ledger";
import type { LedgerSnapshot } from "@navsync/ledger";
import { NavError } from "./types.js";

export interface PoolAccountInit {
  readonly address: Address;
  readonly baseToken: Address;
  /** Decimals of the base token; the unitary value uses the same scale. */
  readonly decimals: number;
  /** 0 until the pool's first mint. */
  readonly unitaryValue?: bigint;
  readonly totalSupply?: bigint;
  readonly activeTokens?: readonly Address[];
  readonly ledger?: LedgerSnapshot;
}

/**
 * Everything a failed finalize must put back.
 */
export interface PoolCheckpoint {
  readonly unitaryValue: bigint;
  readonly activeTokens: readonly Address[];
  readonly ledger: LedgerSnapshot;
}

export class PoolAccount {
  readonly address: Address;
  readonly baseToken: Address;
  readonly decimals: number;
  readonly ledger: SignedLedger;

  private _unitaryValue: bigint;
  private _totalSupply: bigint;
  private readonly _activeTokens = new Set<Address>();

  constructor(init: PoolAccountInit) {
    if (!isAddress(init.address) || !isAddress(init.baseToken)) {
      throw new NavError("INVALID_POOL", "Pool and base token must be addresses", {
        address: init.address,
        baseToken: init.baseToken,
      });
    }
    if (!Number.isInteger(init.decimals) || init.decimals < 0 || init.decimals > 36) {
      throw new NavError(
        "INVALID_POOL",
        `Decimals must be an integer in [0, 36], got ${String(init.decimals)}`,
      );
    }

    const unitaryValue = init.unitaryValue ?? 0n;
    const totalSupply = init.totalSupply ?? 0n;
    if (unitaryValue < 0n || totalSupply < 0n) {
      throw new NavError("INVALID_POOL", "Unitary value and total supply cannot be negative");
    }

    this.address = normalizeAddress(init.address);
    this.baseToken = normalizeAddress(init.baseToken);
    this.decimals = init.decimals;
    this._unitaryValue = unitaryValue;
    this._totalSupply = totalSupply;
    this.ledger = init.ledger ? SignedLedger.fromSnapshot(init.ledger) : new SignedLedger();

    for (const token of init.activeTokens ?? []) {
      this.activate(token);
    }
  }

  // ─── Unitary Value ───────────────────────────────────────────────────

  get unitaryValue(): bigint {
    return this._unitaryValue;
  }

  get isInitialized(): boolean {
    return this._unitaryValue > 0n;
  }

  recordUnitaryValue(value: bigint): void {
    if (value <= 0n) {
      throw new NavError(
        "INVALID_UNITARY_VALUE",
        `Unitary value must be positive, got ${value.toString()}`,
      );
    }
    this._unitaryValue = value;
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /**
   * Set the real share supply. Minting and burning happen outside this
   * package; their result is reported here.
   */
  setTotalSupply(value: bigint): void {
    if (value < 0n) {
      throw new NavError("INVALID_POOL", "Total supply cannot be negative");
    }
    this._totalSupply = value;
  }

  // ─── Active Tokens ───────────────────────────────────────────────────

  isActive(token: Address): boolean {
    const key = normalizeAddress(token);
    return key === this.baseToken || this._activeTokens.has(key);
  }

  /**
   * Active tokens other than the base token, in activation order.
   */
  activeTokens(): readonly Address[] {
    return [...this._activeTokens];
  }

  activate(token: Address): void {
    const key = normalizeAddress(token);
    if (key !== this.baseToken) {
      this._activeTokens.add(key);
    }
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  checkpoint(): PoolCheckpoint {
    return {
      unitaryValue: this._unitaryValue,
      activeTokens: this.activeTokens(),
      ledger: this.ledger.snapshot(),
    };
  }

  restore(checkpoint: PoolCheckpoint): void {
    this.ledger.restore(checkpoint.ledger);
    this._activeTokens.clear();
    for (const token of checkpoint.activeTokens) {
      this.activate(token);
    }
    this._unitaryValue = checkpoint.unitaryValue;
  }
}
