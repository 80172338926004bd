/**
 * Reconciler Types
 *
 * Shared types for the two-phase donation protocol:
 * - DonationSnapshot: what lock() records for one (pool, token) session
 * - ModeHandler / ModeOutcome: how received value is neutralized
 * - DonationReceipt: what a successful finalize() returns
 * - ReconciliationError: every rejection, with a stable code
 */

import type { Address, OpType } from "@navsync/types";
import type { SignedLedger } from "@navsync/ledger";
import type { NavComponents } from "@navsync/nav";

// =============================================================================
// Session State
// =============================================================================

/**
 * State captured by lock(). Lives until the matching finalize().
 */
export interface DonationSnapshot {
  readonly token: Address;
  /** Wallet balance of `token` when the session opened */
  readonly storedBalance: bigint;
  /** Unitary value when the session opened */
  readonly storedNav: bigint;
  /** Gross asset value (wallet + applications) when the session opened */
  readonly storedAssets: bigint;
  /** Shared by the lock and finalize events of this session */
  readonly correlationId: string;
  readonly lockedAt: string;
}

// =============================================================================
// Mode Handlers
// =============================================================================

/**
 * Inputs a mode handler sees. Values are in base-token units.
 */
export interface ModeContext {
  readonly ledger: SignedLedger;
  readonly baseToken: Address;
  readonly decimals: number;
  /** Nominal bridged amount in base units, capped at receivedValue */
  readonly amountInBase: bigint;
  /** Value actually received between lock and finalize */
  readonly receivedValue: bigint;
  readonly storedNav: bigint;
  /** Basis points; only read in sync mode */
  readonly syncMultiplier: number;
}

/**
 * What a handler did to the virtual ledger. The session checks the
 * recomputed NAV against these deltas.
 */
export interface ModeOutcome {
  readonly virtualBalanceDelta: bigint;
  readonly virtualSupplyDelta: bigint;
  /** Part of receivedValue offset by virtual entries */
  readonly neutralizedValue: bigint;
  /** Part of receivedValue that changes NAV */
  readonly organicValue: bigint;
}

export interface ModeHandler {
  readonly opType: OpType;
  apply(context: ModeContext): ModeOutcome;
}

// =============================================================================
// Results
// =============================================================================

export interface DonationReceipt {
  readonly pool: Address;
  /** Token the session was locked on */
  readonly token: Address;
  /** Token credited to the pool; NATIVE_TOKEN after an unwrap */
  readonly creditedToken: Address;
  readonly amount: bigint;
  readonly amountDelta: bigint;
  readonly opType: OpType;
  readonly unwrapped: boolean;
  /** The credited token was activated by this donation */
  readonly activated: boolean;
  readonly receivedValue: bigint;
  readonly amountInBase: bigint;
  readonly outcome: ModeOutcome;
  readonly navBefore: NavComponents;
  readonly navAfter: NavComponents;
  readonly correlationId: string;
}

/**
 * Result of donate(): the sentinel amount opens a session, anything
 * else settles one.
 */
export type DonationResult =
  | { readonly kind: "locked"; readonly snapshot: DonationSnapshot }
  | { readonly kind: "settled"; readonly receipt: DonationReceipt };

// =============================================================================
// Errors
// =============================================================================

export type ReconciliationErrorCode =
  | "DONATION_LOCK"
  | "TOKEN_NOT_INITIALIZED"
  | "BALANCE_UNDERFLOW"
  | "CALLER_TRANSFER_AMOUNT"
  | "UNSUPPORTED_CROSSCHAIN_TOKEN"
  | "INVALID_OP_TYPE"
  | "INVALID_AMOUNT"
  | "INVALID_SYNC_MULTIPLIER"
  | "NAV_MANIPULATION_DETECTED"
  | "REENTRANT_CALL"
  | "POOL_STOPPED";

export class ReconciliationError extends Error {
  public readonly code: ReconciliationErrorCode;
  public readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: ReconciliationErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "ReconciliationError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}
