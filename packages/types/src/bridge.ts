/**
 * Bridge Types
 *
 * Payload carried by a cross-chain transfer to the destination pool.
 *
 * Rules:
 * - OpType is a closed union; consumers match it exhaustively
 * - The sync multiplier is in basis points, 0..10000 inclusive
 */

/**
 * How the destination pool accounts for received value.
 *
 * - transfer: NAV-neutral relocation of value between chains
 * - sync: bounded NAV change; part of the value may already have been
 *   neutralized on the source chain
 */
export type OpType = "transfer" | "sync";

/** All op types, in wire-code order of their canonical codes. */
export const OP_TYPES: readonly OpType[] = ["transfer", "sync"] as const;

/** Basis-point denominator for multipliers and tolerances. */
export const BPS_DENOMINATOR = 10_000;

/**
 * Parameters decoded from the bridge message on the destination chain.
 */
export interface DestinationMessageParams {
  readonly opType: OpType;

  /** Unwrap the wrapped native token into the native token on receipt. */
  readonly shouldUnwrapNative: boolean;

  /**
   * Share of the received value (in bps) that the source chain already
   * offset with a virtual-balance entry. Only read in sync mode.
   */
  readonly syncMultiplier: number;
}
