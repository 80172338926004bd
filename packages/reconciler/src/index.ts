/**
 * @navsync/reconciler — Cross-chain NAV reconciliation.
 *
 * Receives bridged tokens on a destination pool and keeps its NAV honest:
 * - ReconciliationSession: lock/finalize state machine per (pool, token)
 * - TransferModeHandler: NAV-neutral relocation of value
 * - SyncModeHandler: bounded, performance-bearing transfer
 * - DonationLocks / ReentrancyGuard: session and call exclusion
 */

// Session
export { ReconciliationSession, LOCK_SENTINEL } from "./reconciliation-session.js";
export type { ReconciliationSessionOptions } from "./reconciliation-session.js";

// Mode handlers
export { TransferModeHandler } from "./transfer-mode-handler.js";
export { SyncModeHandler } from "./sync-mode-handler.js";

// Exclusion
export { DonationLocks } from "./donation-locks.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";

// Types
export type {
  DonationSnapshot,
  DonationReceipt,
  DonationResult,
  ModeContext,
  ModeHandler,
  ModeOutcome,
  ReconciliationErrorCode,
} from "./types.js";
export { ReconciliationError } from "./types.js";
