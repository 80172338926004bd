/**
 * ReentrancyGuard — one call at a time per pool.
 *
 * lock() and finalize() await collaborators (wallet, oracle). While one
 * of them is suspended, any other entry into the same pool fails fast
 * instead of queueing. Once closed, the guard admits no further calls.
 */

import { ReconciliationError } from "./types.js";

export class ReentrancyGuard {
  private _entered = false;
  private _closed = false;
  private _current: Promise<unknown> | undefined;

  get entered(): boolean {
    return this._entered;
  }

  get closed(): boolean {
    return this._closed;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this._closed) {
      throw new ReconciliationError("POOL_STOPPED", "Pool no longer accepts calls");
    }
    if (this._entered) {
      throw new ReconciliationError("REENTRANT_CALL", "Reentrant call into pool");
    }
    this._entered = true;
    try {
      const call = fn();
      this._current = call;
      return await call;
    } finally {
      this._entered = false;
      this._current = undefined;
    }
  }

  /**
   * Refuse new calls, then wait for the one in flight to settle. Its
   * outcome still goes to its own caller.
   */
  async close(): Promise<void> {
    this._closed = true;
    if (this._current !== undefined) {
      await Promise.allSettled([this._current]);
    }
  }
}
