/**
 * DonationLocks — open donation sessions of one pool, keyed by token.
 *
 * At most one session per token. There is no cancel: a session ends only
 * when finalize() releases it.
 *
 * Each session also tracks the value other sessions settled after it was
 * opened. A settlement whose tokens had already arrived when this session
 * locked is part of this session's stored assets, so only the remainder
 * is carried over.
 */

import type { Address } from "@navsync/types";
import { normalizeAddress } from "@navsync/types";
import type { DonationSnapshot } from "./types.js";
import { ReconciliationError } from "./types.js";

interface LockEntry {
  readonly snapshot: DonationSnapshot;
  /** Value already delivered to each other open session at lock time */
  readonly preDelivered: Map<Address, bigint>;
  settledSinceLock: bigint;
}

export class DonationLocks {
  private readonly _sessions = new Map<Address, LockEntry>();

  isLocked(token: Address): boolean {
    return this._sessions.has(normalizeAddress(token));
  }

  get(token: Address): DonationSnapshot | undefined {
    return this._sessions.get(normalizeAddress(token))?.snapshot;
  }

  /**
   * Open a session. `preDelivered` maps the tokens of sessions already
   * open to the value they had received when this one locked.
   */
  open(snapshot: DonationSnapshot, preDelivered: ReadonlyMap<Address, bigint> = new Map()): void {
    const key = normalizeAddress(snapshot.token);
    if (this._sessions.has(key)) {
      throw new ReconciliationError(
        "DONATION_LOCK",
        `Donation session already open for ${key}`,
        { token: key },
      );
    }
    const delivered = new Map<Address, bigint>();
    for (const [token, value] of preDelivered) {
      const other = normalizeAddress(token);
      if (other !== key && this._sessions.has(other)) {
        delivered.set(other, value);
      }
    }
    this._sessions.set(key, { snapshot, preDelivered: delivered, settledSinceLock: 0n });
  }

  /**
   * Value settled by other sessions since `token` locked, net of what had
   * already arrived by then.
   */
  settledSinceLock(token: Address): bigint {
    return this._sessions.get(normalizeAddress(token))?.settledSinceLock ?? 0n;
  }

  /**
   * Carry a settlement of `token` worth `receivedValue` over to every
   * other open session.
   */
  recordSettlement(token: Address, receivedValue: bigint): void {
    const key = normalizeAddress(token);
    for (const [other, entry] of this._sessions) {
      if (other === key) continue;
      entry.settledSinceLock += receivedValue - (entry.preDelivered.get(key) ?? 0n);
      entry.preDelivered.delete(key);
    }
  }

  /**
   * Close the session for `token` and drop its snapshot.
   */
  release(token: Address): DonationSnapshot | undefined {
    const key = normalizeAddress(token);
    const entry = this._sessions.get(key);
    this._sessions.delete(key);
    for (const other of this._sessions.values()) {
      other.preDelivered.delete(key);
    }
    return entry?.snapshot;
  }

  openSessions(): readonly DonationSnapshot[] {
    return [...this._sessions.values()].map((entry) => entry.snapshot);
  }
}
