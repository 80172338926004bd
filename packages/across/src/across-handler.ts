/**
 * AcrossHandler — bridge entry point for one destination pool.
 *
 * Only the SpokePool may call in. A fill is bracketed by two calls:
 *   lockForFill(spokePool, token)                     opens the session
 *   handleV3AcrossMessage(spokePool, token, amount, message)  settles it
 *
 * Messages are decoded before the session sees them; a malformed
 * message never reaches the pool.
 */

import { zeroAddress, type Hex } from "viem";
import type { Address } from "@navsync/types";
import { isAddress, normalizeAddress } from "@navsync/types";
import type { DonationReceipt, DonationSnapshot, ReconciliationSession } from "@navsync/reconciler";
import { decodeDestinationMessage } from "./message-codec.js";
import { AcrossError } from "./types.js";

export class AcrossHandler {
  readonly spokePool: Address;

  constructor(
    spokePool: string,
    private readonly session: ReconciliationSession,
  ) {
    if (!isAddress(spokePool) || normalizeAddress(spokePool) === zeroAddress) {
      throw new AcrossError("INVALID_SPOKE_POOL", `Invalid SpokePool address: "${spokePool}"`);
    }
    this.spokePool = normalizeAddress(spokePool);
  }

  async lockForFill(caller: string, token: Address): Promise<DonationSnapshot> {
    this.requireSpokePool(caller);
    return this.session.lock(token, this.spokePool);
  }

  async handleV3AcrossMessage(
    caller: string,
    token: Address,
    amount: bigint,
    message: Hex,
  ): Promise<DonationReceipt> {
    this.requireSpokePool(caller);
    const params = decodeDestinationMessage(message);
    return this.session.finalize(token, amount, params, this.spokePool);
  }

  private requireSpokePool(caller: string): void {
    if (!isAddress(caller) || normalizeAddress(caller) !== this.spokePool) {
      throw new AcrossError("UNAUTHORIZED_CALLER", `Caller ${caller} is not the SpokePool`, {
        caller,
        spokePool: this.spokePool,
      });
    }
  }
}
