/**
 * SyncModeHandler — bounded NAV change.
 *
 * The source chain already offset `syncMultiplier` bps of the value with
 * a virtual-balance entry. That share is cleared from the positive
 * virtual balance of the base token; the rest is performance. Virtual
 * supply never moves in sync mode.
 */

import { applyBps, maxBigInt, minBigInt } from "@navsync/ledger";
import type { ModeContext, ModeHandler, ModeOutcome } from "./types.js";

export class SyncModeHandler implements ModeHandler {
  readonly opType = "sync" as const;

  apply(context: ModeContext): ModeOutcome {
    const { ledger, baseToken, receivedValue } = context;

    if (context.syncMultiplier === 0) {
      return {
        virtualBalanceDelta: 0n,
        virtualSupplyDelta: 0n,
        neutralizedValue: 0n,
        organicValue: receivedValue,
      };
    }

    const target = applyBps(context.amountInBase, context.syncMultiplier);
    const available = maxBigInt(ledger.getVirtualBalance(baseToken), 0n);
    const cleared = minBigInt(available, target);
    if (cleared > 0n) {
      ledger.updateVirtualBalance(baseToken, -cleared);
    }

    return {
      virtualBalanceDelta: -cleared,
      virtualSupplyDelta: 0n,
      neutralizedValue: cleared,
      organicValue: receivedValue - cleared,
    };
  }
}
