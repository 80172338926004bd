/**
 * TransferModeHandler — NAV-neutral relocation of value.
 *
 * The source chain gave the value up; here it must not look like a gain.
 * Received value first settles any positive virtual balance of the base
 * token (value this chain was already credited for), and whatever is left
 * is matched with virtual supply at the unitary value stored at lock.
 *
 * Value received above the nominal amount is organic and raises NAV.
 */

import { minBigInt, mulDiv, pow10 } from "@navsync/ledger";
import type { ModeContext, ModeHandler, ModeOutcome } from "./types.js";

export class TransferModeHandler implements ModeHandler {
  readonly opType = "transfer" as const;

  apply(context: ModeContext): ModeOutcome {
    const { ledger, baseToken, amountInBase } = context;

    let virtualBalanceDelta = 0n;
    const virtualBalance = ledger.getVirtualBalance(baseToken);
    if (virtualBalance > 0n) {
      const cleared = minBigInt(virtualBalance, amountInBase);
      ledger.updateVirtualBalance(baseToken, -cleared);
      virtualBalanceDelta = -cleared;
    }

    const remainder = amountInBase + virtualBalanceDelta;
    let virtualSupplyDelta = 0n;
    if (remainder > 0n) {
      virtualSupplyDelta = mulDiv(remainder, pow10(context.decimals), context.storedNav);
      ledger.updateVirtualSupply(virtualSupplyDelta);
    }

    return {
      virtualBalanceDelta,
      virtualSupplyDelta,
      neutralizedValue: amountInBase,
      organicValue: context.receivedValue - amountInBase,
    };
  }
}
