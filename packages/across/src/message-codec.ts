/**
 * Destination message codec.
 *
 * The bridge carries an ABI-encoded tuple to the destination pool:
 *
 *   (uint8 opType, bool shouldUnwrapNative, uint256 syncMultiplier)
 *
 * Wire codes:
 *   0 → transfer
 *   1 → rebalance (legacy; settled as sync)
 *   2 → sync
 */

import { decodeAbiParameters, encodeAbiParameters, type Hex } from "viem";
import type { DestinationMessageParams, OpType } from "@navsync/types";
import { BPS_DENOMINATOR, isOpType, isSyncMultiplier } from "@navsync/types";
import { AcrossError } from "./types.js";

export const DESTINATION_MESSAGE_ABI = [
  {
    type: "tuple",
    components: [
      { name: "opType", type: "uint8" },
      { name: "shouldUnwrapNative", type: "bool" },
      { name: "syncMultiplier", type: "uint256" },
    ],
  },
] as const;

const OP_TYPE_CODES: Readonly<Record<OpType, number>> = {
  transfer: 0,
  sync: 2,
};

const LEGACY_REBALANCE_CODE = 1;

export function opTypeFromCode(code: number): OpType {
  switch (code) {
    case OP_TYPE_CODES.transfer:
      return "transfer";
    case LEGACY_REBALANCE_CODE:
    case OP_TYPE_CODES.sync:
      return "sync";
    default:
      throw new AcrossError("INVALID_OP_TYPE", `Unknown op type code: ${String(code)}`, { code });
  }
}

export function encodeDestinationMessage(params: DestinationMessageParams): Hex {
  if (!isOpType(params.opType)) {
    throw new AcrossError("INVALID_OP_TYPE", `Unknown op type: ${String(params.opType)}`);
  }
  if (!isSyncMultiplier(params.syncMultiplier)) {
    throw new AcrossError(
      "INVALID_SYNC_MULTIPLIER",
      `Sync multiplier must be an integer in [0, ${String(BPS_DENOMINATOR)}], got ${String(params.syncMultiplier)}`,
    );
  }
  return encodeAbiParameters(DESTINATION_MESSAGE_ABI, [
    {
      opType: OP_TYPE_CODES[params.opType],
      shouldUnwrapNative: params.shouldUnwrapNative,
      syncMultiplier: BigInt(params.syncMultiplier),
    },
  ]);
}

export function decodeDestinationMessage(message: Hex): DestinationMessageParams {
  let decoded: { opType: number; shouldUnwrapNative: boolean; syncMultiplier: bigint };
  try {
    [decoded] = decodeAbiParameters(DESTINATION_MESSAGE_ABI, message);
  } catch (err) {
    throw new AcrossError("INVALID_MESSAGE", "Malformed destination message", {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const opType = opTypeFromCode(decoded.opType);
  if (decoded.syncMultiplier > BigInt(BPS_DENOMINATOR)) {
    throw new AcrossError(
      "INVALID_SYNC_MULTIPLIER",
      `Sync multiplier must not exceed ${String(BPS_DENOMINATOR)}, got ${decoded.syncMultiplier.toString()}`,
    );
  }

  return {
    opType,
    shouldUnwrapNative: decoded.shouldUnwrapNative,
    syncMultiplier: Number(decoded.syncMultiplier),
  };
}
