/**
 * @navsync/across — Across bridge integration.
 *
 * - Destination message codec (viem ABI encoding)
 * - AcrossHandler: SpokePool-only entry point into a ReconciliationSession
 */

export {
  DESTINATION_MESSAGE_ABI,
  encodeDestinationMessage,
  decodeDestinationMessage,
  opTypeFromCode,
} from "./message-codec.js";
export { AcrossHandler } from "./across-handler.js";
export type { AcrossErrorCode } from "./types.js";
export { AcrossError } from "./types.js";
