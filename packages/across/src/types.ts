/**
 * Across Types
 *
 * Errors raised at the bridge boundary, before a message reaches the
 * reconciler.
 */

export type AcrossErrorCode =
  | "INVALID_SPOKE_POOL"
  | "UNAUTHORIZED_CALLER"
  | "INVALID_MESSAGE"
  | "INVALID_OP_TYPE"
  | "INVALID_SYNC_MULTIPLIER";

export class AcrossError extends Error {
  public readonly code: AcrossErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(code: AcrossErrorCode, message: string, details?: Readonly<Record<string, unknown>>) {
    super(message);
    this.name = "AcrossError";
    this.code = code;
    this.details = details;
  }
}
