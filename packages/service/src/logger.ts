/**
 * @navsync/service — Logger factory.
 *
 * JSON lines via pino; pretty-printed in development.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
