import { pino } from "pino";
import type { Identity } from "../context/identity.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "policy-store"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with the acting identity attached.
 */
export function getContextLogger(identity: Identity) {
  return logger.child({
    userId: identity.id
  });
}
