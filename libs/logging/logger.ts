import pino from "pino";
import type { CallerIdentity } from "../context/identity.js";
import { RequestContext } from "../context/requestContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  base: {
    system: "group-authz"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  },
  // Lines written inside a request scope carry its id, whichever logger wrote them.
  mixin() {
    const identity = RequestContext.current();
    return identity ? { requestId: identity.requestId } : {};
  }
});

export type Logger = pino.Logger;

/**
 * Returns a child logger with the caller identity attached.
 * The request id comes from the request scope (see mixin above).
 */
export function getContextLogger(identity: CallerIdentity): Logger {
  return logger.child({
    subjectId: identity.subjectId,
    superadmin: identity.superadmin
  });
}

/**
 * Returns a child logger bound to a component name.
 */
export function getComponentLogger(component: string): Logger {
  return logger.child({ component });
}
