import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/**
 * JSON logger on stdout. Level defaults to LOG_LEVEL; output is silenced
 * under Vitest or NODE_ENV=test. Pipe through pino-pretty for local reading.
 */
export function makeLogger(bindings?: Record<string, unknown>, level?: string): Logger {
  const isTestTooling =
    process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino({
    level: level ?? process.env.LOG_LEVEL ?? "info",
    enabled: !isTestTooling,
    base: { ...bindings, service: "query-agent" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger that emits nothing; for tests */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
