import { type Logger, pino } from "pino";

export type { Logger };

/**
 * Structured JSON logger for pipeline runs. Writes one line per event to stdout.
 */
export function createLogger(level = "info"): Logger {
  return pino({
    name: "berthwatch",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
