import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** CLI logger: JSON lines on stderr so stdout stays clean for tables and JSON output. */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "issue-sieve", level }, pino.destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
