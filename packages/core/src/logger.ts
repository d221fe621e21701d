/**
 * Structured Logging
 *
 * Emits JSON lines when CIPHERLICENSE_LOG_JSON=1 is set, plain console output
 * otherwise. Debug lines are dropped unless CIPHERLICENSE_DEBUG=1.
 * Secrets are redacted from data before logging.
 */

import { redactRecord } from "./security/redact";

export type LogLevel = "info" | "warn" | "error" | "debug";

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  // Read env at call time so tests can toggle modes
  if (level === "debug" && process.env.CIPHERLICENSE_DEBUG !== "1") return;
  const jsonMode = process.env.CIPHERLICENSE_LOG_JSON === "1";

  const sanitizedData = data ? redactRecord(data) : undefined;

  if (jsonMode) {
    const logLine = {
      ts_ms: Date.now(),
      level,
      message,
      ...(sanitizedData && { data: sanitizedData }),
    };
    console.log(JSON.stringify(logLine));
    return;
  }

  const prefix = `[${level.toUpperCase()}]`;
  const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  if (sanitizedData) {
    sink(prefix, message, sanitizedData);
  } else {
    sink(prefix, message);
  }
}

/** Logger that discards everything. Handy for quiet tests. */
export const silentLogger: Logger = () => {};
