import { pino, type Logger } from "pino";

export type { Logger };

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export function createLogger(level: LogLevel, name = "fulfillment-ledger"): Logger {
  return pino({
    name,
    level,
    base: { service: name },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ["*.apiKey", "*.secret", "*.token", "headers.authorization"],
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
