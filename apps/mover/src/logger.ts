import { pino, type Logger } from "pino";

export type AppLogger = Logger;

export function createLogger(level = "info"): AppLogger {
  return pino({
    name: "alist-mover",
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["token", "password", "*.token", "*.password", "headers.authorization"],
      censor: "[REDACTED]",
    },
  });
}

export function createSilentLogger(): AppLogger {
  return pino({ level: "silent" });
}
