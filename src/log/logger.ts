import pino from "pino";
import type { Logger } from "pino";

// Structured logs go to stderr; stdout is reserved for command output.
// LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

const envLevel = process.env.LOG_LEVEL;

const baseLogger: Logger = pino(
  {
    name: "voiceprint",
    level: isLogLevel(envLevel) ? envLevel : "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true }),
);

// pino children copy the parent level when created, so module loggers are
// tracked to let setLogLevel reach them.
const moduleLoggers: Logger[] = [];

export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
}

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    const child = baseLogger.child(bindings);
    moduleLoggers.push(child);
    return child;
  }
  return baseLogger;
}

export type { Logger };
