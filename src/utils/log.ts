import pino from "pino";
import type { Logger } from "../acp/types.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

export interface LoggerOptions {
  level?: LogLevel;
  /** Route through pino-pretty. Still written to stderr. */
  pretty?: boolean;
}

/**
 * stdout carries the ACP stream, so every log line goes to fd 2.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? "info";
  if (options.pretty) {
    return pino({
      level,
      name: "acp-bridge-agent",
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }
  return pino(
    {
      level,
      name: "acp-bridge-agent",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

/** Logger that drops everything. Used as the library default. */
export const silentLogger: Logger = pino({ level: "silent" });

/** Normalize an unknown thrown value for structured log fields. */
export function errorFields(err: unknown): { err: { message: string; stack?: string } } {
  if (err instanceof Error) {
    return { err: { message: err.message, stack: err.stack } };
  }
  return { err: { message: String(err) } };
}
