/**
 * Logger setup. Logs go to stderr so stdout carries only command output and
 * JSON-RPC responses.
 */

import pino, { type Logger } from "pino";
import type { LogLevel } from "@testbridge/shared";

export interface LoggerOptions {
  level: LogLevel;
  pretty?: boolean;
}

export function createLogger({ level, pretty = true }: LoggerOptions): Logger {
  if (!pretty) {
    return pino({ level }, pino.destination(2));
  }
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    },
  });
}
