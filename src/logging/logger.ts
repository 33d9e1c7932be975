import * as winston from "winston";

import type { LogLevel } from "../types/config";

export interface LoggerOptions {
  level?: LogLevel;
  /** Drop every entry (tests). */
  silent?: boolean;
}

/**
 * JSON-lines console logger. Components pass a `component` field in each
 * entry's metadata rather than using child loggers.
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: "voice-latency-metrics" },
    transports: [new winston.transports.Console()],
  });
}

export type { Logger } from "winston";
