/**
 * Logging
 *
 * Structured pino logging to stderr. Quiet unless ARBOR_LOG_LEVEL or
 * LOG_LEVEL asks for output, so a CLI's stdout stays clean.
 */

import { destination, pino, type Logger } from "pino";
import { z } from "zod";

export type { Logger };

export const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env.ARBOR_LOG_LEVEL ?? env.LOG_LEVEL;
  if (raw === undefined) return undefined;
  const parsed = LogLevel.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? levelFromEnv() ?? "silent",
      name: options.name ?? "arbor",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination(2)
  );
}
