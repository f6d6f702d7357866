import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  /** Minimum level (default: "info") */
  level?: LogLevel;
  /** Logger name, printed on every line */
  name?: string;
}

/**
 * Create the process-wide root logger. Call once at startup and pass the
 * result down; components derive children with `logger.child({ component })`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name,
    level: options.level ?? "info",
  });
}
