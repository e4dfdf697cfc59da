import pino from "pino";
import type { Logger, Level } from "pino";

const LEVELS: readonly string[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function resolveLevel(value: string | undefined): Level | "silent" {
  const level = (value ?? "info").toLowerCase();
  return isLevel(level) ? level : "info";
}

function isLevel(value: string): value is Level | "silent" {
  return LEVELS.includes(value);
}

/**
 * Create logger instance. `ORGSITE_LOG` picks the level.
 */
function createLogger(): Logger {
  return pino({
    level: resolveLevel(process.env.ORGSITE_LOG),
    base: { service: "orgsite" },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
