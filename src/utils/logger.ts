/**
 * logger.ts - Leveled logging to stderr
 *
 * Everything goes to stderr: the tool server speaks MCP over stdout, and the
 * CLI keeps stdout for the tool output and the answer.
 *
 * The threshold comes from LOG_LEVEL (debug, info, warn, error; default info)
 * and is read on every call, so tests and the CLI can change it at runtime.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

function currentLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : "info";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLogLevel()];
}

export function formatLogLine(level: LogLevel, message: string, now = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}`;
}

export const logger = {
  debug(message: string): void {
    if (shouldLog("debug")) {
      console.error(formatLogLine("debug", message));
    }
  },

  info(message: string): void {
    if (shouldLog("info")) {
      console.error(formatLogLine("info", message));
    }
  },

  warn(message: string): void {
    if (shouldLog("warn")) {
      console.error(formatLogLine("warn", message));
    }
  },

  /**
   * Log an error, appending the cause's message when one is given.
   */
  error(message: string, err?: unknown): void {
    if (shouldLog("error")) {
      if (err !== undefined) {
        const detail = err instanceof Error ? err.message : String(err);
        console.error(formatLogLine("error", `${message}: ${detail}`));
      } else {
        console.error(formatLogLine("error", message));
      }
    }
  },
};
