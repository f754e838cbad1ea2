/**
 * Leveled console logger scoped to a component.
 *
 * ```ts
 * const logger = createLogger("scheduler", config.logLevel);
 * logger.info("interview scheduled", { interviewId });
 * logger.child("events").warn("publish failed", { topic });
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const write = (at: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
    if (LEVEL_RANK[at] < LEVEL_RANK[level]) return;
    const line = `${new Date().toISOString()} ${at.toUpperCase()} [${scope}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      console[at](line, context);
    } else {
      console[at](line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (child) => createLogger(`${scope}:${child}`, level)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
