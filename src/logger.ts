// Logger: level-filtered console output for schedule diagnostics.

export const LOG_LEVELS = ["minimal", "standard", "verbose"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger accepted by schedules. Schedules report parse summaries and
 * over-reservation at debug, and patterns that failed to evaluate at warn.
 */
export interface ReservationLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Prefix for log messages */
  prefix: string;
  logLevel?: LogLevel;
}

function format(data?: Record<string, unknown>): string {
  return data ? JSON.stringify(data) : "";
}

/**
 * Create a console logger. Debug output needs "verbose"; warnings are
 * dropped only at "minimal".
 */
export function createLogger(options: LoggerOptions): ReservationLogger {
  const { prefix, logLevel = "standard" } = options;

  return {
    debug: (msg, data) => {
      if (logLevel === "verbose") console.debug(`${prefix} ${msg}`, format(data));
    },
    warn: (msg, data) => {
      if (logLevel !== "minimal") console.warn(`${prefix} ${msg}`, format(data));
    },
  };
}

export function createDefaultLogger(logLevel?: LogLevel): ReservationLogger {
  return createLogger({ prefix: "[reservations]", logLevel });
}
