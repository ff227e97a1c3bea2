/**
 * Minimal tagged logger.
 *
 * Output goes through `console` with a `[tag]` prefix; callers that want
 * their own sink pass any object implementing `Logger`.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Create a console logger that drops messages below `level`.
 */
export function createConsoleLogger(tag: string, level: LogLevel = "warn"): Logger {
  const threshold = SEVERITY[level];
  const enabled = (candidate: LogLevel): boolean => SEVERITY[candidate] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.debug(`[${tag}] ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.info(`[${tag}] ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(`[${tag}] ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled("error")) console.error(`[${tag}] ${message}`, ...args);
    },
  };
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
