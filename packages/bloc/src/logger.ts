/**
 * Logging for blocs.
 *
 * Blocs take a Logger at construction; createLogger() filters a sink by level.
 */

export type LogLevel = "debug" | "info" | "warning" | "error";

/** Level threshold accepted by createLogger; "silent" drops everything. */
export type LogThreshold = LogLevel | "silent";

/** Logger interface for bloc diagnostic output. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

/** Default logger that writes to console. */
export const consoleLogger: Logger = {
  debug: (m) => console.debug(m),
  info: (m) => console.info(m),
  warning: (m) => console.warn(m),
  error: (m) => console.error(m),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warning: () => {},
  error: () => {},
};

const LOG_LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  silent: 4,
};

/**
 * Wrap a sink so that only messages at or above `threshold` reach it.
 */
export function createLogger(
  threshold: LogThreshold,
  sink: Logger = consoleLogger,
): Logger {
  const enabled = (level: LogLevel): boolean =>
    LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[threshold];

  return {
    debug: (m) => {
      if (enabled("debug")) sink.debug(m);
    },
    info: (m) => {
      if (enabled("info")) sink.info(m);
    },
    warning: (m) => {
      if (enabled("warning")) sink.warning(m);
    },
    error: (m) => {
      if (enabled("error")) sink.error(m);
    },
  };
}
