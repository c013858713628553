/**
 * Minimal leveled logger. Library code logs through this interface only,
 * the CLI picks the console implementation.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LOG_PREFIX = "[ld2410]";

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the log level from the environment.
 * LD2410_LOG_LEVEL wins over LD2410_DEBUG=1|true.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LD2410_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) return level;
  if (env.LD2410_DEBUG === "1" || env.LD2410_DEBUG === "true") return "debug";
  return "warn";
}

export function createConsoleLogger(level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];

  return {
    debug: (message) => {
      if (enabled("debug")) console.log(LOG_PREFIX, message);
    },
    info: (message) => {
      if (enabled("info")) console.log(LOG_PREFIX, message);
    },
    warn: (message) => {
      if (enabled("warn")) console.warn(LOG_PREFIX, message);
    },
    error: (message) => {
      if (enabled("error")) console.error(LOG_PREFIX, message);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
