/**
 * Prefix-tagged console logger.
 *
 * Every component takes a Logger so embedders can route output elsewhere;
 * the default writes to the console, filtered by a process-wide level.
 *
 * @module shared/logger
 */

// ============================================================================
// Types
// ============================================================================

export const LogLevel = {
  DEBUG: 'DEBUG',
  INFO: 'INFO',
  WARN: 'WARN',
  ERROR: 'ERROR',
  SILENT: 'SILENT',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Level
// ============================================================================

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
};

let currentLevel: LogLevel = LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

// ============================================================================
// Console Logger
// ============================================================================

export function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled(LogLevel.DEBUG)) {
        console.debug(tag, message, ...args);
      }
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled(LogLevel.INFO)) {
        console.log(tag, message, ...args);
      }
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled(LogLevel.WARN)) {
        console.warn(tag, message, ...args);
      }
    },
    error(message: string, ...args: unknown[]): void {
      if (enabled(LogLevel.ERROR)) {
        console.error(tag, message, ...args);
      }
    },
  };
}

/** Logger that drops everything. Handy for tests and embedders with their own sink. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
