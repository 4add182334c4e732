/**
 * Program Massing - Logging Utility
 *
 * Level-gated logging for the dimensioning pipeline. Nothing here is
 * load-bearing: callers get problems from the returned issue list.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

let currentLevel: LogLevel = LogLevel.WARN;

/**
 * Logger with configurable levels.
 * Default level is WARN - only warnings and errors are shown.
 */
export const Logger = {
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  getLevel: (): LogLevel => currentLevel,

  /**
   * Debug-level logging for algorithm tracing
   * Use for: ratio attempts, histogram contents, optimizer commits
   */
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.DEBUG) {
      console.log(`[DEBUG] ${msg}`, ...args);
    }
  },

  /**
   * Info-level logging for major pipeline steps
   * Use for: run start/end, selected module, pass summaries
   */
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.INFO) {
      console.log(`[INFO] ${msg}`, ...args);
    }
  },

  /**
   * Use for: skipped rows, degraded fits, rooms outside area tolerance
   */
  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.WARN) {
      console.warn(`[WARN] ${msg}`, ...args);
    }
  },

  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.ERROR) {
      console.error(`[ERROR] ${msg}`, ...args);
    }
  }
};

export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
