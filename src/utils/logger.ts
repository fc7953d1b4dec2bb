/**
 * Logger Utility
 * Provides debug and standard logging with global debug and silent flag control
 */

let debugMode = false;
let silentMode = false;

/**
 * Set the global debug mode
 */
export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

/**
 * Suppress everything except errors (machine-readable output, tests)
 */
export function setSilentMode(enabled: boolean): void {
  silentMode = enabled;
}

/**
 * Log a debug message (only shown when debug mode is enabled)
 */
export function debug(...args: unknown[]): void {
  if (debugMode && !silentMode) {
    console.log(...args);
  }
}

/**
 * Log an info message
 */
export function info(...args: unknown[]): void {
  if (!silentMode) {
    console.log(...args);
  }
}

/**
 * Log a warning message
 */
export function warn(...args: unknown[]): void {
  if (!silentMode) {
    console.warn(...args);
  }
}

/**
 * Log an error message (always shown)
 */
export function error(...args: unknown[]): void {
  console.error(...args);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger with a prefix
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args: unknown[]) => debug(`[${prefix}]`, ...args),
    info: (...args: unknown[]) => info(`[${prefix}]`, ...args),
    warn: (...args: unknown[]) => warn(`[${prefix}]`, ...args),
    error: (...args: unknown[]) => error(`[${prefix}]`, ...args),
  };
}
