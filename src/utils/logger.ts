/**
 * Logger Interface for Library Code
 *
 * Core components accept a Logger through their constructor. The CLI
 * passes its CommandContext (which satisfies Logger), tests pass
 * silentLogger or a vi.fn() recorder.
 */

/**
 * Generic logger interface for library code
 *
 * Compatible with CommandContext so the CLI can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a progress message (optional) */
  info?: (message: string) => void;
  /** Log a debug message (optional) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.log(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Prefix every message of a logger, e.g. with an agent name.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return {
    warn: (message) => logger.warn(`[${scope}] ${message}`),
    info: (message) => logger.info?.(`[${scope}] ${message}`),
    debug: (message) => logger.debug?.(`[${scope}] ${message}`),
  };
}
