/**
 * Logger Interface for Library Code
 *
 * Processors, the metadata extractor and the search and tagging services
 * accept a Logger through their constructors. The CLI passes its
 * CommandContext (which satisfies Logger); tests pass silent or mock loggers.
 */

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
  /** Log a progress/success message (optional) */
  info?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
  info: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
  info: () => {},
};

/**
 * Render an unknown thrown value as a log-friendly message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
