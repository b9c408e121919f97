/**
 * Logger Interface for Library Code
 *
 * Library code (tools, generation loop, course store) accepts a Logger by
 * injection. The CLI passes its CommandContext, which satisfies this
 * interface; tests pass silentLogger or a vi.fn() pair.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default logger when nothing is injected.
 * Debug output goes nowhere unless COURSE_RAG_DEBUG is set.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => {
    if (process.env.COURSE_RAG_DEBUG) {
      console.error(`[debug] ${message}`);
    }
  },
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
