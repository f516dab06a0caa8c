/**
 * Progress output for long-running operations
 *
 * @license Apache-2.0
 */

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Prefix every line with a tag, e.g. `[provision]`.
 */
export function taggedReporter(tag: string, base: Reporter = consoleReporter): Reporter {
  return {
    info: (message) => base.info(`[${tag}] ${message}`),
    warn: (message) => base.warn(`[${tag}] ${message}`),
    error: (message) => base.error(`[${tag}] ${message}`),
  };
}
