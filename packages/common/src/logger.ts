/**
 * Logging
 *
 * Library code never writes to the console directly; it logs through a
 * Logger handed in with its context. The default logger prints tagged lines
 * (`[PORTS] ...`), the CLI swaps in a coloured one.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sink, different tag */
  child(tag: string): Logger;
}

export function createConsoleLogger(tag = 'DEVTREE', debug = Boolean(process.env.DEVTREE_DEBUG)): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message) => {
      if (debug) console.log(`${prefix} ${message}`);
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} Warning: ${message}`),
    error: (message) => console.error(`${prefix} Error: ${message}`),
    child: (childTag) => createConsoleLogger(childTag, debug),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
