/**
 * Progress and warning output for authmap-export
 */

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}

export const silentReporter: Reporter = {
  info: () => {},
  warn: () => {},
};

/**
 * Prints to stdout in verbose mode and stays silent otherwise
 */
export function createConsoleReporter(verbose: boolean): Reporter {
  if (!verbose) {
    return silentReporter;
  }
  return {
    info: (message) => console.log(message),
    warn: (message) => console.log(`WARNING: ${message}`),
  };
}
