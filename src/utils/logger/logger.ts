export interface Logger {
  verbose: boolean;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(verbose: boolean): Logger {
  return {
    verbose,
    info: (...args) => console.log(...args),
    debug: (...args) => {
      if (verbose) console.log(...args);
    },
    error: (...args) => console.error(...args),
  };
}

export const silentLogger: Logger = {
  verbose: false,
  info: () => {},
  debug: () => {},
  error: () => {},
};
