/**
 * Console logger honoring --verbose and --quiet
 */

export interface Logger {
  log(message: string): void;
  verbose(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Write without a trailing newline (progress counters) */
  progress(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Logger utility based on verbosity settings
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const isQuiet = options.quiet ?? false;
  const isVerbose = options.verbose ?? false;

  return {
    log: (message: string) => {
      if (!isQuiet) console.log(message);
    },
    verbose: (message: string) => {
      if (isVerbose && !isQuiet) console.log(message);
    },
    warn: (message: string) => {
      console.warn(message);
    },
    error: (message: string) => {
      console.error(message);
    },
    progress: (message: string) => {
      if (!isQuiet) process.stdout.write(message);
    },
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  log: noop,
  verbose: noop,
  warn: noop,
  error: noop,
  progress: noop,
};
