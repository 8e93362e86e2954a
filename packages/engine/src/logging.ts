/**
 * Console logging gated by the verbose flag
 */

export type LogSink = (message: string) => void;

export type Logger = {
  readonly verbose: boolean;
  /** Verbose only */
  readonly debug: (message: string) => void;
  /** Verbose only */
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
};

export type LoggerOptions = {
  readonly verbose?: boolean;
  readonly sink?: LogSink;
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const verbose = options.verbose ?? false;
  const sink: LogSink = options.sink ?? ((message) => console.error(message));
  return {
    verbose,
    debug: (message) => {
      if (verbose) sink(`[generis] ${message}`);
    },
    info: (message) => {
      if (verbose) sink(message);
    },
    warn: (message) => sink(`Warning: ${message}`),
  };
};

export const silentLogger: Logger = createLogger({ sink: () => undefined });
