export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export type ConsoleLoggerOptions = {
  /** When `true`, `debug` messages are printed. Otherwise they are dropped. */
  debug?: boolean;
  /** @default "[pdf-taskkit]" */
  prefix?: string;
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { debug = false, prefix = "[pdf-taskkit]" } = options;

  return {
    debug: (...args) => {
      if (debug) console.debug(prefix, ...args);
    },
    info: (...args) => console.info(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
