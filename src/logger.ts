export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

// Everything goes to stderr: the MCP server owns stdout for protocol frames.
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;

  return {
    debug: (message) => {
      if (options.debug) {
        // eslint-disable-next-line no-console
        console.error(`${prefix} debug: ${message}`);
      }
    },
    info: (message) => {
      // eslint-disable-next-line no-console
      console.error(`${prefix} ${message}`);
    },
    warn: (message) => {
      // eslint-disable-next-line no-console
      console.warn(`${prefix} warning: ${message}`);
    },
    error: (message, error) => {
      const detail = error === undefined ? "" : `: ${describeError(error)}`;
      // eslint-disable-next-line no-console
      console.error(`${prefix} ${message}${detail}`);
    },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
