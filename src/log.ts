/**
 * Scoped console logging: `HH:MM:SS.mmm [scope] message`.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export interface LoggerOptions {
  /** Emit debug lines. Info and above are always emitted. */
  debug?: boolean;
  /** Override the console for tests or redirection. */
  sink?: Pick<Console, "log" | "warn" | "error">;
}

export function ts(now = new Date()): string {
  return now.toISOString().slice(11, 23);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const prefix = () => `${ts()} [${scope}]`;

  return {
    debug(message) {
      if (options.debug) sink.log(`${prefix()} ${message}`);
    },
    info(message) {
      sink.log(`${prefix()} ${message}`);
    },
    warn(message) {
      sink.warn(`${prefix()} ${message}`);
    },
    error(message, err) {
      if (err === undefined) {
        sink.error(`${prefix()} ${message}`);
      } else {
        sink.error(`${prefix()} ${message}`, err);
      }
    },
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
