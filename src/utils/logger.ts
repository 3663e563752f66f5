export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

let stdoutReserved = false;

/** Sends every level to stderr, for processes whose stdout carries a protocol. */
export function reserveStdout(): void {
  stdoutReserved = true;
}

function out(...args: unknown[]): void {
  if (stdoutReserved) {
    console.error(...args);
  } else {
    console.log(...args);
  }
}

function prefix(scope: string): string {
  return `[${new Date().toISOString()}] [${scope}]`;
}

export function createLogger(scope: string): Logger {
  return {
    info(message, ...args) {
      out(prefix(scope), message, ...args);
    },
    warn(message, ...args) {
      console.warn(`${prefix(scope)} WARN:`, message, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix(scope)} ERROR:`, message, ...args);
    },
    debug(message, ...args) {
      if (process.env.DEBUG) {
        out(`${prefix(scope)} DEBUG:`, message, ...args);
      }
    },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
