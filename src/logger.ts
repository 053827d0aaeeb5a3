export interface LoggerBackend {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

const PREFIX = "[rulemine]";

const silentBackend: LoggerBackend = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

let backend: LoggerBackend = silentBackend;
let debugEnabled = false;

/**
 * Install the sink for all log output. Called once by the CLI and again by
 * tests that want to capture warnings.
 */
export function initLogger(next: LoggerBackend, debug: boolean): void {
  backend = next;
  debugEnabled = debug;
}

/** Console sink: info/debug go to stdout, warn/error to stderr. */
export function createConsoleBackend(): LoggerBackend {
  return {
    debug: (msg, ...args) => console.debug(msg, ...args),
    info: (msg, ...args) => console.log(msg, ...args),
    warn: (msg, ...args) => console.warn(msg, ...args),
    error: (msg, ...args) => console.error(msg, ...args),
  };
}

export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (!debugEnabled) return;
    backend.debug(`${PREFIX} ${msg}`, ...args);
  },
  info(msg: string, ...args: unknown[]): void {
    backend.info(`${PREFIX} ${msg}`, ...args);
  },
  warn(msg: string, ...args: unknown[]): void {
    backend.warn(`${PREFIX} ${msg}`, ...args);
  },
  error(msg: string, ...args: unknown[]): void {
    backend.error(`${PREFIX} ${msg}`, ...args);
  },
};
