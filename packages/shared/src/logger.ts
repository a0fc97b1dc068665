/**
 * Logger accepted by every entry point that reports progress.
 * Hosts pass their own (build driver, test harness); the default is silent.
 */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Prefix of every message ndk-graph itself logs. */
export const LOG_PREFIX = "[ndk-graph]";

export const nullLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(): Logger {
  return {
    log: (message) => console.log(message),
    info: (message) => console.info(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}
