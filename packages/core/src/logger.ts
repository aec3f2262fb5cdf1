/**
 * Logging sink for non-fatal notices.
 *
 * Backends and the engine never throw for per-artifact failures; they log
 * here instead. `critical` is reserved for writes refused because they are
 * known to corrupt backend state.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, ...args: unknown[]): void;
  critical(message: string, ...args: unknown[]): void;
}

export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args);
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args);
    } else {
      console.error(`[ERROR] ${message}`, ...args);
    }
  },
  critical(message: string, ...args: unknown[]): void {
    console.error(`[CRITICAL] ${message}`, ...args);
  },
};

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
  critical(): void {},
};

let activeLogger: Logger = noopLogger;

/**
 * Logger used by components that were not given one explicitly.
 */
export function getLogger(): Logger {
  return activeLogger;
}

/**
 * Replace the process-wide default logger (the CLI installs `consoleLogger`).
 */
export function setLogger(logger: Logger): void {
  activeLogger = logger;
}
