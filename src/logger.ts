// Stream Courier - Logging
// Components take a Logger by injection; the default writes tagged console lines.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with its level and component:
 *   [INFO] [SessionManager] Session abc created
 */
export function createLogger(component: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}
