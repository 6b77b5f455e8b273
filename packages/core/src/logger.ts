import { config } from "./config.js";

export interface Logger {
  /** Printed only when `config.debug` is on */
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/**
 * Console logger tagged `[seqkit:<scope>]`.
 *
 * @example
 * ```typescript
 * const log = createLogger("cycle");
 * log.warn("source is a one-shot iterator; only one pass will be produced");
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[seqkit:${scope}]`;
  return {
    debug(message, ...details) {
      if (!config.isDebug()) return;
      console.debug(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
  };
}
