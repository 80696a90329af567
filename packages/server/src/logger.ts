/* eslint-disable no-console */
import type { Logger } from "./core.js";

export interface ConsoleLoggerOptions {
  /** Emit `debug` lines. Off unless the environment sets `DEBUG`. */
  readonly debug?: boolean;
}

export function createConsoleLogger(
  namespace: string,
  { debug = false }: ConsoleLoggerOptions = {},
): Logger {
  const prefix = `[${namespace}]`;
  const logger: Logger = {
    info(message: string, meta?: unknown): void {
      console.info(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      console.error(prefix, message, meta ?? "");
    },
  };

  if (!debug) {
    return logger;
  }
  return {
    ...logger,
    debug(message: string, meta?: unknown): void {
      console.debug(prefix, message, meta ?? "");
    },
  };
}
