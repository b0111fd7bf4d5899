/**
 * Debug logging, gated by the `debug` configuration flag.
 */

import { config } from "./config.js";
import { defaultWriter, type LineWriter } from "./dispatch-trace.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
}

/**
 * Create a logger that writes `[hodata:<scope>] message` when `debug` is on.
 * The flag is read on every call so `config.set()` takes effect immediately.
 */
export function createLogger(scope: string, writer: LineWriter = defaultWriter): Logger {
  return {
    scope,
    debug(message) {
      if (config.flag("debug")) {
        writer(`[hodata:${scope}] ${message}`);
      }
    },
  };
}
