/**
 * Console logging for the macro pipeline.
 *
 * Debug lines are printed only when `debug` is set in the configuration
 * (or `PICKLER_DEBUG=1`) or when the caller forces verbose output; warnings
 * are always printed.
 */

import { config } from "./config.js";

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  /** Whether debug lines are printed */
  readonly enabled: boolean;
}

export interface LoggerOptions {
  /** Print debug lines regardless of configuration */
  verbose?: boolean;
  /** Sink for every line (default: console.log / console.warn) */
  sink?: (level: "debug" | "warn", line: string) => void;
}

function defaultSink(level: "debug" | "warn", line: string): void {
  if (level === "warn") console.warn(line);
  else console.log(line);
}

/**
 * Create a logger whose lines are prefixed with `[pickler:<scope>]`.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[pickler:${scope}]`;
  const sink = options.sink ?? defaultSink;
  const enabled = options.verbose ?? config.resolved().debug;

  return {
    enabled,
    debug(message) {
      if (enabled) sink("debug", `${prefix} ${message}`);
    },
    warn(message) {
      sink("warn", `${prefix} ${message}`);
    },
  };
}
