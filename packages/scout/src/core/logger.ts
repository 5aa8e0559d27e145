/**
 * Logger implementations
 *
 * Console output follows the emoji-prefixed style used by the service
 * entry points. Library code only ever sees the {@link Logger} interface.
 */

import type { Logger, LogLevel } from "./types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const PREFIX: Record<LogLevel, string> = {
  debug: "🔍",
  info: "ℹ️ ",
  warn: "⚠️ ",
  error: "❌",
};

/**
 * Create a console-backed logger that drops messages below `level`.
 *
 * @example
 * const logger = createConsoleLogger({ level: debug ? "debug" : "info" });
 * logger.info("Found 3 feeds", { domains: 12 });
 */
export function createConsoleLogger(options?: {
  level?: LogLevel;
  /** Optional tag printed after the emoji, e.g. "[scanner]" */
  scope?: string;
}): Logger {
  const threshold = LEVEL_ORDER[options?.level ?? "info"];
  const scope = options?.scope ? ` [${options.scope}]` : "";

  const write =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      const line = `${PREFIX[level]}${scope} ${message}`;
      const sink =
        level === "error"
          ? console.error
          : level === "warn"
            ? console.warn
            : level === "debug"
              ? console.debug
              : console.log;
      if (data && Object.keys(data).length > 0) {
        sink(line, data);
      } else {
        sink(line);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/**
 * Logger that discards everything. Default for library calls.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
