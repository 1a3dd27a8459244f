/**
 * Levelled console logger
 *
 * Output follows the "[Prefix] message" convention used for vendor logs.
 * The client only talks to the `Logger` interface, so callers can plug in
 * their own sink or silence it without changing any result.
 */

import { LOGGING_CONFIG, LOG_LEVELS, type LogLevel } from "../config";

export interface Logger {
  trace(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

type EmittingLevel = Exclude<LogLevel, "silent">;

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = rank(options.level ?? LOGGING_CONFIG.level);
  const prefix = options.prefix ?? LOGGING_CONFIG.prefix;

  const emit =
    (level: EmittingLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (rank(level) < threshold) return;

      const line = `${prefix} ${message}`;
      switch (level) {
        case "error":
          console.error(line, ...details);
          break;
        case "warn":
          console.warn(line, ...details);
          break;
        default:
          console.log(line, ...details);
      }
    };

  return {
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/**
 * Replace the value of the api_key query parameter so URLs can be logged
 */
export function redactApiKey(url: string): string {
  return url.replace(/([?&]api_key=)[^&]*/, "$1***");
}
