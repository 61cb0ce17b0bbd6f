/**
 * Diagnostic logging.
 *
 * Components take a Logger so tests can capture diagnostics; the default
 * writes bracket-prefixed lines to stderr, leaving stdout to command output.
 */

import type { LogLevel } from "../schemas/config.js";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logger for a sub-scope, e.g. `termctx:arxiv`. */
  child(scope: string): Logger;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = (line: string) => void;

export interface ConsoleLoggerOptions {
  scope?: string;
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly scope: string;
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.scope = options.scope ?? "termctx";
    this.level = options.level ?? "info";
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", (line) => console.warn(line), message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", (line) => console.warn(line), message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", (line) => console.warn(line), message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", (line) => console.error(line), message, data);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({ scope: `${this.scope}:${scope}`, level: this.level });
  }

  private write(level: LogLevel, sink: Sink, message: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < LEVELS[this.level]) return;
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
    sink(`[${this.scope}] ${level.toUpperCase()} ${message}${suffix}`);
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function createLogger(level: LogLevel = "info"): Logger {
  return new ConsoleLogger({ level });
}
