import type { Logger } from "@polyglot-bridge/core";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/** The subset of `connection.console` the logger writes to. */
export interface ConsoleSink {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger over the LSP connection console. `log` is the debug channel and is
 * hidden unless the level is "debug".
 */
export class ConnectionLogger implements Logger {
  readonly #sink: ConsoleSink;
  readonly #prefix: string;
  #level: LogLevel;

  constructor(sink: ConsoleSink, name: string, level: LogLevel = "info") {
    this.#sink = sink;
    this.#prefix = `[${name}]`;
    this.#level = level;
  }

  get level(): LogLevel {
    return this.#level;
  }

  setLevel(level: LogLevel): void {
    this.#level = level;
  }

  log(message: string): void {
    if (this.#enabled("debug")) this.#sink.log(`${this.#prefix} ${message}`);
  }

  info(message: string): void {
    if (this.#enabled("info")) this.#sink.info(`${this.#prefix} ${message}`);
  }

  warn(message: string): void {
    if (this.#enabled("warn")) this.#sink.warn(`${this.#prefix} ${message}`);
  }

  error(message: string): void {
    this.#sink.error(`${this.#prefix} ${message}`);
  }

  #enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#level);
  }
}
