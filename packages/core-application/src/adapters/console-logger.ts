import type { LogLevel, Logger } from "../ports/logger.js";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** `LEVEL: message` on the console; debug lines only when verbose. */
export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = "info") {}

  static forVerbosity(verbose: boolean): ConsoleLogger {
    return new ConsoleLogger(verbose ? "debug" : "info");
  }

  debug(message: string): void {
    if (this.enabled("debug")) console.debug(`DEBUG: ${message}`);
  }

  info(message: string): void {
    if (this.enabled("info")) console.info(`INFO: ${message}`);
  }

  warn(message: string): void {
    if (this.enabled("warn")) console.warn(`WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`ERROR: ${message}`);
  }

  private enabled(level: LogLevel): boolean {
    return ORDER[level] >= ORDER[this.minLevel];
  }
}
