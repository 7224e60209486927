import { ConfigurationError } from "../errors/DocumentErrors.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const parseLogLevel = (value: string | undefined, label = "log level"): LogLevel | undefined => {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (!normalized) return undefined;
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new ConfigurationError(`Invalid ${label}: expected one of ${LOG_LEVELS.join(", ")}`, { value });
  }
  return match;
};

export interface LoggerOptions {
  level?: LogLevel;
  tag?: string;
}

export class Logger {
  readonly level: LogLevel;
  readonly tag?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.tag = options.tag;
  }

  static silent(): Logger {
    return new Logger({ level: "silent" });
  }

  child(tag: string): Logger {
    return new Logger({ level: this.level, tag });
  }

  enabled(level: Exclude<LogLevel, "silent">): boolean {
    return rank(level) >= rank(this.level);
  }

  debug(message: string): void {
    // eslint-disable-next-line no-console
    if (this.enabled("debug")) console.debug(this.format(message));
  }

  info(message: string): void {
    // eslint-disable-next-line no-console
    if (this.enabled("info")) console.info(this.format(message));
  }

  warn(message: string): void {
    // eslint-disable-next-line no-console
    if (this.enabled("warn")) console.warn(this.format(message));
  }

  error(message: string): void {
    // eslint-disable-next-line no-console
    if (this.enabled("error")) console.error(this.format(message));
  }

  private format(message: string): string {
    return this.tag ? `[${this.tag}] ${message}` : message;
  }
}
