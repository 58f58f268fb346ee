/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "MonitorFixtures";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private format(label: string, message: string, meta?: unknown): string {
    if (meta === undefined) {
      return `[${this.prefix}] ${label}: ${message}\n`;
    }
    const rendered =
      meta instanceof Error ? `${meta.name}: ${meta.message}` : JSON.stringify(meta);
    return `[${this.prefix}] ${label}: ${message} ${rendered}\n`;
  }

  // Everything goes to stderr: stdout may carry a serialized document
  error(message: string, meta?: unknown): void {
    if (this.shouldLog("error")) {
      process.stderr.write(this.format("ERROR", message, meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog("warn")) {
      process.stderr.write(this.format("WARN", message, meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog("info")) {
      process.stderr.write(this.format("INFO", message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog("debug")) {
      process.stderr.write(this.format("DEBUG", message, meta));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

const envLevel = process.env.LOG_LEVEL;

// Default logger instance
export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : "info" });

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
