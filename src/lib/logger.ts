export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  constructor(private readonly prefix: string, private readonly level: LogLevel) {}

  private shouldLog(level: LogLevel): boolean {
    return this.level !== "silent" && LOG_LEVELS.indexOf(this.level) <= LOG_LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) console.log(`${this.prefix} ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) console.log(`${this.prefix} ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) console.warn(`${this.prefix} ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) console.error(`${this.prefix} ${message}`, ...args);
  }
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/**
 * Console logger with a `[Prefix]` tag. Without an explicit level it is silent
 * under NODE_ENV=test and otherwise follows LOG_LEVEL (default "info").
 */
export function createLogger(prefix: string, level?: LogLevel): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const resolved: LogLevel = level
    ?? (process.env.NODE_ENV === "test" ? "silent" : isLogLevel(envLevel) ? envLevel : "info");
  return new ConsoleLogger(`[${prefix}]`, resolved);
}
