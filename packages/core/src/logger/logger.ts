export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

type ConsoleMethod = "log" | "warn" | "error";

const CONSOLE_METHODS: Record<Exclude<LogLevel, "silent">, ConsoleMethod> = {
  debug: "log",
  info: "log",
  warn: "warn",
  error: "error",
};

/**
 * Prefixed console output, filtered by level. Debug and info go to stdout,
 * warnings and errors to stderr.
 */
class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel
  ) {}

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, args: unknown[]): void {
    if (this.level === "silent" || LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }
    console[CONSOLE_METHODS[level]](`${this.prefix}${message}`, ...args);
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Explicit level wins, then the test runner, then LOG_LEVEL
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  const logLevel: LogLevel = level ??
    (process.env['NODE_ENV'] === "test" ? "silent" : undefined) ??
    (isLogLevel(envLevel) ? envLevel : undefined) ??
    "info";

  return new ConsoleLogger(prefix, logLevel);
}
