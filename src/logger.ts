// logger.ts
// Leveled console logger shared by the loader and the resolver.

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  silent?: boolean;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.RESOLVER_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.DEBUG ? "debug" : "info";
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly silent: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? defaultLevel();
    this.context = options.context ?? "";
    this.silent = options.silent ?? false;
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : "";
    const base = `[${level}]${ctx} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) console.debug(this.format("debug", message, data));
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("info")) console.info(this.format("info", message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) console.warn(this.format("warn", message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("error")) console.error(this.format("error", message, data));
  }

  /**
   * Logger for a sub-component; inherits level and silence.
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      silent: this.silent,
      context: this.context ? `${this.context}:${context}` : context,
    });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** Logger that drops everything; handy for tests and embedding. */
export const silentLogger = new Logger({ silent: true });
