/**
 * Structured console logging.
 *
 * Every line carries a timestamp, a level and an optional JSON context. The
 * minimum level comes from `PASS_AUDIT_LOG_LEVEL` (`silent` turns output off).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: { name: string; message: string; stack?: string };
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function levelFromEnv(): LogLevel | "silent" {
  const raw = process.env.PASS_AUDIT_LOG_LEVEL?.trim().toLowerCase();
  if (raw === "silent") {
    return "silent";
  }
  return raw && isLogLevel(raw) ? raw : "info";
}

export class Logger {
  private minLevel: LogLevel | "silent";

  constructor(minLevel: LogLevel | "silent" = levelFromEnv()) {
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel | "silent"): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.minLevel === "silent") {
      return false;
    }
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private write(entry: LogEntry): void {
    const contextStr =
      entry.context && Object.keys(entry.context).length > 0
        ? ` ${JSON.stringify(entry.context)}`
        : "";
    const line = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}${contextStr}`;

    switch (entry.level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        if (entry.error) {
          console.error(entry.error.stack ?? entry.error.message);
        }
        break;
    }
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };
    if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined) {
      entry.context = { ...context, errorValue: String(error) };
    }
    this.write(entry);
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log("error", message, context, error);
  }

  /** Logger that prefixes every entry's context with `baseContext`. */
  child(baseContext: LogContext): ChildLogger {
    return new ChildLogger(this, baseContext);
  }
}

export class ChildLogger {
  constructor(
    private readonly parent: Logger,
    private readonly baseContext: LogContext,
  ) {}

  private merge(context?: LogContext): LogContext {
    return { ...this.baseContext, ...context };
  }

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, this.merge(context));
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, this.merge(context));
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, this.merge(context));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.parent.error(message, error, this.merge(context));
  }
}

export const logger = new Logger();
