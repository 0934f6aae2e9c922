export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

let globalLevel: LogLevel = "info";
let globalSink: LogSink = (line) => {
  process.stderr.write(line);
};

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/**
 * Redirect log output (tests capture lines through this).
 * Returns the previous sink.
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = globalSink;
  globalSink = sink;
  return previous;
}

function safeContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) return "";
  try {
    return ` ${JSON.stringify(context)}`;
  } catch {
    return ` {"error":"non_serializable_context"}`;
  }
}

export function formatLogLine(scope: string, level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): string {
  return `[digestflow:${scope}] ${level.toUpperCase()} ${message}${safeContext(context)}\n`;
}

class ScopedLogger implements Logger {
  constructor(private readonly scope: string) {}

  private write(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[globalLevel]) return;
    globalSink(formatLogLine(this.scope, level, message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`);
  }
}

export function createLogger(scope: string): Logger {
  return new ScopedLogger(scope);
}
