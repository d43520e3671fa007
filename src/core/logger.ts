export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string, data?: unknown) => void;

// stderr keeps stdout free for the report when it is piped
const stderrSink: LogSink = (line, data) => {
  if (data !== undefined) {
    console.error(line, data);
  } else {
    console.error(line);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private level: LogLevel;
  private scope: string | undefined;
  private sink: LogSink;

  constructor(level: LogLevel = "info", scope?: string, sink: LogSink = stderrSink) {
    this.level = level;
    this.scope = scope;
    this.sink = sink;
  }

  /** Derive a logger that prefixes every line with `scope`. */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.level, nested, this.sink);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const timestamp = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    this.sink(`[${timestamp}] [${level.toUpperCase()}]${scope} ${message}`, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }
}
