/**
 * Scoped, leveled logger
 *
 * Entries go to a sink; the default sink writes to the console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: number;
}

export type LogSink = (entry: LogEntry) => void;

export const consoleSink: LogSink = (entry) => {
  const line = `[${entry.scope}] ${entry.message}`;
  const args = entry.details ? [line, entry.details] : [line];
  switch (entry.level) {
    case "debug":
      console.debug(...args);
      break;
    case "info":
      console.log(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    case "error":
      console.error(...args);
      break;
  }
};

export class Logger {
  constructor(
    readonly scope: string,
    private readonly level: LogLevel = "warn",
    private readonly sink: LogSink = consoleSink
  ) {}

  debug(message: string, details?: Record<string, unknown>): void {
    this.log("debug", message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.log("info", message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    this.log("warn", message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    this.log("error", message, details);
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level, this.sink);
  }

  enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(
    level: Exclude<LogLevel, "silent">,
    message: string,
    details?: Record<string, unknown>
  ): void {
    if (!this.enabled(level)) return;
    this.sink({
      level,
      scope: this.scope,
      message,
      ...(details ? { details } : {}),
      timestamp: Date.now(),
    });
  }
}
