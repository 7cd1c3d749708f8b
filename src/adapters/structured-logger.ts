import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

/** Map a level name ("debug", "WARN", ...) to a LogLevel; undefined if unknown. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
    case "warning":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** Writes one JSON object per line; stderr by default. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? parseLogLevel(process.env.LOCALRUN_LOG_LEVEL) ?? LogLevel.INFO;
    this.component = options.component;
  }

  /** A logger sharing this one's writer and level, tagged with `component`. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.writer, level: this.level, component });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {};

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
      }
    }

    // Reserved fields win over ctx
    entry.time = new Date().toISOString();
    entry.level = LEVEL_NAMES[level];
    entry.msg = msg;
    if (this.component) entry.component = this.component;

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or serialization failure: emit safe fallback
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}
