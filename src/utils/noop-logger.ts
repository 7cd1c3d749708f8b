import type { Logger } from "../interfaces/logger.js";

/** Discards every entry. Default logger for connections, sessions and runners. */
export class NoopLogger implements Logger {
  debug(_msg: string, _ctx?: Record<string, unknown>): void {}
  info(_msg: string, _ctx?: Record<string, unknown>): void {}
  warn(_msg: string, _ctx?: Record<string, unknown>): void {}
  error(_msg: string, _ctx?: Record<string, unknown>): void {}

  /** Mirrors StructuredLogger.child; component tags have nowhere to go. */
  child(_component: string): NoopLogger {
    return this;
  }
}

export const noopLogger = new NoopLogger();
