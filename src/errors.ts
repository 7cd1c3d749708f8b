export class LocalRunError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LocalRunError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConfigError extends LocalRunError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class SpawnError extends LocalRunError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SPAWN", options);
    this.name = "SpawnError";
  }
}

/** The persistent pipe session could not be established. Recovered by runner selection. */
export class SessionAcquisitionError extends LocalRunError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SESSION_ACQUISITION", options);
    this.name = "SessionAcquisitionError";
  }
}

export class EncodingError extends LocalRunError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ENCODING", options);
    this.name = "EncodingError";
  }
}

/** A pipe response could not be decoded, or the session is no longer usable. */
export class ProtocolError extends LocalRunError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROTOCOL", options);
    this.name = "ProtocolError";
  }
}

export class SessionTimeoutError extends LocalRunError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`No session response within ${timeoutMs}ms`, "SESSION_TIMEOUT", options);
    this.name = "SessionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CommandTimeoutError extends LocalRunError {
  readonly timeoutMs: number;
  readonly commandLine: string;

  constructor(commandLine: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Command timed out after ${timeoutMs}ms: ${commandLine}`, "COMMAND_TIMEOUT", options);
    this.name = "CommandTimeoutError";
    this.timeoutMs = timeoutMs;
    this.commandLine = commandLine;
  }
}

export class ConnectionClosedError extends LocalRunError {
  constructor(message = "Connection is closed", options?: ErrorOptions) {
    super(message, "CONNECTION_CLOSED", options);
    this.name = "ConnectionClosedError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to LocalRunError (preserves cause chain). */
export function toLocalRunError(value: unknown): LocalRunError {
  if (value instanceof LocalRunError) return value;
  if (value instanceof Error) return new LocalRunError(value.message, "UNKNOWN", { cause: value });
  return new LocalRunError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
