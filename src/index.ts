/**
 * localrun public API barrel.
 *
 * Re-exports the connection, runners, adapters, protocol helpers and error
 * types that make up the public surface area of the `localrun` package.
 * @module
 */

// Adapters
export type { NodePipeConnectorOptions } from "./adapters/node-pipe-connector.js";
export { NodePipeConnector, SocketLineChannel } from "./adapters/node-pipe-connector.js";
export type { NodeProcessInvokerOptions } from "./adapters/node-process-invoker.js";
export { NodeProcessInvoker } from "./adapters/node-process-invoker.js";
export { NodeProcessManager } from "./adapters/node-process-manager.js";
export { PlatformOsIdentity } from "./adapters/platform-os-identity.js";
export { ProbingOsIdentity } from "./adapters/probing-os-identity.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { localTransportConfigSchema, MAX_TIMER_DELAY_MS } from "./config/config-schema.js";
// Core
export type { ExecutionPlan } from "./core/command-line.js";
export { planExecution } from "./core/command-line.js";
export type { ScriptEncoding } from "./core/encoded-script.js";
export {
  decodeScript,
  encodePowerShellCommand,
  encodeScript,
  QUIET_PREAMBLE,
} from "./core/encoded-script.js";
export type { LocalConnectionOptions } from "./core/local-connection.js";
export { LocalConnection } from "./core/local-connection.js";
export { buildPipeServerScript } from "./core/pipe-server-script.js";
export type { AcquirePipeSessionOptions, SessionAcquisition } from "./core/pipe-session.js";
export { acquirePipeSession, openPipeSessionCount, PipeSession } from "./core/pipe-session.js";
export type { RunnerSelectorOptions } from "./core/runner-selector.js";
export { selectRunner } from "./core/runner-selector.js";
export { ScriptedRunner } from "./core/scripted-runner.js";
export type { SessionResponse } from "./core/session-protocol.js";
export {
  decodeResponse,
  encodeRequest,
  encodeResponse,
  sessionResponseSchema,
} from "./core/session-protocol.js";
export type { SessionRunnerOptions } from "./core/session-runner.js";
export { SessionRunner } from "./core/session-runner.js";
export { PassThroughRunner, ShellRunner } from "./core/shell-runner.js";
// Errors
export {
  CommandTimeoutError,
  ConfigError,
  ConnectionClosedError,
  EncodingError,
  errorMessage,
  LocalRunError,
  ProtocolError,
  SessionAcquisitionError,
  SessionTimeoutError,
  SpawnError,
  toLocalRunError,
} from "./errors.js";
// Interfaces
export type { CommandResult, CommandRunner, RunnerKind } from "./interfaces/command-runner.js";
export type { CommandWrapper } from "./interfaces/command-wrapper.js";
export type { Logger } from "./interfaces/logger.js";
export type { CommandProbe, OsIdentityProvider } from "./interfaces/os-identity.js";
export type { LineChannel, PipeConnector } from "./interfaces/pipe-connector.js";
export type { ProcessInvoker } from "./interfaces/process-invoker.js";
export type { ProcessHandle, ProcessManager, SpawnOptions } from "./interfaces/process-manager.js";
// Types
export type { LocalTransportConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
// Utils
export { LineBuffer } from "./utils/line-buffer.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
