/**
 * Public test utilities, exported from the `"localrun/testing"` entry point.
 * Consumers can import these stand-ins to test code built on localrun without
 * spawning real processes or a PowerShell pipe server.
 */
export type { MockProcessHandle } from "./testing/mock-process-manager.js";
export { MockProcessManager } from "./testing/mock-process-manager.js";
export { MockProcessInvoker } from "./testing/mock-process-invoker.js";
export type { StubHandler, StubReply } from "./testing/stub-pipe-server.js";
export { StubPipeServer } from "./testing/stub-pipe-server.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
