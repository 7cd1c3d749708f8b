import { NodePipeConnector } from "../adapters/node-pipe-connector.js";
import { NodeProcessInvoker } from "../adapters/node-process-invoker.js";
import { NodeProcessManager } from "../adapters/node-process-manager.js";
import { PlatformOsIdentity } from "../adapters/platform-os-identity.js";
import { ConnectionClosedError } from "../errors.js";
import type { CommandResult, CommandRunner, RunnerKind } from "../interfaces/command-runner.js";
import type { CommandWrapper } from "../interfaces/command-wrapper.js";
import type { Logger } from "../interfaces/logger.js";
import type { OsIdentityProvider } from "../interfaces/os-identity.js";
import type { PipeConnector } from "../interfaces/pipe-connector.js";
import type { ProcessInvoker } from "../interfaces/process-invoker.js";
import type { ProcessManager } from "../interfaces/process-manager.js";
import { type LocalTransportConfig, resolveConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { type RunnerSelectorOptions, selectRunner } from "./runner-selector.js";
import { PassThroughRunner } from "./shell-runner.js";

export interface LocalConnectionOptions {
  config?: LocalTransportConfig;
  osIdentity?: OsIdentityProvider;
  commandWrapper?: CommandWrapper;
  processInvoker?: ProcessInvoker;
  processManager?: ProcessManager;
  pipeConnector?: PipeConnector;
  logger?: Logger;
  acquireSession?: RunnerSelectorOptions["acquireSession"];
}

/**
 * Connection to the local machine.
 *
 * Commands issued while the OS is being identified go through a pass-through
 * runner; afterwards the selected runner is fixed until `close()`.
 */
export class LocalConnection {
  readonly local = true;
  readonly uri = "local://";
  /** Nothing to log into; open a shell instead. */
  readonly loginCommand = null;

  private runner: CommandRunner;
  private closed = false;

  private constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  static async open(options: LocalConnectionOptions = {}): Promise<LocalConnection> {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? noopLogger;
    const processInvoker =
      options.processInvoker ?? new NodeProcessInvoker({ timeoutMs: config.commandTimeoutMs, logger });

    const connection = new LocalConnection(new PassThroughRunner(processInvoker));
    const osIdentity = options.osIdentity ?? new PlatformOsIdentity();
    const isWindows = await osIdentity.isWindows((command) => connection.runCommand(command));

    connection.runner = await selectRunner({
      isWindows,
      config,
      processInvoker,
      processManager: options.processManager ?? new NodeProcessManager(),
      pipeConnector: options.pipeConnector ?? new NodePipeConnector(),
      commandWrapper: options.commandWrapper,
      logger,
      acquireSession: options.acquireSession,
    });
    logger.info("Local connection ready", {
      component: "local-connection",
      runner: connection.runner.kind,
    });
    return connection;
  }

  get runnerKind(): RunnerKind {
    return this.runner.kind;
  }

  async runCommand(command: string): Promise<CommandResult> {
    if (this.closed) throw new ConnectionClosedError();
    return this.runner.runCommand(command);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.runner.dispose();
  }
}
