import type { CommandRunner } from "../interfaces/command-runner.js";
import type { CommandWrapper } from "../interfaces/command-wrapper.js";
import type { Logger } from "../interfaces/logger.js";
import type { PipeConnector } from "../interfaces/pipe-connector.js";
import type { ProcessInvoker } from "../interfaces/process-invoker.js";
import type { ProcessManager } from "../interfaces/process-manager.js";
import type { ResolvedConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import {
  type AcquirePipeSessionOptions,
  acquirePipeSession,
  type SessionAcquisition,
} from "./pipe-session.js";
import { ScriptedRunner } from "./scripted-runner.js";
import { SessionRunner } from "./session-runner.js";
import { ShellRunner } from "./shell-runner.js";

export interface RunnerSelectorOptions {
  isWindows: boolean;
  config: ResolvedConfig;
  processInvoker: ProcessInvoker;
  processManager: ProcessManager;
  pipeConnector: PipeConnector;
  commandWrapper?: CommandWrapper;
  logger?: Logger;
  /** Replaces acquirePipeSession, e.g. to force a failing acquisition. */
  acquireSession?: (options: AcquirePipeSessionOptions) => Promise<SessionAcquisition>;
}

/**
 * Pick the runner a connection keeps for its lifetime.
 *
 * Windows: a pipe session when one can be acquired, else one host process per
 * command. Everything else: a plain shell runner.
 */
export async function selectRunner(options: RunnerSelectorOptions): Promise<CommandRunner> {
  const { config, processInvoker } = options;
  const logger = options.logger ?? noopLogger;

  if (!options.isWindows) {
    return new ShellRunner(processInvoker, options.commandWrapper);
  }

  if (!config.sessionEnabled) {
    logger.info("Pipe sessions disabled; using scripted runner", { component: "runner-selector" });
    return new ScriptedRunner(processInvoker, config.scriptingHost);
  }

  const acquire = options.acquireSession ?? acquirePipeSession;
  const acquisition = await acquire({
    processManager: options.processManager,
    pipeConnector: options.pipeConnector,
    config,
    logger,
  });

  if (acquisition.ok) {
    return new SessionRunner(acquisition.session, {
      responseTimeoutMs: config.sessionResponseTimeoutMs,
      logger,
    });
  }

  logger.warn("Falling back to scripted runner", {
    component: "runner-selector",
    error: acquisition.error,
  });
  return new ScriptedRunner(processInvoker, config.scriptingHost);
}
