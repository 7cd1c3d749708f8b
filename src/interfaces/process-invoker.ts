import type { CommandResult } from "./command-runner.js";

/**
 * Runs a complete command line as a child process and resolves once it exits.
 * The command line is used as given; quoting is the caller's job.
 */
export interface ProcessInvoker {
  invoke(commandLine: string): Promise<CommandResult>;
}
