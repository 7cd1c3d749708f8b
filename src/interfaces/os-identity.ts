import type { CommandResult } from "./command-runner.js";

/** Runs a command through whatever runner is active while the OS is still unknown. */
export type CommandProbe = (command: string) => Promise<CommandResult>;

export interface OsIdentityProvider {
  isWindows(probe: CommandProbe): Promise<boolean>;
}
