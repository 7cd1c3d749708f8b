import type { CommandResult, CommandRunner } from "../interfaces/command-runner.js";
import type { CommandWrapper } from "../interfaces/command-wrapper.js";
import type { ProcessInvoker } from "../interfaces/process-invoker.js";

/** Runs commands verbatim. Active while the OS is still being identified. */
export class PassThroughRunner implements CommandRunner {
  readonly kind = "pass-through" as const;

  constructor(private readonly invoker: ProcessInvoker) {}

  runCommand(command: string): Promise<CommandResult> {
    return this.invoker.invoke(command);
  }

  dispose(): void {
    // No persistent resources to clean up
  }
}

/** POSIX runner: optional wrapper (e.g. sudo), then a direct shell-out. */
export class ShellRunner implements CommandRunner {
  readonly kind = "shell" as const;

  constructor(
    private readonly invoker: ProcessInvoker,
    private readonly wrapper?: CommandWrapper,
  ) {}

  runCommand(command: string): Promise<CommandResult> {
    const wrapped = this.wrapper ? this.wrapper.run(command) : command;
    return this.invoker.invoke(wrapped);
  }

  dispose(): void {
    // No persistent resources to clean up
  }
}
