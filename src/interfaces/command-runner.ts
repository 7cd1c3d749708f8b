/** Outcome of one command, identical in shape for every runner. */
export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitStatus: number;
}

export type RunnerKind = "pass-through" | "shell" | "scripted" | "session";

export interface CommandRunner {
  readonly kind: RunnerKind;
  runCommand(command: string): Promise<CommandResult>;
  /** Release anything the runner owns (e.g. a session server). Idempotent. */
  dispose(): void;
}
