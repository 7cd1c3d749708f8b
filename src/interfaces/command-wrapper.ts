/** Rewrites a command before execution, e.g. to prefix privilege escalation. */
export interface CommandWrapper {
  run(command: string): string;
}
