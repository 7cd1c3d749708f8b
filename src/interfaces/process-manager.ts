/** A handle to a spawned background process. */
export interface ProcessHandle {
  readonly pid: number;
  /** Resolves when process exits. Null exit code means killed by signal. */
  readonly exited: Promise<number | null>;
  kill(signal?: "SIGTERM" | "SIGKILL" | "SIGINT"): void;
}

export interface SpawnOptions {
  command: string;
  args: string[];
  cwd?: string;
  /** Run in its own process group with no stdio, so the host can exit independently. */
  detached?: boolean;
}

export interface ProcessManager {
  spawn(options: SpawnOptions): ProcessHandle;
  /** Check if a PID is alive (signal 0). */
  isAlive(pid: number): boolean;
}
