import { spawn as nodeSpawn } from "node:child_process";
import { constants } from "node:os";
import { planExecution } from "../core/command-line.js";
import { CommandTimeoutError, errorMessage } from "../errors.js";
import type { CommandResult } from "../interfaces/command-runner.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessInvoker } from "../interfaces/process-invoker.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface NodeProcessInvokerOptions {
  /** Kill the child and reject after this long. */
  timeoutMs?: number;
  cwd?: string;
  logger?: Logger;
}

/** Returned when the executable could not be started at all. */
const SPAWN_FAILURE: CommandResult = { stdout: "", stderr: "", exitStatus: 1 };

function exitStatusFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  const signalNumber = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return signalNumber === undefined ? 1 : 128 + signalNumber;
}

/**
 * Process invoker using child_process.spawn.
 * Plain command lines are executed directly; anything needing shell syntax
 * runs through the system shell.
 */
export class NodeProcessInvoker implements ProcessInvoker {
  private readonly timeoutMs: number;
  private readonly cwd: string | undefined;
  private readonly logger: Logger;

  constructor(options: NodeProcessInvokerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 600_000;
    this.cwd = options.cwd;
    this.logger = options.logger ?? noopLogger;
  }

  invoke(commandLine: string): Promise<CommandResult> {
    const plan = planExecution(commandLine);
    if (plan.mode === "empty") {
      this.logger.debug?.("Refusing to spawn an empty command line", { component: "invoker" });
      return Promise.resolve(SPAWN_FAILURE);
    }

    const child =
      plan.mode === "shell"
        ? nodeSpawn(plan.commandLine, {
            cwd: this.cwd,
            shell: true,
            windowsHide: true,
            stdio: ["ignore", "pipe", "pipe"],
          })
        : nodeSpawn(plan.file, plan.args, {
            cwd: this.cwd,
            windowsHide: true,
            stdio: ["ignore", "pipe", "pipe"],
          });

    return new Promise<CommandResult>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let spawned = false;
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill("SIGKILL");
        reject(new CommandTimeoutError(commandLine, this.timeoutMs));
      }, this.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("spawn", () => {
        spawned = true;
      });

      child.on("error", (err) => {
        if (settled) return;
        if (spawned) {
          // Errors after a successful spawn (e.g. a failed kill) do not end the command
          this.logger.warn("Child process error", { component: "invoker", error: err });
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.logger.debug?.("Failed to spawn command", {
          component: "invoker",
          commandLine,
          error: errorMessage(err),
        });
        resolve(SPAWN_FAILURE);
      });

      // "close" fires after stdio has drained, unlike "exit"
      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          exitStatus: exitStatusFor(code, signal),
        });
      });
    });
  }
}
