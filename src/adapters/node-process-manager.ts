import { spawn as nodeSpawn } from "node:child_process";
import { SpawnError } from "../errors.js";
import type { ProcessHandle, ProcessManager, SpawnOptions } from "../interfaces/process-manager.js";

/**
 * Node.js process manager using child_process.spawn.
 * Used for long-lived background processes such as the pipe session server.
 */
export class NodeProcessManager implements ProcessManager {
  spawn(options: SpawnOptions): ProcessHandle {
    const detached = options.detached ?? false;
    const child = nodeSpawn(options.command, options.args, {
      cwd: options.cwd,
      detached,
      stdio: "ignore",
      windowsHide: true,
    });

    // Attach an early error listener immediately after spawn() so ENOENT-style
    // failures cannot surface as unhandled exceptions before we build the handle.
    const earlyErrorListener = () => {};
    child.on("error", earlyErrorListener);

    if (typeof child.pid !== "number") {
      throw new SpawnError(`Failed to spawn process: ${options.command}`);
    }

    const pid = child.pid;

    const exited = new Promise<number | null>((resolve) => {
      child.on("exit", (code, signal) => {
        // null code when killed by signal
        resolve(signal ? null : code);
      });
      child.on("error", () => {
        resolve(null);
      });
    });

    // Real error handlers are now attached; remove the early no-op listener.
    child.off("error", earlyErrorListener);

    // A detached server must not keep the host's event loop alive
    if (detached) child.unref();

    return {
      pid,
      exited,
      kill(signal: "SIGTERM" | "SIGKILL" | "SIGINT" = "SIGTERM") {
        try {
          child.kill(signal);
        } catch {
          // Process may already be dead
        }
      },
    };
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }
}
