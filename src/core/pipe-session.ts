import { randomBytes } from "node:crypto";
import { errorMessage, ProtocolError, SessionAcquisitionError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { LineChannel, PipeConnector } from "../interfaces/pipe-connector.js";
import type { ProcessHandle, ProcessManager } from "../interfaces/process-manager.js";
import type { ResolvedConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { encodePowerShellCommand } from "./encoded-script.js";
import { buildPipeServerScript } from "./pipe-server-script.js";

// One "exit" listener covers every open session.
const liveSessions = new Set<PipeSession>();

function closeLiveSessions(): void {
  for (const session of [...liveSessions]) session.close();
}

function track(session: PipeSession): void {
  if (liveSessions.size === 0) process.on("exit", closeLiveSessions);
  liveSessions.add(session);
}

function untrack(session: PipeSession): void {
  if (liveSessions.delete(session) && liveSessions.size === 0) {
    process.off("exit", closeLiveSessions);
  }
}

/** Number of sessions the exit hook would still close. */
export function openPipeSessionCount(): number {
  return liveSessions.size;
}

/**
 * A connected pipe plus the detached server behind it.
 *
 * Exists only while the server is alive and connected. `close()` tears both
 * down; a shared process "exit" listener closes any session still open when
 * the host exits.
 */
export class PipeSession {
  private disposed = false;

  constructor(
    readonly id: string,
    private readonly channel: LineChannel,
    private readonly server: ProcessHandle,
    private readonly logger: Logger = noopLogger,
  ) {
    track(this);
  }

  get serverPid(): number {
    return this.server.pid;
  }

  get closed(): boolean {
    return this.disposed || this.channel.closed;
  }

  /**
   * Send one request line and wait for exactly one response line.
   * Any failure leaves the line protocol out of step, so the session is closed.
   */
  async request(line: string, timeoutMs?: number): Promise<string> {
    if (this.closed) {
      throw new ProtocolError(`Pipe session ${this.id} is closed`);
    }
    try {
      await this.channel.writeLine(line);
      return await this.channel.readLine(timeoutMs);
    } catch (err) {
      this.logger.warn("Pipe session request failed; closing session", {
        component: "pipe-session",
        sessionId: this.id,
        error: errorMessage(err),
      });
      this.close();
      throw err;
    }
  }

  close(): void {
    if (this.disposed) return;
    this.disposed = true;
    untrack(this);
    this.channel.close();
    this.server.kill("SIGKILL");
    this.logger.debug?.("Pipe session closed", {
      component: "pipe-session",
      sessionId: this.id,
      pid: this.server.pid,
    });
  }
}

export type SessionAcquisition =
  | { ok: true; session: PipeSession }
  | { ok: false; error: SessionAcquisitionError };

export interface AcquirePipeSessionOptions {
  processManager: ProcessManager;
  pipeConnector: PipeConnector;
  config: Pick<
    ResolvedConfig,
    "scriptingHost" | "pipeNamePrefix" | "pipeConnectAttempts" | "pipeConnectIntervalMs"
  >;
  logger?: Logger;
  /** Override the random pipe name, e.g. to point tests at a stub server. */
  generateSessionId?: (prefix: string) => string;
}

function randomSessionId(prefix: string): string {
  return `${prefix}${randomBytes(16).toString("hex")}`;
}

/**
 * Start a detached pipe server and connect to it, polling while it starts up.
 * Never throws: failure is returned so the caller can fall back.
 */
export async function acquirePipeSession(
  options: AcquirePipeSessionOptions,
): Promise<SessionAcquisition> {
  const { processManager, pipeConnector, config } = options;
  const logger = options.logger ?? noopLogger;
  const sessionId = (options.generateSessionId ?? randomSessionId)(config.pipeNamePrefix);

  let server: ProcessHandle;
  try {
    server = processManager.spawn({
      command: config.scriptingHost,
      args: [
        "-NoProfile",
        "-ExecutionPolicy",
        "Bypass",
        "-NonInteractive",
        "-EncodedCommand",
        encodePowerShellCommand(buildPipeServerScript(sessionId)),
      ],
      detached: true,
    });
  } catch (err) {
    return {
      ok: false,
      error: new SessionAcquisitionError(`Failed to start pipe server: ${errorMessage(err)}`, {
        cause: err,
      }),
    };
  }

  let serverExited = false;
  void server.exited.then(() => {
    serverExited = true;
  });

  let lastError: unknown;
  for (let attempt = 1; attempt <= config.pipeConnectAttempts && !serverExited; attempt++) {
    try {
      const channel = await pipeConnector.connect(sessionId);
      logger.info("Pipe session established", {
        component: "pipe-session",
        sessionId,
        pid: server.pid,
        attempts: attempt,
      });
      return { ok: true, session: new PipeSession(sessionId, channel, server, logger) };
    } catch (err) {
      // Server still starting up
      lastError = err;
    }
    if (attempt < config.pipeConnectAttempts) {
      await new Promise((r) => setTimeout(r, config.pipeConnectIntervalMs));
    }
  }

  server.kill("SIGKILL");
  const reason = serverExited
    ? "server exited before the pipe opened"
    : `pipe not connectable after ${config.pipeConnectAttempts} attempts`;
  return {
    ok: false,
    error: new SessionAcquisitionError(`Could not acquire pipe session ${sessionId}: ${reason}`, {
      cause: lastError,
    }),
  };
}
