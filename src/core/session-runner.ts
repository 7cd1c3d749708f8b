import type { CommandResult, CommandRunner } from "../interfaces/command-runner.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { PipeSession } from "./pipe-session.js";
import { decodeResponse, encodeRequest } from "./session-protocol.js";

export interface SessionRunnerOptions {
  /** Bound on each response read. Omit to wait indefinitely. */
  responseTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Windows fast path: commands go over a persistent pipe session.
 *
 * The protocol is one request line, one response line, so calls are chained
 * and run strictly in submission order.
 */
export class SessionRunner implements CommandRunner {
  readonly kind = "session" as const;
  private readonly responseTimeoutMs: number | undefined;
  private readonly logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly session: PipeSession,
    options: SessionRunnerOptions = {},
  ) {
    this.responseTimeoutMs = options.responseTimeoutMs;
    this.logger = options.logger ?? noopLogger;
  }

  get sessionId(): string {
    return this.session.id;
  }

  runCommand(command: string): Promise<CommandResult> {
    const run = this.tail.then(() => this.execute(command));
    // Keep the chain alive after a failed command
    this.tail = run.catch(() => undefined);
    return run;
  }

  dispose(): void {
    this.session.close();
  }

  private async execute(command: string): Promise<CommandResult> {
    const request = encodeRequest(command);
    const response = await this.session.request(request, this.responseTimeoutMs);
    try {
      return decodeResponse(response);
    } catch (err) {
      this.logger.error("Malformed session response; closing session", {
        component: "session-runner",
        sessionId: this.session.id,
        error: err,
      });
      this.session.close();
      throw err;
    }
  }
}
