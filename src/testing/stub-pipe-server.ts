import { mkdtempSync, rmSync } from "node:fs";
import { createServer, type Server, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodePipeConnector } from "../adapters/node-pipe-connector.js";
import { decodeScript, QUIET_PREAMBLE } from "../core/encoded-script.js";
import { encodeResponse } from "../core/session-protocol.js";
import type { CommandResult } from "../interfaces/command-runner.js";
import { LineBuffer } from "../utils/line-buffer.js";

/**
 * What the stub sends back for a request:
 * a result to encode, a raw line, or null to stay silent.
 */
export type StubReply = CommandResult | { raw: string } | null;

export type StubHandler = (command: string, requestIndex: number) => StubReply | Promise<StubReply>;

/**
 * In-process stand-in for the PowerShell pipe server.
 *
 * Listens on a Unix socket inside a private temp directory; `connector`
 * resolves pipe names into that directory.
 */
export class StubPipeServer {
  readonly directory: string;
  readonly connector: NodePipeConnector;
  /** Commands received, preamble stripped. */
  readonly requests: string[] = [];
  /** Errors thrown by the handler; each one dropped its client. */
  readonly handlerErrors: unknown[] = [];
  private readonly servers: Server[] = [];
  private readonly sockets = new Set<Socket>();

  constructor(private readonly handler: StubHandler) {
    this.directory = mkdtempSync(join(tmpdir(), "localrun-stub-"));
    this.connector = new NodePipeConnector({ platform: "linux", socketDirectory: this.directory });
  }

  /** Start answering on the pipe called `name`. */
  listen(name: string): Promise<void> {
    const server = createServer((socket) => this.accept(socket));
    this.servers.push(server);
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.connector.pathFor(name), () => resolve());
    });
  }

  /** Drop every connected client, as if the server process died. */
  disconnectAll(): void {
    for (const socket of this.sockets) socket.destroy();
  }

  async close(): Promise<void> {
    this.disconnectAll();
    await Promise.all(
      this.servers.map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
    );
    rmSync(this.directory, { recursive: true, force: true });
  }

  private accept(socket: Socket): void {
    this.sockets.add(socket);
    socket.on("close", () => this.sockets.delete(socket));
    socket.on("error", () => socket.destroy());

    const buffer = new LineBuffer();
    let queue = Promise.resolve();
    socket.on("data", (chunk: Buffer) => {
      for (const line of buffer.feed(chunk)) {
        queue = queue.then(() => this.answer(socket, line)).catch((err: unknown) => {
          // Drop the client so the caller sees a closed pipe, not a timeout
          this.handlerErrors.push(err);
          socket.destroy();
        });
      }
    });
  }

  private async answer(socket: Socket, line: string): Promise<void> {
    const script = decodeScript(line, "utf8");
    const command = script.startsWith(QUIET_PREAMBLE) ? script.slice(QUIET_PREAMBLE.length) : script;
    const index = this.requests.push(command) - 1;

    const reply = await this.handler(command, index);
    if (reply === null || socket.destroyed) return;
    const out = "raw" in reply ? reply.raw : encodeResponse(reply);
    socket.write(`${out}\n`);
  }
}
