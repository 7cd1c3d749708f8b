import { createConnection, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ProtocolError, SessionTimeoutError } from "../errors.js";
import type { LineChannel, PipeConnector } from "../interfaces/pipe-connector.js";
import { LineBuffer } from "../utils/line-buffer.js";

interface PendingRead {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

/** LineChannel over a connected net.Socket. */
export class SocketLineChannel implements LineChannel {
  private readonly buffer = new LineBuffer();
  private readonly lines: string[] = [];
  private readonly reads: PendingRead[] = [];
  private closeReason: Error | null = null;

  constructor(private readonly socket: Socket) {
    socket.on("data", (chunk: Buffer) => {
      this.lines.push(...this.buffer.feed(chunk));
      this.drain();
    });
    socket.on("error", (err) => {
      this.shutdown(new ProtocolError(`Pipe error: ${err.message}`, { cause: err }));
    });
    socket.on("close", () => {
      this.shutdown(new ProtocolError("Pipe closed by server"));
    });
  }

  get closed(): boolean {
    return this.closeReason !== null;
  }

  writeLine(line: string): Promise<void> {
    if (this.closeReason) return Promise.reject(this.closeReason);
    return new Promise((resolve, reject) => {
      this.socket.write(`${line}\n`, "utf8", (err) => {
        if (err) reject(new ProtocolError(`Pipe write failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  readLine(timeoutMs?: number): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.closeReason) return Promise.reject(this.closeReason);

    return new Promise((resolve, reject) => {
      const pending: PendingRead = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          const idx = this.reads.indexOf(pending);
          if (idx !== -1) this.reads.splice(idx, 1);
          reject(new SessionTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      this.reads.push(pending);
    });
  }

  close(): void {
    this.shutdown(new ProtocolError("Pipe closed"));
    this.socket.destroy();
  }

  private drain(): void {
    while (this.reads.length > 0 && this.lines.length > 0) {
      const pending = this.reads.shift();
      const line = this.lines.shift();
      if (pending === undefined || line === undefined) break;
      if (pending.timer) clearTimeout(pending.timer);
      pending.resolve(line);
    }
  }

  private shutdown(reason: Error): void {
    if (this.closeReason) return;
    this.closeReason = reason;
    this.buffer.reset();
    for (const pending of this.reads.splice(0)) {
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(reason);
    }
  }
}

export interface NodePipeConnectorOptions {
  /** Defaults to process.platform. */
  platform?: NodeJS.Platform;
  /** Directory .NET uses for pipe sockets outside Windows. Defaults to os.tmpdir(). */
  socketDirectory?: string;
}

/**
 * Connects to named pipes with node:net.
 *
 * On Windows the pipe lives in the `\\.\pipe\` namespace. Elsewhere .NET backs
 * a NamedPipeServerStream with a Unix socket at `<tmp>/CoreFxPipe_<name>`.
 */
export class NodePipeConnector implements PipeConnector {
  private readonly platform: NodeJS.Platform;
  private readonly socketDirectory: string;

  constructor(options: NodePipeConnectorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.socketDirectory = options.socketDirectory ?? tmpdir();
  }

  pathFor(name: string): string {
    if (this.platform === "win32") return `\\\\.\\pipe\\${name}`;
    return join(this.socketDirectory, `CoreFxPipe_${name}`);
  }

  connect(name: string): Promise<LineChannel> {
    const path = this.pathFor(name);
    return new Promise((resolve, reject) => {
      const socket = createConnection(path);
      const onError = (err: Error) => {
        socket.destroy();
        reject(err);
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(new SocketLineChannel(socket));
      });
    });
  }
}
