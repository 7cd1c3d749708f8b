/** A duplex, newline-delimited text channel. */
export interface LineChannel {
  readonly closed: boolean;
  writeLine(line: string): Promise<void>;
  /**
   * Resolve with the next complete line (without its terminator).
   * Rejects with ProtocolError if the channel closes first,
   * or SessionTimeoutError when `timeoutMs` elapses.
   */
  readLine(timeoutMs?: number): Promise<string>;
  close(): void;
}

export interface PipeConnector {
  /** Filesystem path the named pipe `name` is reachable at on this host. */
  pathFor(name: string): string;
  /** Open a channel to the pipe. Rejects if nothing is listening yet. */
  connect(name: string): Promise<LineChannel>;
}
