/**
 * Line buffer for stream-based line protocols (e.g. a named pipe socket).
 *
 * Data arrives in arbitrary chunks that may split across lines or even
 * across UTF-8 multi-byte characters. This buffer accumulates partial data
 * and yields complete lines.
 */
export class LineBuffer {
  private buffer = "";
  private decoder = new TextDecoder("utf-8", { fatal: false });

  /**
   * Feed raw bytes or a string into the buffer.
   * Returns complete lines without their terminators. Empty lines are kept;
   * the protocol above decides what they mean.
   */
  feed(chunk: string | Uint8Array): string[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.buffer += text;

    const lines: string[] = [];

    // Handle both \n and \r\n line endings
    let newlineIdx = this.buffer.indexOf("\n");
    while (newlineIdx !== -1) {
      let line = this.buffer.slice(0, newlineIdx);
      this.buffer = this.buffer.slice(newlineIdx + 1);
      newlineIdx = this.buffer.indexOf("\n");

      if (line.endsWith("\r")) {
        line = line.slice(0, -1);
      }
      lines.push(line);
    }

    return lines;
  }

  /** Reset the buffer, discarding any accumulated partial data. */
  reset(): void {
    this.buffer = "";
    this.decoder = new TextDecoder("utf-8", { fatal: false });
  }

  /** True when a partial line is waiting for its terminator. */
  get pending(): boolean {
    return this.buffer.length > 0;
  }
}
