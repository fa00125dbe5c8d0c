import { once } from "node:events";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";

/**
 * Destination for rendered output.
 */
export interface OutputSink {
  write(text: string): void;
  flush(): void;
}

export class StringSink implements OutputSink {
  readonly buffer: string[] = [];

  write(text: string): void {
    if (text) this.buffer.push(text);
  }

  flush(): void {
    // Nothing is held back.
  }

  toString(): string {
    return this.buffer.join("");
  }
}

export interface WritableSinkOptions {
  /** End the stream on `close`. Leave unset for stdout. */
  readonly end?: boolean;
}

/**
 * Buffers output between flushes and hands it to a Node writable stream.
 *
 * `flush` is synchronous and does not wait when the stream reports backpressure: output
 * past the stream's high-water mark is queued in the stream's own buffer, so a slow
 * destination holds the rendered document in memory until it drains. `close` waits for
 * that drain. Stream errors are raised by the next `write`, `flush` or `close`.
 */
export class WritableSink implements OutputSink {
  private pending: string[] = [];
  private error: Error | undefined;
  private readonly endOnClose: boolean;

  constructor(
    readonly stream: Writable,
    { end = false }: WritableSinkOptions = {}
  ) {
    this.endOnClose = end;
    stream.on("error", (error: Error) => {
      this.error ??= error;
    });
  }

  private throwIfFailed(): void {
    if (this.error) throw this.error;
  }

  write(text: string): void {
    this.throwIfFailed();
    if (text) this.pending.push(text);
  }

  flush(): void {
    this.throwIfFailed();
    if (!this.pending.length) return;
    this.stream.write(this.pending.join(""));
    this.pending = [];
  }

  /**
   * Flushes, waits until the stream has taken everything, and rethrows any stream error.
   */
  async close(): Promise<void> {
    this.flush();
    if (this.endOnClose) {
      this.stream.end();
      await finished(this.stream);
    } else if (this.stream.writableNeedDrain) {
      await once(this.stream, "drain");
    }
    this.throwIfFailed();
  }
}
