import { StreamProtocolError } from "../error";
import { concatBytes, toBytes } from "../utils/encode";

/**
 * Pushes the request body into a {@link StreamWriter}. Each `write` resolves
 * once the consumer asks for more bytes, so awaiting it keeps production in
 * step with the upload.
 */
export type Producer = (stream: StreamWriter) => void | Promise<void>;

export const DEFAULT_CHUNK_SIZE = 16 * 1024;

/**
 * Single-producer, single-consumer handoff between a push-style producer and
 * a pull-style reader.
 *
 * The producer starts as soon as the writer is created and runs until its
 * first `write`. From then on it only resumes when `read` needs more bytes
 * than are buffered, so at most one write's worth of data sits in memory
 * beyond what the reader asked for.
 *
 * @example
 * ```ts
 * const stream = new StreamWriter(async (out) => {
 *   await out.write("hello ");
 *   await out.write("world");
 * });
 * await stream.read(5); // "hello"
 * await stream.read(); // " world"
 * ```
 */
export class StreamWriter {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private finished = false;
  private producerError: { error: unknown } | undefined;
  private pendingWrites: Array<() => void> = [];
  private wakeConsumer: (() => void) | undefined;
  private reading = false;
  private abandoned = false;
  private readonly completion: Promise<void>;

  constructor(producer: Producer) {
    this.completion = this.run(producer);
  }

  /** Bytes written by the producer and not read yet. */
  get bufferedBytes(): number {
    return this.buffered;
  }

  /** Whether the producer has returned (or thrown). */
  get done(): boolean {
    return this.finished;
  }

  /**
   * Appends a chunk and suspends the producer until the consumer reads again.
   * Empty chunks are accepted and only yield control.
   */
  write(chunk: string | Uint8Array): Promise<void> {
    if (this.finished) {
      return Promise.reject(
        new StreamProtocolError("write() called after the producer finished"),
      );
    }
    if (!this.abandoned) {
      const bytes = typeof chunk === "string" ? toBytes(chunk) : chunk.slice();
      if (bytes.byteLength > 0) {
        this.chunks.push(bytes);
        this.buffered += bytes.byteLength;
      }
    }
    return new Promise<void>((resolve) => {
      this.pendingWrites.push(resolve);
      this.notify();
    });
  }

  /**
   * Reads from the session.
   *
   * - `read(n)` resolves with exactly `n` bytes, or with the remainder once
   *   the producer has finished, or with `null` when nothing is left.
   * - `read()` resumes the producer until it finishes and resolves with every
   *   remaining byte (an empty array at end of stream, never `null`).
   *
   * @param length - Number of bytes wanted.
   */
  async read(length?: number): Promise<Uint8Array | null> {
    if (this.reading) {
      throw new StreamProtocolError(
        "StreamWriter is already being read; sessions have a single consumer",
      );
    }
    if (
      length !== undefined &&
      (!Number.isInteger(length) || length < 0)
    ) {
      throw new RangeError(`Invalid read length: ${length}`);
    }

    this.reading = true;
    try {
      return length === undefined
        ? await this.readAll()
        : await this.readExact(length);
    } finally {
      this.reading = false;
    }
  }

  /**
   * Adapts the session to a pull-based body. Every pull reads `chunkSize`
   * bytes; the stream closes on end of stream and errors if the producer
   * failed.
   */
  toReadableStream(
    chunkSize: number = DEFAULT_CHUNK_SIZE,
  ): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>(
      {
        pull: async (controller) => {
          const chunk = await this.read(chunkSize);
          if (chunk === null) {
            controller.close();
          } else {
            controller.enqueue(chunk);
          }
        },
        cancel: () => {
          this.discard();
        },
      },
      { highWaterMark: 0 },
    );
  }

  /**
   * Drops buffered bytes after the transport gave up on the body. The
   * producer is not notified; a pending `write` stays unresolved.
   */
  discard(): void {
    this.abandoned = true;
    this.chunks = [];
    this.buffered = 0;
  }

  /** Resolves once the producer has returned or thrown. */
  settled(): Promise<void> {
    return this.completion;
  }

  /** The producer's failure, wrapped as it would be thrown from `read`. */
  failure(): StreamProtocolError | undefined {
    return this.producerError
      ? new StreamProtocolError("Stream producer failed", {
          cause: this.producerError.error,
        })
      : undefined;
  }

  // #region Internal

  private async run(producer: Producer): Promise<void> {
    try {
      await producer(this);
    } catch (error) {
      this.producerError = { error };
    } finally {
      this.finished = true;
      this.notify();
    }
  }

  private async readExact(length: number): Promise<Uint8Array | null> {
    this.throwIfFailed();
    if (length === 0) {
      return new Uint8Array(0);
    }
    while (this.buffered < length && !this.finished) {
      await this.resume();
      this.throwIfFailed();
    }
    if (this.buffered === 0) {
      return null;
    }
    return this.take(Math.min(length, this.buffered));
  }

  private async readAll(): Promise<Uint8Array> {
    this.throwIfFailed();
    while (!this.finished) {
      await this.resume();
      this.throwIfFailed();
    }
    return this.take(this.buffered);
  }

  /**
   * Lets the producer continue past its pending write and waits until it
   * writes again or finishes.
   */
  private async resume(): Promise<void> {
    if (this.finished) return;
    const woken = new Promise<void>((resolve) => {
      this.wakeConsumer = resolve;
    });
    const writers = this.pendingWrites;
    this.pendingWrites = [];
    for (const release of writers) {
      release();
    }
    await woken;
  }

  private notify(): void {
    const wake = this.wakeConsumer;
    this.wakeConsumer = undefined;
    wake?.();
  }

  private take(count: number): Uint8Array {
    const parts: Uint8Array[] = [];
    let remaining = count;
    while (remaining > 0) {
      const head = this.chunks[0];
      if (!head) break;
      if (head.byteLength <= remaining) {
        parts.push(head);
        this.chunks.shift();
        remaining -= head.byteLength;
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    this.buffered -= count - remaining;
    return parts.length === 0 ? new Uint8Array(0) : concatBytes(parts);
  }

  private throwIfFailed(): void {
    const error = this.failure();
    if (error) {
      throw error;
    }
  }
}

/**
 * Streaming request body. The transport opens one {@link StreamWriter} per
 * request and sends it with chunked transfer encoding.
 *
 * @example
 * ```ts
 * await client.put(
 *   { bucket: "logs", object: "today.txt" },
 *   {
 *     body: new StreamPayload(async (stream) => {
 *       for (const line of lines) await stream.write(`${line}\n`);
 *     }),
 *   },
 * );
 * ```
 */
export class StreamPayload {
  private readonly producer: Producer;
  private opened = false;

  constructor(producer: Producer) {
    this.producer = producer;
  }

  /**
   * Starts the producer. A payload can only be sent once.
   */
  open(): StreamWriter {
    if (this.opened) {
      throw new StreamProtocolError("StreamPayload has already been consumed");
    }
    this.opened = true;
    return new StreamWriter(this.producer);
  }
}
