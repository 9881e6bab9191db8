import type { Duplex } from "node:stream";

import { DEFAULT_MAX_QUEUED_BYTES, DEFAULT_RECV_HIGH_WATER_MARK, normalizeLimit } from "../defaults.js";
import type { ByteDuplex } from "../ws/connection.js";

export type SocketDuplexOptions = Readonly<{
  /** Buffered bytes at which the stream is paused until a read drains them (0 disables pausing). */
  highWaterMark?: number;
  /** Buffered bytes past which the stream fails (0 means unlimited). */
  maxQueuedBytes?: number;
}>;

// SocketDuplex adapts a Node Duplex (net.Socket, tls.TLSSocket, ...) to ByteDuplex.
export class SocketDuplex implements ByteDuplex {
  private readonly stream: Duplex;
  private readonly highWaterMark: number;
  private readonly maxQueuedBytes: number;
  private readonly queue: Uint8Array[] = [];
  // Read cursor for queue to avoid Array.shift() O(n).
  private queueHead = 0;
  private queueBytes = 0;
  private waiters: Array<() => void> = [];
  private ended = false;
  private error: Error | null = null;

  constructor(stream: Duplex, opts: SocketDuplexOptions = {}) {
    this.stream = stream;
    this.highWaterMark = normalizeLimit("highWaterMark", opts.highWaterMark, DEFAULT_RECV_HIGH_WATER_MARK);
    this.maxQueuedBytes = normalizeLimit("maxQueuedBytes", opts.maxQueuedBytes, DEFAULT_MAX_QUEUED_BYTES);
    stream.on("data", (chunk: Buffer | string) => {
      this.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
    stream.on("end", () => {
      this.ended = true;
      this.wake();
    });
    stream.on("error", (err: Error) => {
      if (this.error == null) this.error = err;
      this.wake();
    });
    stream.on("close", () => {
      this.ended = true;
      this.wake();
    });
  }

  // queuedBytes reports received bytes not yet returned by read().
  get queuedBytes(): number {
    return this.queueBytes;
  }

  // read resolves with the next received chunk, or null once the stream has ended.
  async read(): Promise<Uint8Array | null> {
    while (true) {
      if (this.error != null) throw this.error;
      const chunk = this.shiftQueue();
      if (chunk != null) {
        if (this.stream.isPaused() && this.queueBytes < this.highWaterMark) this.stream.resume();
        return chunk;
      }
      if (this.ended) return null;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  write(chunk: Uint8Array): Promise<void> {
    if (this.error != null) return Promise.reject(this.error);
    if (this.stream.destroyed || this.stream.writableEnded) return Promise.reject(new Error("stream closed"));
    return new Promise<void>((resolve, reject) => {
      this.stream.write(chunk, (err) => {
        if (err != null) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    this.stream.destroy();
  }

  private push(b: Uint8Array): void {
    if (this.error != null) return;
    if (this.maxQueuedBytes > 0 && this.queueBytes + b.length > this.maxQueuedBytes) {
      this.fail(new Error("recv buffer exceeded"));
      return;
    }
    this.queue.push(b);
    this.queueBytes += b.length;
    if (this.highWaterMark > 0 && this.queueBytes >= this.highWaterMark) this.stream.pause();
    this.wake();
  }

  private shiftQueue(): Uint8Array | undefined {
    if (this.queueHead >= this.queue.length) return undefined;
    const b = this.queue[this.queueHead];
    this.queueHead++;
    if (this.queueHead === this.queue.length) {
      this.queue.length = 0;
      this.queueHead = 0;
    } else if (this.queueHead > 1024 && this.queueHead * 2 > this.queue.length) {
      this.queue.splice(0, this.queueHead);
      this.queueHead = 0;
    }
    if (b != null) this.queueBytes -= b.length;
    return b;
  }

  // fail drops buffered data and destroys the stream; later reads and writes see err.
  private fail(err: Error): void {
    this.error = err;
    this.queue.length = 0;
    this.queueHead = 0;
    this.queueBytes = 0;
    this.stream.destroy();
    this.wake();
  }

  private wake(): void {
    const ws = this.waiters;
    this.waiters = [];
    for (const w of ws) w();
  }
}
