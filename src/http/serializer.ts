import { chunkHeader, chunkOverhead, CRLF, lastChunk, noChunkDecorator, type ChunkDecorator } from "./chunk.js";
import { formatHeader, type Message } from "./message.js";
import { statusPermitsBody } from "./status.js";
import type { BodyReader } from "./body.js";
import { utf8 } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";

// Produced is the result of one production call.
export type Produced = Readonly<{
  /** Wire views, referencing serializer-owned or body-owned memory. */
  buffers: Uint8Array[];
  /** The header is fully contained in the output produced so far. */
  headerDone: boolean;
  /** The whole message is fully contained in the output produced so far. */
  done: boolean;
}>;

export type SerializerOptions = Readonly<{
  decorator?: ChunkDecorator;
  split?: boolean;
}>;

// Serializer turns one message into wire bytes, one bounded production cycle at a time.
//
// Output stays pending until consume() reports how many bytes the transport accepted,
// so a partial write never loses or repeats bytes.
export class Serializer {
  private readonly msg: Message;
  private readonly decorator: ChunkDecorator;
  private splitHeader: boolean;

  // Formatted header, created on the first production call.
  private header: Uint8Array | null = null;
  // Header bytes not yet consumed.
  private headerUnconsumed = 0;
  // Framing decided from the header when it is formatted.
  private chunked = false;
  private expected: number | undefined = undefined;
  private bodyBytes = 0;

  private reader: BodyReader | null = null;
  // Every byte of the message has been produced (it may still be pending).
  private produced = false;

  // Views produced but not yet consumed, in wire order.
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;

  // Poisoned by a body, serialization or transport failure.
  private failed: unknown = null;

  constructor(msg: Message, opts: SerializerOptions = {}) {
    this.msg = msg;
    this.decorator = opts.decorator ?? noChunkDecorator;
    this.splitHeader = opts.split ?? false;
  }

  get message(): Message {
    return this.msg;
  }

  // split limits production cycles to end at the end of the header.
  split(value: boolean): void {
    this.splitHeader = value;
  }

  getSplit(): boolean {
    return this.splitHeader;
  }

  isHeaderDone(): boolean {
    return this.header != null && this.headerUnconsumed === 0;
  }

  isDone(): boolean {
    return this.produced && this.pendingBytes === 0;
  }

  isChunked(): boolean {
    return this.chunked;
  }

  // produce returns the next views of the message, at most `limit` bytes in total (0 = unbounded).
  produce(limit: number): Produced {
    if (this.failed != null) {
      throw new WireError({ code: "invalid_state", stage: "serialize", message: "serializer is unusable after an error", cause: this.failed });
    }
    if (this.isDone()) {
      throw new WireError({ code: "serialization_error", stage: "serialize", message: "message already serialized" });
    }
    if (!Number.isSafeInteger(limit) || limit < 0) {
      throw new WireError({ code: "invalid_input", stage: "serialize", message: "limit must be a non-negative integer" });
    }
    if (this.pendingBytes === 0) {
      try {
        this.cycle(limit);
      } catch (e) {
        this.failed = e;
        this.releaseReader();
        throw e;
      }
    }

    let budget = limit > 0 ? limit : Number.POSITIVE_INFINITY;
    if (this.splitHeader && this.headerUnconsumed > 0) budget = Math.min(budget, this.headerUnconsumed);

    const buffers: Uint8Array[] = [];
    let out = 0;
    for (const b of this.pending) {
      if (out >= budget) break;
      const take = Math.min(b.length, budget - out);
      buffers.push(take === b.length ? b : b.subarray(0, take));
      out += take;
    }
    return {
      buffers,
      headerDone: this.header != null && out >= this.headerUnconsumed,
      done: this.produced && out === this.pendingBytes
    };
  }

  // consume marks n produced bytes as written.
  consume(n: number): void {
    if (!Number.isSafeInteger(n) || n < 0 || n > this.pendingBytes) {
      throw new WireError({ code: "invalid_state", stage: "serialize", message: `cannot consume ${n} of ${this.pendingBytes} pending bytes` });
    }
    this.pendingBytes -= n;
    this.headerUnconsumed -= Math.min(n, this.headerUnconsumed);
    let left = n;
    while (left > 0) {
      const head = this.pending[0]!;
      if (head.length <= left) {
        left -= head.length;
        this.pending.shift();
        continue;
      }
      this.pending[0] = head.subarray(left);
      left = 0;
    }
  }

  // abandon poisons the serializer after a failed transfer; the byte position is lost.
  abandon(cause: unknown): void {
    if (this.failed == null) this.failed = cause;
    this.releaseReader();
  }

  // releaseReader closes an unfinished body reader.
  private releaseReader(): void {
    const reader = this.reader;
    this.reader = null;
    reader?.close?.();
  }

  private push(b: Uint8Array): void {
    if (b.length === 0) return;
    this.pending.push(b);
    this.pendingBytes += b.length;
  }

  private cycle(limit: number): void {
    if (this.header == null) {
      this.startHeader();
      if (this.produced || this.splitHeader) return;
    }
    this.bodyCycle(limit);
  }

  private startHeader(): void {
    const msg = this.msg;
    const h = msg.header;
    this.chunked = msg.chunked();
    this.expected = this.chunked ? undefined : msg.contentLength();
    this.header = utf8(formatHeader(h));
    this.headerUnconsumed = this.header.length;
    this.push(this.header);

    const bodyless = h.kind === "response" && !statusPermitsBody(h.status);
    if (bodyless || (!this.chunked && this.expected === 0)) this.produced = true;
  }

  private bodyCycle(limit: number): void {
    if (this.reader == null) this.reader = this.callBody(() => this.msg.body.reader());
    const reader = this.reader;

    let bodyLimit = limit;
    if (limit > 0 && this.chunked) bodyLimit = Math.max(1, limit - chunkOverhead(limit));
    const chunk = this.callBody(() => reader.next(bodyLimit));
    const data = chunk.data;
    if (bodyLimit > 0 && data.length > bodyLimit) {
      throw new WireError({
        code: "serialization_error",
        stage: "serialize",
        message: `body produced ${data.length} bytes for a limit of ${bodyLimit}`
      });
    }

    if (this.chunked) {
      if (data.length > 0) {
        this.push(chunkHeader(data.length, this.decorate(() => this.decorator.chunk(data.length))));
        this.push(data);
        this.push(CRLF);
      }
      if (!chunk.more) {
        this.push(lastChunk(this.decorate(() => this.decorator.trailer())));
        this.produced = true;
      }
      return;
    }

    this.bodyBytes += data.length;
    if (this.expected !== undefined && this.bodyBytes > this.expected) {
      throw new WireError({
        code: "serialization_error",
        stage: "serialize",
        message: `body exceeds Content-Length ${this.expected}`
      });
    }
    this.push(data);
    if (!chunk.more) {
      if (this.expected !== undefined && this.bodyBytes !== this.expected) {
        throw new WireError({
          code: "serialization_error",
          stage: "serialize",
          message: `body ended after ${this.bodyBytes} of ${this.expected} bytes`
        });
      }
      this.produced = true;
    }
  }

  private decorate(fn: () => string): string {
    try {
      return fn();
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new WireError({ code: "serialization_error", stage: "serialize", message: `chunk decorator failed: ${message}`, cause: e });
    }
  }

  private callBody<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof WireError) throw e;
      const message = e instanceof Error ? e.message : String(e);
      throw new WireError({ code: "body_error", stage: "serialize", message, cause: e });
    }
  }
}
