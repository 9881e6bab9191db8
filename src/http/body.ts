import { closeSync, fstatSync, openSync, readSync, writeSync } from "node:fs";

import { concatBytes, utf8 } from "../utils/bin.js";

// BodyChunk is one view of body content plus whether more content follows it.
export type BodyChunk = Readonly<{
  /** Next bytes of the body; may be empty when `more` is true. */
  data: Uint8Array;
  /** False once this chunk carries the last body bytes. */
  more: boolean;
}>;

// BodyReader is the producer side of the body content contract.
export interface BodyReader {
  /**
   * Returns the next view of body content, at most `limit` bytes (0 means unbounded).
   * Throws when the content cannot be produced.
   */
  next(limit: number): BodyChunk;
  /** Releases what an unfinished reader holds; called when the transfer is abandoned. */
  close?(): void;
}

// BodyWriter is the consumer side of the body content contract.
export interface BodyWriter {
  put(data: Uint8Array): void;
  finish(): void;
}

// Body is a message body of any storage kind.
export interface Body {
  /** Content length when known in advance, otherwise undefined. */
  size(): number | undefined;
  /** Returns a fresh reader positioned at the start of the content. */
  reader(): BodyReader;
}

const EMPTY = new Uint8Array();
const DEFAULT_READ_CHUNK = 64 * 1024;

// EmptyBody has no content.
export class EmptyBody implements Body {
  size(): number {
    return 0;
  }

  reader(): BodyReader {
    return { next: () => ({ data: EMPTY, more: false }) };
  }
}

// BytesBody serves content already held in memory.
export class BytesBody implements Body {
  readonly data: Uint8Array;

  constructor(data: Uint8Array | string) {
    this.data = typeof data === "string" ? utf8(data) : data;
  }

  size(): number {
    return this.data.length;
  }

  reader(): BodyReader {
    let off = 0;
    const data = this.data;
    return {
      next(limit: number): BodyChunk {
        const end = limit > 0 ? Math.min(data.length, off + limit) : data.length;
        const view = data.subarray(off, end);
        off = end;
        return { data: view, more: off < data.length };
      }
    };
  }
}

// IterableBody serves generated content whose total length is usually unknown.
export class IterableBody implements Body {
  private readonly source: () => Iterator<Uint8Array | string>;
  private readonly knownSize: number | undefined;

  constructor(source: Iterable<Uint8Array | string>, opts: Readonly<{ size?: number }> = {}) {
    this.source = () => source[Symbol.iterator]();
    this.knownSize = opts.size;
  }

  size(): number | undefined {
    return this.knownSize;
  }

  reader(): BodyReader {
    const it = this.source();
    let pending: Uint8Array | null = null;
    let finished = false;

    // fill pulls the next non-empty piece into pending; false once the source is exhausted.
    const fill = (): boolean => {
      while (pending == null || pending.length === 0) {
        if (finished) return false;
        const r = it.next();
        if (r.done === true) {
          finished = true;
          pending = null;
          return false;
        }
        pending = typeof r.value === "string" ? utf8(r.value) : r.value;
      }
      return true;
    };

    return {
      next(limit: number): BodyChunk {
        if (!fill() || pending == null) return { data: EMPTY, more: false };
        const take = limit > 0 ? Math.min(limit, pending.length) : pending.length;
        const view = pending.subarray(0, take);
        pending = pending.subarray(take);
        return { data: view, more: fill() };
      },
      close(): void {
        if (finished) return;
        finished = true;
        pending = null;
        it.return?.();
      }
    };
  }
}

// FileBody streams a file from disk with synchronous reads.
export class FileBody implements Body {
  readonly path: string;
  private readonly readChunkBytes: number;

  constructor(path: string, opts: Readonly<{ readChunkBytes?: number }> = {}) {
    this.path = path;
    this.readChunkBytes = Math.max(1, opts.readChunkBytes ?? DEFAULT_READ_CHUNK);
  }

  size(): number {
    const fd = openSync(this.path, "r");
    try {
      return fstatSync(fd).size;
    } finally {
      closeSync(fd);
    }
  }

  reader(): BodyReader {
    const fd = openSync(this.path, "r");
    let remaining = fstatSync(fd).size;
    let open = true;
    const chunkBytes = this.readChunkBytes;
    const release = () => {
      if (!open) return;
      open = false;
      closeSync(fd);
    };
    return {
      next(limit: number): BodyChunk {
        if (remaining === 0) {
          release();
          return { data: EMPTY, more: false };
        }
        const want = Math.min(remaining, limit > 0 ? Math.min(limit, chunkBytes) : chunkBytes);
        const buf = new Uint8Array(want);
        let n: number;
        try {
          n = readSync(fd, buf, 0, want, null);
        } catch (e) {
          release();
          throw e;
        }
        if (n === 0) {
          release();
          throw new Error(`unexpected end of file ${remaining} bytes early`);
        }
        remaining -= n;
        if (remaining === 0) release();
        return { data: buf.subarray(0, n), more: remaining > 0 };
      },
      close: release
    };
  }
}

// BufferSink collects incoming views into memory.
export class BufferSink implements BodyWriter {
  private readonly parts: Uint8Array[] = [];
  private bytes = 0;
  private finished = false;

  put(data: Uint8Array): void {
    if (this.finished) throw new Error("sink already finished");
    if (data.length === 0) return;
    this.parts.push(data.slice());
    this.bytes += data.length;
  }

  finish(): void {
    this.finished = true;
  }

  get length(): number {
    return this.bytes;
  }

  isFinished(): boolean {
    return this.finished;
  }

  toBytes(): Uint8Array {
    return concatBytes(this.parts);
  }

  toText(): string {
    return new TextDecoder().decode(this.toBytes());
  }
}

// FileSink writes incoming views to a file, truncating it first.
export class FileSink implements BodyWriter {
  private fd: number | null;

  constructor(path: string) {
    this.fd = openSync(path, "w");
  }

  put(data: Uint8Array): void {
    if (this.fd == null) throw new Error("sink already finished");
    let off = 0;
    while (off < data.length) off += writeSync(this.fd, data, off, data.length - off);
  }

  finish(): void {
    if (this.fd == null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
