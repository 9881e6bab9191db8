import { writevSync } from "node:fs";
import type { Writable } from "node:stream";

import type { AsyncWriteStream, SyncWriteStream } from "../http/write.js";
import { totalLength } from "../utils/bin.js";

// FdWriteStream is a blocking write stream over a file descriptor.
export class FdWriteStream implements SyncWriteStream {
  constructor(readonly fd: number) {}

  writeSome(buffers: readonly Uint8Array[]): number {
    return writevSync(this.fd, buffers);
  }
}

// SocketWriteStream writes buffer sequences to a Node Writable, resolving once they are flushed.
export class SocketWriteStream implements AsyncWriteStream {
  private error: Error | null = null;
  private readonly pending = new Set<(err: Error) => void>();

  constructor(private readonly stream: Writable) {
    // A failed write also surfaces as an 'error' event; it rejects what is in flight.
    stream.on("error", (err: Error) => {
      if (this.error == null) this.error = err;
      const rejects = [...this.pending];
      this.pending.clear();
      for (const reject of rejects) reject(err);
    });
  }

  writeSome(buffers: readonly Uint8Array[]): Promise<number> {
    if (this.error != null) return Promise.reject(this.error);
    const n = totalLength(buffers);
    if (this.stream.destroyed || this.stream.writableEnded) return Promise.reject(new Error("stream closed"));
    const parts = buffers.filter((b) => b.length > 0);
    if (parts.length === 0) return Promise.resolve(0);
    return new Promise<number>((resolve, reject) => {
      this.pending.add(reject);
      this.stream.cork();
      parts.forEach((b, i) => {
        if (i < parts.length - 1) {
          this.stream.write(b);
          return;
        }
        this.stream.write(b, (err) => {
          this.pending.delete(reject);
          if (err != null) reject(err);
          else resolve(n);
        });
      });
      this.stream.uncork();
    });
  }
}
