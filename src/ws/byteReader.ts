import { StreamEOFError } from "../utils/errors.js";

// ByteReader buffers incoming transport chunks and serves exact or partial reads.
export class ByteReader {
  private readonly chunks: Uint8Array[] = [];
  private chunkHead = 0;
  private headOff = 0;
  private buffered = 0;

  constructor(private readonly readChunk: () => Promise<Uint8Array | null>) {}

  // readExactly reads n bytes or throws StreamEOFError when the stream ends first.
  async readExactly(n: number): Promise<Uint8Array> {
    if (!Number.isSafeInteger(n) || n < 0) throw new Error("invalid length");
    while (this.buffered < n) await this.fill();
    return this.take(n);
  }

  // readSome returns between 1 and max bytes, waiting only when nothing is buffered.
  async readSome(max: number): Promise<Uint8Array> {
    if (!Number.isSafeInteger(max) || max <= 0) throw new Error("invalid length");
    if (this.buffered === 0) await this.fill();
    return this.take(Math.min(max, this.buffered));
  }

  // bufferedBytes returns the number of bytes currently buffered.
  bufferedBytes(): number {
    return this.buffered;
  }

  private async fill(): Promise<void> {
    for (;;) {
      const chunk = await this.readChunk();
      if (chunk == null) throw new StreamEOFError();
      if (chunk.length === 0) continue;
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      return;
    }
  }

  // take copies n buffered bytes; the caller owns the result.
  private take(n: number): Uint8Array {
    const out = new Uint8Array(n);
    let outOff = 0;
    while (outOff < n) {
      const head = this.chunks[this.chunkHead]!;
      const avail = head.length - this.headOff;
      const take = Math.min(avail, n - outOff);
      out.set(head.subarray(this.headOff, this.headOff + take), outOff);
      outOff += take;
      this.headOff += take;
      this.buffered -= take;
      if (this.headOff === head.length) {
        this.chunkHead++;
        this.headOff = 0;
        if (this.chunkHead > 1024 && this.chunkHead * 2 > this.chunks.length) {
          this.chunks.splice(0, this.chunkHead);
          this.chunkHead = 0;
        }
      }
    }
    return out;
  }
}
