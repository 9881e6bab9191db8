import { Serializer } from "./serializer.js";
import type { Message } from "./message.js";
import { DEFAULT_WRITE_LIMIT, normalizeLimit } from "../defaults.js";
import { normalizeObserver, nowSeconds, type WireObserver, type WireObserverLike } from "../observability/observer.js";
import { concatBytes, totalLength } from "../utils/bin.js";
import { asTransportError, WireError } from "../utils/errors.js";

// SyncWriteStream is a blocking, bounded write primitive.
export type SyncWriteStream = {
  /** Writes a prefix of `buffers` and returns how many bytes were accepted (at least one). */
  writeSome(buffers: readonly Uint8Array[]): number;
};

// AsyncWriteStream is the suspend/resume form of SyncWriteStream.
export type AsyncWriteStream = {
  writeSome(buffers: readonly Uint8Array[]): Promise<number>;
};

export type WriteOptions = Readonly<{
  /** Maximum bytes offered per transport call (0 = unbounded). */
  limit?: number;
  /** Optional observer for completed message writes. */
  observer?: WireObserverLike;
}>;

type Resolved = Readonly<{ limit: number; observer: WireObserver }>;

function resolveOptions(opts: WriteOptions): Resolved {
  return {
    limit: normalizeLimit("limit", opts.limit, DEFAULT_WRITE_LIMIT),
    observer: normalizeObserver(opts.observer)
  };
}

// nextBuffers asks the serializer for output until it yields bytes or finishes; null when done.
function nextBuffers(sr: Serializer, limit: number): Uint8Array[] | null {
  while (!sr.isDone()) {
    const { buffers } = sr.produce(limit);
    if (totalLength(buffers) > 0) return buffers;
  }
  return null;
}

// accept validates a transport result and advances the serializer.
function accept(sr: Serializer, buffers: readonly Uint8Array[], n: number): number {
  const offered = totalLength(buffers);
  if (!Number.isSafeInteger(n) || n <= 0 || n > offered) {
    const err = new WireError({ code: "transport_error", stage: "write", message: `transport reported ${n} of ${offered} bytes written` });
    sr.abandon(err);
    throw err;
  }
  sr.consume(n);
  return n;
}

function failed(sr: Serializer, e: unknown): WireError {
  const err = asTransportError(e, "write");
  sr.abandon(err);
  return err;
}

// writeSomeSync performs one bounded transport write; returns 0 when the serializer is already done.
export function writeSomeSync(stream: SyncWriteStream, sr: Serializer, opts: WriteOptions = {}): number {
  return stepSync(stream, sr, resolveOptions(opts).limit);
}

function stepSync(stream: SyncWriteStream, sr: Serializer, limit: number): number {
  const buffers = nextBuffers(sr, limit);
  if (buffers == null) return 0;
  let n: number;
  try {
    n = stream.writeSome(buffers);
  } catch (e) {
    throw failed(sr, e);
  }
  return accept(sr, buffers, n);
}

// writeHeaderSync writes until the header is done, with split forced on for the duration.
export function writeHeaderSync(stream: SyncWriteStream, sr: Serializer, opts: WriteOptions = {}): number {
  const { limit } = resolveOptions(opts);
  const prev = sr.getSplit();
  sr.split(true);
  try {
    let total = 0;
    while (!sr.isHeaderDone()) total += stepSync(stream, sr, limit);
    return total;
  } finally {
    sr.split(prev);
  }
}

// writeSync writes until the whole message is done.
export function writeSync(stream: SyncWriteStream, sr: Serializer, opts: WriteOptions = {}): number {
  const { limit, observer } = resolveOptions(opts);
  const start = nowSeconds();
  let total = 0;
  try {
    while (!sr.isDone()) total += stepSync(stream, sr, limit);
  } catch (e) {
    observer.onMessageWrite("fail", total, nowSeconds() - start);
    throw e;
  }
  observer.onMessageWrite("ok", total, nowSeconds() - start);
  return total;
}

// writeMessageSync serializes msg from scratch; throws end_of_stream when the connection must close afterwards.
export function writeMessageSync(stream: SyncWriteStream, msg: Message, opts: WriteOptions = {}): number {
  const total = writeSync(stream, new Serializer(msg), opts);
  if (msg.needEof()) throw endOfStream(total);
  return total;
}

// writeSome is the suspend/resume form of writeSomeSync.
//
// Like every async operation here it settles through the promise job queue, never inside the call.
export async function writeSome(stream: AsyncWriteStream, sr: Serializer, opts: WriteOptions = {}): Promise<number> {
  return await stepAsync(stream, sr, resolveOptions(opts).limit);
}

async function stepAsync(stream: AsyncWriteStream, sr: Serializer, limit: number): Promise<number> {
  const buffers = nextBuffers(sr, limit);
  if (buffers == null) return 0;
  let n: number;
  try {
    n = await stream.writeSome(buffers);
  } catch (e) {
    throw failed(sr, e);
  }
  return accept(sr, buffers, n);
}

export async function writeHeader(stream: AsyncWriteStream, sr: Serializer, opts: WriteOptions = {}): Promise<number> {
  const { limit } = resolveOptions(opts);
  const prev = sr.getSplit();
  sr.split(true);
  try {
    let total = 0;
    while (!sr.isHeaderDone()) total += await stepAsync(stream, sr, limit);
    return total;
  } finally {
    sr.split(prev);
  }
}

export async function write(stream: AsyncWriteStream, sr: Serializer, opts: WriteOptions = {}): Promise<number> {
  const { limit, observer } = resolveOptions(opts);
  const start = nowSeconds();
  let total = 0;
  try {
    while (!sr.isDone()) total += await stepAsync(stream, sr, limit);
  } catch (e) {
    observer.onMessageWrite("fail", total, nowSeconds() - start);
    throw e;
  }
  observer.onMessageWrite("ok", total, nowSeconds() - start);
  return total;
}

export async function writeMessage(stream: AsyncWriteStream, msg: Message, opts: WriteOptions = {}): Promise<number> {
  const total = await write(stream, new Serializer(msg), opts);
  if (msg.needEof()) throw endOfStream(total);
  return total;
}

function endOfStream(bytes: number): WireError {
  return new WireError({
    code: "end_of_stream",
    stage: "write",
    message: `message written (${bytes} bytes); the connection must be closed`
  });
}

// serializeMessage renders a whole message into one buffer; close semantics are not reported.
export function serializeMessage(msg: Message): Uint8Array {
  const parts: Uint8Array[] = [];
  const sink: SyncWriteStream = {
    writeSome(buffers) {
      for (const b of buffers) parts.push(b.slice());
      return totalLength(buffers);
    }
  };
  writeSync(sink, new Serializer(msg), { limit: 0 });
  return concatBytes(parts);
}
