import { TextDecoder } from "node:util";
import { ByteReader } from "./byteReader.js";
import {
  CLOSE_INVALID_PAYLOAD,
  CLOSE_NORMAL,
  CLOSE_TOO_BIG,
  isControlOpcode,
  isValidCloseCode,
  OP_BINARY,
  OP_CLOSE,
  OP_CONTINUATION,
  OP_PING,
  OP_PONG,
  OP_TEXT,
  READ_PIECE_BYTES
} from "./constants.js";
import {
  applyMask,
  checkFrameHeader,
  decodeClosePayload,
  encodeClosePayload,
  encodeFrame,
  isViolation,
  readFrameHeader,
  type FrameHeader,
  type Violation
} from "./frame.js";
import { BufferSink, type BodyWriter } from "../http/body.js";
import { DEFAULT_READ_MESSAGE_MAX, DEFAULT_WRITE_BUFFER_BYTES, MAX_CONTROL_PAYLOAD, normalizeLimit } from "../defaults.js";
import {
  normalizeObserver,
  type ControlKind,
  type ErrorReason,
  type WireObserver,
  type WireObserverLike
} from "../observability/observer.js";
import { utf8 } from "../utils/bin.js";
import { asTransportError, isConnectionClosed, StreamEOFError, WireError, type WireStage } from "../utils/errors.js";
import { randomBytes } from "../utils/random.js";

export type Role = "client" | "server";

// ByteDuplex is the full-duplex byte transport under a framed connection.
export type ByteDuplex = {
  /** Resolves with the next chunk, or null at end of stream. */
  read(): Promise<Uint8Array | null>;
  /** Resolves once the whole chunk has been handed to the transport. */
  write(chunk: Uint8Array): Promise<void>;
  /** Closes the transport and unblocks pending reads and writes. */
  close(): void;
};

// ControlCallback observes control frames absorbed by a read.
export type ControlCallback = (kind: ControlKind, payload: Uint8Array) => void;

export type WebSocketOptions = Readonly<{
  role: Role;
  /** Split outgoing messages into frames of at most writeBufferBytes (default true). */
  autoFragment?: boolean;
  writeBufferBytes?: number;
  /** Largest accepted incoming message; 0 means unlimited. */
  readMessageMax?: number;
  /** Send Uint8Array messages as binary rather than text (default false). */
  binary?: boolean;
  observer?: WireObserverLike;
  controlCallback?: ControlCallback;
}>;

export type CloseState = "active" | "closeSent" | "closeReceived" | "closed";

export type IncomingMessage = Readonly<{
  binary: boolean;
  data: Uint8Array;
}>;

export type ReadInfo = Readonly<{
  binary: boolean;
  /** Payload bytes delivered to the sink. */
  bytes: number;
}>;

type SendReq = {
  frame: Uint8Array;
  opcode: number;
  payloadBytes: number;
  /** Control frames queue ahead of data frames. */
  control: boolean;
  resolve: () => void;
  reject: (e: unknown) => void;
};

const EMPTY = new Uint8Array();

const DISCARD: BodyWriter = {
  put: () => {},
  finish: () => {}
};

const INVALID_UTF8: Violation = { closeCode: CLOSE_INVALID_PAYLOAD, message: "invalid UTF-8 in text message" };

function closedError(stage: WireStage): WireError {
  return new WireError({ code: "connection_closed", stage, message: "connection closed" });
}

function busyError(stage: WireStage, what: string): WireError {
  return new WireError({ code: "invalid_state", stage, message: `${what} is already in progress` });
}

// WebSocketConnection frames messages over a ByteDuplex and runs the close handshake.
//
// Reads absorb ping, pong and close frames; callers only see data messages. Caller writes
// and automatic replies share one writer slot so exactly one transport write is in flight.
export class WebSocketConnection {
  private readonly transport: ByteDuplex;
  private readonly reader: ByteReader;
  private readonly role: Role;
  private readonly observer: WireObserver;
  private readonly readMessageMax: number;

  private fragmenting: boolean;
  private frameBytes: number;
  private binaryMode: boolean;
  private controlCallback: ControlCallback | undefined;

  // Close handshake flags; closeSent is set once our close frame has been written.
  private closeQueued = false;
  private closeSent = false;
  private closeReceived = false;
  // Write of our close frame, once queued.
  private closeFrame: Promise<void> | null = null;
  // close() is reading and discarding frames itself.
  private draining = false;
  // The transport has been closed.
  private tornDown = false;
  // Sticky connection-fatal error.
  private failure: WireError | null = null;
  // Shared completion of the close handshake.
  private closing: Promise<void> | null = null;

  // Writer slot.
  private sendQueue: SendReq[] = [];
  private writing = false;
  private messageWriteBusy = false;
  // A writeSome() message is waiting for its final frame.
  private messageOpen = false;

  // Settles when the read in flight finishes; null when no read is in flight.
  private readIdle: Promise<void> | null = null;

  constructor(transport: ByteDuplex, opts: WebSocketOptions) {
    if (opts.role !== "client" && opts.role !== "server") {
      throw new WireError({ code: "invalid_input", stage: "validate", message: "role must be client or server" });
    }
    this.transport = transport;
    this.reader = new ByteReader(() => this.transport.read());
    this.role = opts.role;
    this.observer = normalizeObserver(opts.observer);
    this.readMessageMax = normalizeLimit("readMessageMax", opts.readMessageMax, DEFAULT_READ_MESSAGE_MAX);
    this.fragmenting = opts.autoFragment ?? true;
    this.frameBytes = normalizeLimit("writeBufferBytes", opts.writeBufferBytes, DEFAULT_WRITE_BUFFER_BYTES);
    this.binaryMode = opts.binary ?? false;
    this.controlCallback = opts.controlCallback;
  }

  get state(): CloseState {
    if (this.tornDown || (this.closeSent && this.closeReceived)) return "closed";
    if (this.closeSent) return "closeSent";
    if (this.closeReceived) return "closeReceived";
    return "active";
  }

  // binary selects the opcode for Uint8Array messages.
  binary(value: boolean): void {
    this.binaryMode = value;
  }

  isBinary(): boolean {
    return this.binaryMode;
  }

  autoFragment(value: boolean): void {
    this.fragmenting = value;
  }

  // writeBufferBytes sets the largest payload per outgoing data frame (0 disables splitting).
  writeBufferBytes(bytes: number): void {
    this.frameBytes = normalizeLimit("writeBufferBytes", bytes, DEFAULT_WRITE_BUFFER_BYTES);
  }

  setControlCallback(cb: ControlCallback | undefined): void {
    this.controlCallback = cb;
  }

  // read returns the next whole data message.
  async read(): Promise<IncomingMessage> {
    const sink = new BufferSink();
    const info = await this.readInto(sink);
    return { binary: info.binary, data: sink.toBytes() };
  }

  // readInto streams the next data message into sink and calls finish() once at its end.
  async readInto(sink: BodyWriter): Promise<ReadInfo> {
    if (this.failure != null) throw this.failure;
    if (this.draining) throw closedError("read");
    return await this.readExclusive(sink);
  }

  private async readExclusive(sink: BodyWriter): Promise<ReadInfo> {
    if (this.failure != null) throw this.failure;
    if (this.tornDown || this.closeReceived) throw closedError("read");
    if (this.readIdle != null) throw busyError("read", "a read");
    let release = () => {};
    this.readIdle = new Promise<void>((resolve) => {
      release = resolve;
    });
    try {
      return await this.readMessage(sink);
    } finally {
      this.readIdle = null;
      release();
    }
  }

  // write sends one whole data message, fragmenting it when enabled.
  async write(data: Uint8Array | string): Promise<void> {
    this.checkWritable("write");
    if (this.messageWriteBusy) throw busyError("write", "a write");
    if (this.messageOpen) {
      throw new WireError({ code: "invalid_state", stage: "write", message: "a fragmented message is in progress" });
    }
    const payload = typeof data === "string" ? utf8(data) : data;
    this.messageWriteBusy = true;
    try {
      await this.sendData(this.opcodeFor(data), payload, true);
    } finally {
      this.messageWriteBusy = false;
    }
  }

  // writeSome sends part of a message; fin marks its last part.
  async writeSome(data: Uint8Array | string, fin: boolean): Promise<void> {
    this.checkWritable("write");
    if (this.messageWriteBusy) throw busyError("write", "a write");
    const payload = typeof data === "string" ? utf8(data) : data;
    const opcode = this.messageOpen ? OP_CONTINUATION : this.opcodeFor(data);
    this.messageWriteBusy = true;
    try {
      await this.sendData(opcode, payload, fin);
      this.messageOpen = !fin;
    } finally {
      this.messageWriteBusy = false;
    }
  }

  async ping(payload: Uint8Array | string = EMPTY): Promise<void> {
    await this.sendControl(OP_PING, "ping", payload);
  }

  async pong(payload: Uint8Array | string = EMPTY): Promise<void> {
    await this.sendControl(OP_PONG, "pong", payload);
  }

  // close runs the close handshake; repeated calls wait on the same completion.
  async close(code: number = CLOSE_NORMAL, reason = ""): Promise<void> {
    if (this.closing != null) return await this.closing;
    if (this.failure != null) throw this.failure;
    if (this.tornDown) return;
    if (!isValidCloseCode(code)) {
      throw new WireError({ code: "invalid_input", stage: "close", message: `invalid close code ${code}` });
    }
    const payload = encodeClosePayload(code, reason);
    if (payload.length > MAX_CONTROL_PAYLOAD) {
      throw new WireError({ code: "invalid_input", stage: "close", message: "close reason too long" });
    }
    this.closing = this.runClose(code, payload);
    return await this.closing;
  }

  private opcodeFor(data: Uint8Array | string): number {
    if (typeof data === "string") return OP_TEXT;
    return this.binaryMode ? OP_BINARY : OP_TEXT;
  }

  private checkWritable(stage: WireStage): void {
    if (this.failure != null) throw this.failure;
    if (this.tornDown || this.closeQueued || this.closeReceived) throw closedError(stage);
  }

  private async sendData(opcode: number, payload: Uint8Array, fin: boolean): Promise<void> {
    const max = this.fragmenting && this.frameBytes > 0 ? this.frameBytes : Math.max(1, payload.length);
    let op = opcode;
    let off = 0;
    do {
      // The close handshake may start between two fragments.
      if (off > 0) this.checkWritable("write");
      const end = Math.min(payload.length, off + max);
      await this.send(op, fin && end === payload.length, payload.subarray(off, end), false);
      op = OP_CONTINUATION;
      off = end;
    } while (off < payload.length);
  }

  private async sendControl(opcode: number, kind: ControlKind, payload: Uint8Array | string): Promise<void> {
    this.checkWritable("control");
    const p = typeof payload === "string" ? utf8(payload) : payload;
    if (p.length > MAX_CONTROL_PAYLOAD) {
      throw new WireError({ code: "invalid_input", stage: "control", message: `control payload exceeds ${MAX_CONTROL_PAYLOAD} bytes` });
    }
    this.observer.onControl(kind, "send");
    await this.send(opcode, true, p, true);
  }

  // send queues one frame on the writer slot.
  private send(opcode: number, fin: boolean, payload: Uint8Array, control: boolean): Promise<void> {
    if (this.failure != null) return Promise.reject(this.failure);
    if (this.tornDown) return Promise.reject(closedError("write"));
    const frame = encodeFrame(this.role === "client" ? { fin, opcode, payload, maskKey: randomBytes(4) } : { fin, opcode, payload });
    // Nothing but control frames may follow a close frame.
    if (opcode === OP_CLOSE) this.rejectQueued(closedError("write"), (r) => !r.control);
    return new Promise<void>((resolve, reject) => {
      const req: SendReq = { frame, opcode, payloadBytes: payload.length, control, resolve, reject };
      const firstData = control ? this.sendQueue.findIndex((r) => !r.control) : -1;
      if (firstData < 0) this.sendQueue.push(req);
      else this.sendQueue.splice(firstData, 0, req);
      this.pump();
    });
  }

  // pump starts the next queued write when the slot is free.
  private pump(): void {
    if (this.writing) return;
    const req = this.sendQueue.shift();
    if (req == null) return;
    this.writing = true;
    let p: Promise<void>;
    try {
      p = this.transport.write(req.frame);
    } catch (e) {
      p = Promise.reject(e);
    }
    void p.then(
      () => {
        this.writing = false;
        this.observer.onFrameWrite(req.opcode, req.payloadBytes);
        this.pump();
        req.resolve();
      },
      (e: unknown) => {
        this.writing = false;
        if (this.tornDown && this.failure == null) {
          req.reject(closedError("write"));
          this.pump();
          return;
        }
        const err = this.failure ?? asTransportError(e, "write");
        this.fail(err, "transport_error");
        req.reject(err);
      }
    );
  }

  private rejectQueued(err: unknown, match: (r: SendReq) => boolean = () => true): void {
    const keep: SendReq[] = [];
    for (const r of this.sendQueue) {
      if (match(r)) r.reject(err);
      else keep.push(r);
    }
    this.sendQueue = keep;
  }

  // fail records a connection-fatal error and closes the transport.
  private fail(err: WireError, reason: ErrorReason): void {
    if (this.failure != null) return;
    this.failure = err;
    this.observer.onError(reason);
    this.observer.onClose("error");
    this.rejectQueued(err);
    this.teardown();
  }

  private teardown(): void {
    if (this.tornDown) return;
    this.tornDown = true;
    this.rejectQueued(closedError("close"));
    this.transport.close();
  }

  // queueClose puts our close frame on the writer slot; closeSent follows its write.
  private queueClose(payload: Uint8Array): Promise<void> {
    this.closeQueued = true;
    this.observer.onControl("close", "send");
    const frame = this.send(OP_CLOSE, true, payload, true).then(() => {
      this.closeSent = true;
    });
    this.closeFrame = frame;
    return frame;
  }

  private async runClose(code: number, payload: Uint8Array): Promise<void> {
    await this.queueClose(payload);
    while (!this.closeReceived && !this.tornDown) {
      if (this.readIdle != null) {
        // The caller's read observes the peer's close frame.
        await this.readIdle;
        continue;
      }
      this.draining = true;
      try {
        await this.readExclusive(DISCARD);
      } catch (e) {
        if (isConnectionClosed(e)) break;
        throw e;
      } finally {
        this.draining = false;
      }
    }
    if (this.failure != null) throw this.failure;
    this.teardown();
    this.observer.onClose("local", code);
  }

  private async echoClose(code: number): Promise<void> {
    await this.queueClose(encodeClosePayload(code, ""));
    this.teardown();
    this.observer.onClose("peer", code);
  }

  private async readMessage(sink: BodyWriter): Promise<ReadInfo> {
    let opcode: number | null = null;
    let decoder: TextDecoder | null = null;
    let bytes = 0;
    for (;;) {
      const h = await this.guardRead(() => readFrameHeader(this.reader));
      const violation = checkFrameHeader(h, { expectMasked: this.role === "server", inMessage: opcode != null });
      if (violation != null) return await this.failProtocol(violation, "protocol_error");

      if (isControlOpcode(h.opcode)) {
        const payload = await this.readControlPayload(h);
        this.observer.onFrameRead(h.opcode, payload.length);
        await this.handleControl(h.opcode, payload);
        continue;
      }

      if (opcode == null) {
        opcode = h.opcode;
        if (opcode === OP_TEXT) decoder = new TextDecoder("utf-8", { fatal: true });
      }
      if (this.readMessageMax > 0 && bytes + h.length > this.readMessageMax) {
        return await this.failProtocol(
          { closeCode: CLOSE_TOO_BIG, message: `message exceeds ${this.readMessageMax} bytes` },
          "message_too_big"
        );
      }
      let off = 0;
      while (off < h.length) {
        const piece = await this.guardRead(() => this.reader.readSome(Math.min(h.length - off, READ_PIECE_BYTES)));
        if (h.maskKey != null) applyMask(piece, h.maskKey, off);
        off += piece.length;
        if (decoder != null && !validUtf8(decoder, piece, false)) return await this.failProtocol(INVALID_UTF8, "invalid_utf8");
        this.toSink(() => sink.put(piece));
      }
      bytes += h.length;
      this.observer.onFrameRead(h.opcode, h.length);

      if (h.fin) {
        if (decoder != null && !validUtf8(decoder, EMPTY, true)) return await this.failProtocol(INVALID_UTF8, "invalid_utf8");
        this.toSink(() => sink.finish());
        return { binary: opcode === OP_BINARY, bytes };
      }
    }
  }

  private async readControlPayload(h: FrameHeader): Promise<Uint8Array> {
    const payload = await this.guardRead(() => this.reader.readExactly(h.length));
    if (h.maskKey != null) applyMask(payload, h.maskKey, 0);
    return payload;
  }

  private async handleControl(opcode: number, payload: Uint8Array): Promise<void> {
    if (opcode === OP_PING) {
      this.observer.onControl("ping", "recv");
      this.observer.onControl("pong", "send");
      // The read does not wait for the reply; a failed write is recorded by the writer slot.
      const reply = this.send(OP_PONG, true, payload, true);
      void reply.catch((e: unknown) => {
        if (!isConnectionClosed(e)) this.observer.onError("auto_reply_failed");
      });
      const err = this.notifyControl("ping", payload);
      if (err != null) {
        await Promise.allSettled([reply]);
        this.fail(err, "body_error");
        throw this.failure ?? err;
      }
      return;
    }
    if (opcode === OP_PONG) {
      this.observer.onControl("pong", "recv");
      const err = this.notifyControl("pong", payload);
      if (err != null) {
        this.fail(err, "body_error");
        throw err;
      }
      return;
    }

    const cp = decodeClosePayload(payload);
    if (isViolation(cp)) return await this.failProtocol(cp, "protocol_error");
    this.closeReceived = true;
    this.observer.onControl("close", "recv");
    const err = this.notifyControl("close", payload);
    if (!this.closeQueued) {
      this.closing = this.echoClose(cp.code ?? CLOSE_NORMAL);
      await this.closing;
    } else if (this.closeFrame != null) {
      // Our own close frame may still be queued behind a data frame.
      await Promise.allSettled([this.closeFrame]);
      if (this.failure != null) throw this.failure;
    }
    this.teardown();
    if (err != null) {
      this.fail(err, "body_error");
      throw err;
    }
    throw closedError("read");
  }

  // notifyControl runs the control callback; a throwing callback is a body error.
  private notifyControl(kind: ControlKind, payload: Uint8Array): WireError | null {
    const cb = this.controlCallback;
    if (cb == null) return null;
    try {
      cb(kind, payload);
      return null;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return new WireError({ code: "body_error", stage: "read", message, cause: e });
    }
  }

  // failProtocol reports a peer protocol violation, sending the matching close frame first.
  private async failProtocol(v: Violation, reason: ErrorReason): Promise<never> {
    const err = new WireError({ code: "protocol_error", stage: "read", message: v.message });
    if (this.failure == null && !this.tornDown) {
      // A failed write is recorded by the writer slot; the reader reports the protocol error.
      await Promise.allSettled([this.closeFrame ?? this.queueClose(encodeClosePayload(v.closeCode, ""))]);
    }
    this.fail(err, reason);
    throw err;
  }

  private async guardRead<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (this.failure != null) throw this.failure;
      if (e instanceof StreamEOFError && this.closeFrame != null) {
        // The peer closed the transport after our close frame.
        await Promise.allSettled([this.closeFrame]);
        if (this.failure != null) throw this.failure;
        this.closeReceived = true;
        this.teardown();
        throw closedError("read");
      }
      if (this.tornDown) throw closedError("read");
      const err =
        e instanceof StreamEOFError
          ? new WireError({ code: "transport_error", stage: "read", message: "unexpected end of stream", cause: e })
          : asTransportError(e, "read");
      this.fail(err, "transport_error");
      throw err;
    }
  }

  private toSink(fn: () => void): void {
    try {
      fn();
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      const err = new WireError({ code: "body_error", stage: "read", message, cause: e });
      this.fail(err, "body_error");
      throw err;
    }
  }
}

function validUtf8(decoder: TextDecoder, piece: Uint8Array, final: boolean): boolean {
  try {
    decoder.decode(piece, { stream: !final });
    return true;
  } catch {
    return false;
  }
}
