import type { ByteReader } from "./byteReader.js";
import {
  CLOSE_INVALID_PAYLOAD,
  CLOSE_PROTOCOL_ERROR,
  CLOSE_TOO_BIG,
  isControlOpcode,
  isValidCloseCode,
  OP_BINARY,
  OP_CLOSE,
  OP_CONTINUATION,
  OP_PING,
  OP_PONG,
  OP_TEXT
} from "./constants.js";
import { MAX_CONTROL_PAYLOAD } from "../defaults.js";
import { readU16be, readU64be, u16be, u64be, utf8 } from "../utils/bin.js";

// FrameHeader is the decoded fixed part of one frame.
export type FrameHeader = Readonly<{
  fin: boolean;
  /** RSV1-3 bits, unshifted (0 when no extension is negotiated). */
  rsv: number;
  opcode: number;
  maskKey: Uint8Array | null;
  length: number;
  /** The length field used more bytes than needed. */
  overlongLength: boolean;
  /** The most significant bit of a 64-bit length was set. */
  lengthHighBit: boolean;
}>;

// Violation describes a peer protocol error and the close code it maps to.
export type Violation = Readonly<{
  closeCode: number;
  message: string;
}>;

export type OutgoingFrame = Readonly<{
  fin: boolean;
  opcode: number;
  payload: Uint8Array;
  /** Four-byte masking key; client frames must carry one. */
  maskKey?: Uint8Array;
}>;

// encodeFrame renders a frame, masking a copy of the payload when a key is given.
export function encodeFrame(f: OutgoingFrame): Uint8Array {
  const n = f.payload.length;
  const lenBytes = n < 126 ? 0 : n <= 0xffff ? 2 : 8;
  const maskBytes = f.maskKey != null ? 4 : 0;
  const out = new Uint8Array(2 + lenBytes + maskBytes + n);
  out[0] = (f.fin ? 0x80 : 0) | (f.opcode & 0x0f);
  const maskBit = f.maskKey != null ? 0x80 : 0;
  if (lenBytes === 0) {
    out[1] = maskBit | n;
  } else if (lenBytes === 2) {
    out[1] = maskBit | 126;
    out.set(u16be(n), 2);
  } else {
    out[1] = maskBit | 127;
    out.set(u64be(n), 2);
  }
  let off = 2 + lenBytes;
  if (f.maskKey != null) {
    out.set(f.maskKey.subarray(0, 4), off);
    off += 4;
  }
  out.set(f.payload, off);
  if (f.maskKey != null) applyMask(out.subarray(off), f.maskKey, 0);
  return out;
}

// readFrameHeader reads the fixed header, extended length and masking key of the next frame.
export async function readFrameHeader(r: ByteReader): Promise<FrameHeader> {
  const h = await r.readExactly(2);
  const b0 = h[0]!;
  const b1 = h[1]!;
  let length = b1 & 0x7f;
  let overlongLength = false;
  let lengthHighBit = false;
  if (length === 126) {
    length = readU16be(await r.readExactly(2), 0);
    overlongLength = length < 126;
  } else if (length === 127) {
    const big = readU64be(await r.readExactly(8), 0);
    lengthHighBit = big >= 1n << 63n;
    // Lengths past 2^53 cannot be represented; they are reported as unbounded.
    length = big > BigInt(Number.MAX_SAFE_INTEGER) ? Number.POSITIVE_INFINITY : Number(big);
    overlongLength = length <= 0xffff;
  }
  const maskKey = (b1 & 0x80) !== 0 ? await r.readExactly(4) : null;
  return {
    fin: (b0 & 0x80) !== 0,
    rsv: b0 & 0x70,
    opcode: b0 & 0x0f,
    maskKey,
    length,
    overlongLength,
    lengthHighBit
  };
}

export type FrameContext = Readonly<{
  /** Incoming frames must be masked (server) or unmasked (client). */
  expectMasked: boolean;
  /** A fragmented data message is in progress. */
  inMessage: boolean;
}>;

// checkFrameHeader validates a header against the framing rules; null when acceptable.
export function checkFrameHeader(h: FrameHeader, ctx: FrameContext): Violation | null {
  const bad = (message: string): Violation => ({ closeCode: CLOSE_PROTOCOL_ERROR, message });
  if (h.rsv !== 0) return bad("reserved bits set");
  if (h.overlongLength) return bad("non-minimal length encoding");
  if (h.lengthHighBit) return bad("length with most significant bit set");
  if ((h.maskKey != null) !== ctx.expectMasked) return bad(ctx.expectMasked ? "unmasked frame" : "masked frame");
  if (!Number.isFinite(h.length)) return { closeCode: CLOSE_TOO_BIG, message: "frame length out of range" };

  switch (h.opcode) {
    case OP_PING:
    case OP_PONG:
    case OP_CLOSE:
      if (!h.fin) return bad("fragmented control frame");
      if (h.length > MAX_CONTROL_PAYLOAD) return bad("control frame payload too big");
      return null;
    case OP_CONTINUATION:
      return ctx.inMessage ? null : bad("unexpected continuation frame");
    case OP_TEXT:
    case OP_BINARY:
      return ctx.inMessage ? bad("expected continuation frame") : null;
    default:
      return bad(isControlOpcode(h.opcode) ? `unknown control opcode ${h.opcode}` : `unknown opcode ${h.opcode}`);
  }
}

// applyMask XORs data in place with the key, starting at key position `offset`.
export function applyMask(data: Uint8Array, key: Uint8Array, offset: number): void {
  for (let i = 0; i < data.length; i++) data[i] = data[i]! ^ key[(offset + i) & 3]!;
}

export type ClosePayload = Readonly<{
  /** Absent when the peer sent an empty close frame. */
  code?: number;
  reason: string;
}>;

// encodeClosePayload renders a status code and UTF-8 reason.
export function encodeClosePayload(code: number, reason: string): Uint8Array {
  const r = utf8(reason);
  const out = new Uint8Array(2 + r.length);
  out.set(u16be(code), 0);
  out.set(r, 2);
  return out;
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

// decodeClosePayload parses a received close payload, or reports why it is invalid.
export function decodeClosePayload(payload: Uint8Array): ClosePayload | Violation {
  if (payload.length === 0) return { reason: "" };
  if (payload.length === 1) return { closeCode: CLOSE_PROTOCOL_ERROR, message: "close payload too short" };
  const code = readU16be(payload, 0);
  if (!isValidCloseCode(code)) return { closeCode: CLOSE_PROTOCOL_ERROR, message: `invalid close code ${code}` };
  let reason: string;
  try {
    reason = strictUtf8.decode(payload.subarray(2));
  } catch {
    return { closeCode: CLOSE_INVALID_PAYLOAD, message: "close reason is not valid UTF-8" };
  }
  return { code, reason };
}

export function isViolation(v: ClosePayload | Violation): v is Violation {
  return "closeCode" in v;
}
