const te = new TextEncoder();

// u16be encodes a number into 2 bytes big-endian.
export function u16be(n: number): Uint8Array {
  const b = new Uint8Array(2);
  const v = n >>> 0;
  b[0] = (v >>> 8) & 0xff;
  b[1] = v & 0xff;
  return b;
}

// readU16be reads a 2-byte big-endian number.
export function readU16be(buf: Uint8Array, off: number): number {
  return ((buf[off]! << 8) | buf[off + 1]!) >>> 0;
}

// u64be encodes a non-negative safe integer into 8 bytes big-endian.
export function u64be(n: number): Uint8Array {
  const b = new Uint8Array(8);
  let v = BigInt(n);
  for (let i = 7; i >= 0; i--) {
    b[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return b;
}

// readU64be reads an 8-byte big-endian value as a bigint.
export function readU64be(buf: Uint8Array, off: number): bigint {
  let v = 0n;
  for (let i = 0; i < 8; i++) v = (v << 8n) | BigInt(buf[off + i]!);
  return v;
}

// concatBytes concatenates buffers into a single Uint8Array.
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const c of chunks) total += c.length;
  const out = new Uint8Array(total);
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.length;
  }
  return out;
}

// totalLength sums the byte lengths of a buffer sequence.
export function totalLength(chunks: readonly Uint8Array[]): number {
  let total = 0;
  for (const c of chunks) total += c.length;
  return total;
}

// utf8 encodes a string as UTF-8 bytes.
export function utf8(s: string): Uint8Array {
  return te.encode(s);
}

// ascii encodes a string known to hold only 7-bit characters.
export function ascii(s: string): Uint8Array {
  const out = new Uint8Array(s.length);
  for (let i = 0; i < s.length; i++) out[i] = s.charCodeAt(i) & 0x7f;
  return out;
}
