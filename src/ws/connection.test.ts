import { describe, expect, test, vi } from "vitest";
import { WebSocketConnection, type ByteDuplex, type WebSocketOptions } from "./connection.js";
import { OP_BINARY, OP_CLOSE, OP_CONTINUATION, OP_PING, OP_PONG, OP_TEXT } from "./constants.js";
import { applyMask, encodeFrame } from "./frame.js";
import type { BodyWriter } from "../http/body.js";
import type { ControlKind } from "../observability/observer.js";
import { readU16be, readU64be, utf8 } from "../utils/bin.js";

const td = new TextDecoder();
const KEY = new Uint8Array([1, 2, 3, 4]);

class QueueConn implements ByteDuplex {
  private readonly reads: Array<Uint8Array | null> = [];
  private readonly waiters: Array<{ resolve: (b: Uint8Array | null) => void; reject: (e: unknown) => void }> = [];
  private readonly held: Array<() => void> = [];
  readonly writes: Uint8Array[] = [];
  closed = false;
  holdWrites = false;
  failWrites: Error | null = null;

  async read(): Promise<Uint8Array | null> {
    if (this.closed) throw new Error("closed");
    if (this.reads.length > 0) return this.reads.shift() ?? null;
    return await new Promise<Uint8Array | null>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  write(chunk: Uint8Array): Promise<void> {
    this.writes.push(chunk);
    if (this.failWrites != null) return Promise.reject(this.failWrites);
    if (this.holdWrites) return new Promise<void>((resolve) => this.held.push(resolve));
    return Promise.resolve();
  }

  close(): void {
    this.closed = true;
    const ws = this.waiters.splice(0, this.waiters.length);
    for (const w of ws) w.reject(new Error("closed"));
  }

  releaseWrite(): void {
    this.held.shift()?.();
  }

  enqueue(chunk: Uint8Array | null): void {
    const w = this.waiters.shift();
    if (w != null) {
      w.resolve(chunk);
      return;
    }
    this.reads.push(chunk);
  }

  end(): void {
    this.enqueue(null);
  }
}

async function tick(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}

type Decoded = { fin: boolean; opcode: number; masked: boolean; payload: Uint8Array };

function decodeFrame(b: Uint8Array): Decoded {
  const fin = (b[0]! & 0x80) !== 0;
  const opcode = b[0]! & 0x0f;
  const masked = (b[1]! & 0x80) !== 0;
  let len = b[1]! & 0x7f;
  let off = 2;
  if (len === 126) {
    len = readU16be(b, 2);
    off = 4;
  } else if (len === 127) {
    len = Number(readU64be(b, 2));
    off = 10;
  }
  const start = off + (masked ? 4 : 0);
  const payload = b.slice(start, start + len);
  if (masked) applyMask(payload, b.subarray(off, off + 4), 0);
  return { fin, opcode, masked, payload };
}

function closeCodeOf(frame: Uint8Array | undefined): number {
  if (frame == null) throw new Error("no frame written");
  const d = decodeFrame(frame);
  expect(d.opcode).toBe(OP_CLOSE);
  return readU16be(d.payload, 0);
}

// peer builds a frame as a client would send it to a server.
function peer(opcode: number, payload: Uint8Array | string, fin = true): Uint8Array {
  return encodeFrame({ fin, opcode, payload: typeof payload === "string" ? utf8(payload) : payload, maskKey: KEY });
}

function closePayload(code: number): Uint8Array {
  return new Uint8Array([code >> 8, code & 0xff]);
}

function server(opts: Partial<WebSocketOptions> = {}): { conn: QueueConn; ws: WebSocketConnection } {
  const conn = new QueueConn();
  const ws = new WebSocketConnection(conn, { ...opts, role: "server" });
  return { conn, ws };
}

describe("WebSocketConnection reads", () => {
  test("reads a text message", async () => {
    const { conn, ws } = server();
    conn.enqueue(peer(OP_TEXT, "hello"));
    const m = await ws.read();
    expect(m.binary).toBe(false);
    expect(td.decode(m.data)).toBe("hello");
  });

  test("reassembles a fragmented binary message", async () => {
    const { conn, ws } = server();
    conn.enqueue(peer(OP_BINARY, new Uint8Array([1, 2]), false));
    conn.enqueue(peer(OP_CONTINUATION, new Uint8Array([3]), true));
    const m = await ws.read();
    expect(m.binary).toBe(true);
    expect(Array.from(m.data)).toEqual([1, 2, 3]);
  });

  test("a ping is answered before the next data message is delivered", async () => {
    const { conn, ws } = server();
    const cb = vi.fn<(kind: ControlKind, payload: Uint8Array) => void>();
    ws.setControlCallback(cb);
    conn.enqueue(peer(OP_PING, "ping-data"));
    conn.enqueue(peer(OP_TEXT, "after"));

    const m = await ws.read();
    expect(td.decode(m.data)).toBe("after");
    expect(cb).toHaveBeenCalledTimes(1);
    expect(cb.mock.calls[0]?.[0]).toBe("ping");
    expect(td.decode(cb.mock.calls[0]?.[1])).toBe("ping-data");
    expect(conn.writes).toHaveLength(1);
    const pong = decodeFrame(conn.writes[0]!);
    expect(pong.opcode).toBe(OP_PONG);
    expect(pong.masked).toBe(false);
    expect(td.decode(pong.payload)).toBe("ping-data");
  });

  test("every ping gets one pong and data order is kept", async () => {
    const { conn, ws } = server();
    conn.enqueue(peer(OP_TEXT, "d1"));
    conn.enqueue(peer(OP_PING, "p1"));
    conn.enqueue(peer(OP_TEXT, "d2"));
    conn.enqueue(peer(OP_PING, "p2"));
    conn.enqueue(peer(OP_PING, "p3"));
    conn.enqueue(peer(OP_TEXT, "d3"));

    const got: string[] = [];
    for (let i = 0; i < 3; i++) got.push(td.decode((await ws.read()).data));
    await tick();

    expect(got).toEqual(["d1", "d2", "d3"]);
    expect(conn.writes.map((w) => decodeFrame(w)).map((f) => [f.opcode, td.decode(f.payload)])).toEqual([
      [OP_PONG, "p1"],
      [OP_PONG, "p2"],
      [OP_PONG, "p3"]
    ]);
  });

  test("pongs reach the callback and are not answered", async () => {
    const { conn, ws } = server();
    const kinds: ControlKind[] = [];
    ws.setControlCallback((kind) => kinds.push(kind));
    conn.enqueue(peer(OP_PONG, "x"));
    conn.enqueue(peer(OP_TEXT, "y"));
    await ws.read();
    expect(kinds).toEqual(["pong"]);
    expect(conn.writes).toHaveLength(0);
  });

  test("a control frame inside a fragmented message is absorbed", async () => {
    const { conn, ws } = server();
    conn.enqueue(peer(OP_TEXT, "ab", false));
    conn.enqueue(peer(OP_PING, ""));
    conn.enqueue(peer(OP_CONTINUATION, "cd"));
    expect(td.decode((await ws.read()).data)).toBe("abcd");
    expect(decodeFrame(conn.writes[0]!).opcode).toBe(OP_PONG);
  });

  test("readInto streams large payloads in pieces", async () => {
    const { conn, ws } = server();
    const puts: number[] = [];
    let finished = 0;
    const sink: BodyWriter = {
      put: (d) => {
        puts.push(d.length);
      },
      finish: () => {
        finished++;
      }
    };
    conn.enqueue(peer(OP_BINARY, new Uint8Array(100_000).fill(7)));
    const info = await ws.readInto(sink);
    expect(info).toEqual({ binary: true, bytes: 100_000 });
    expect(puts).toEqual([65_536, 34_464]);
    expect(finished).toBe(1);
  });

  test("a second concurrent read is rejected", async () => {
    const { conn, ws } = server();
    const first = ws.read();
    await expect(ws.read()).rejects.toMatchObject({ code: "invalid_state", stage: "read" });
    conn.enqueue(peer(OP_TEXT, "one"));
    expect(td.decode((await first).data)).toBe("one");
  });

  test("a throwing control callback still gets the pong out", async () => {
    const { conn, ws } = server();
    ws.setControlCallback(() => {
      throw new Error("boom");
    });
    conn.enqueue(peer(OP_PING, "p"));
    conn.enqueue(peer(OP_TEXT, "after"));
    await expect(ws.read()).rejects.toMatchObject({ code: "body_error", message: "read (body_error): boom" });
    expect(conn.writes.map((w) => decodeFrame(w)).map((f) => [f.opcode, td.decode(f.payload)])).toEqual([[OP_PONG, "p"]]);
    expect(conn.closed).toBe(true);
    expect(ws.state).toBe("closed");
    await expect(ws.read()).rejects.toMatchObject({ code: "body_error" });
  });

  test("a failing sink is a body error", async () => {
    const { conn, ws } = server();
    const sink: BodyWriter = {
      put: () => {
        throw new Error("disk full");
      },
      finish: () => {}
    };
    conn.enqueue(peer(OP_TEXT, "x"));
    await expect(ws.readInto(sink)).rejects.toMatchObject({ code: "body_error", message: "read (body_error): disk full" });
    expect(conn.closed).toBe(true);
  });
});

describe("WebSocketConnection protocol errors", () => {
  const cases: Array<{ name: string; frame: Uint8Array; code: number; opts?: Partial<WebSocketOptions> }> = [
    { name: "unmasked frame", frame: encodeFrame({ fin: true, opcode: OP_TEXT, payload: utf8("x") }), code: 1002 },
    { name: "reserved bits", frame: reserved(), code: 1002 },
    { name: "unexpected continuation", frame: peer(OP_CONTINUATION, "x"), code: 1002 },
    { name: "unknown opcode", frame: peer(0x3, "x"), code: 1002 },
    { name: "fragmented control frame", frame: peer(OP_PING, "x", false), code: 1002 },
    { name: "oversized control frame", frame: peer(OP_PING, new Uint8Array(126)), code: 1002 },
    { name: "invalid close code", frame: peer(OP_CLOSE, closePayload(1005)), code: 1002 },
    { name: "one-byte close payload", frame: peer(OP_CLOSE, new Uint8Array([3])), code: 1002 },
    { name: "invalid UTF-8 text", frame: peer(OP_TEXT, new Uint8Array([0x68, 0xff])), code: 1007 },
    { name: "64-bit length with the top bit set", frame: new Uint8Array([0x82, 0xff, 0x80, 0, 0, 0, 0, 0, 0, 1, 1, 2, 3, 4]), code: 1002 },
    { name: "message over the limit", frame: peer(OP_TEXT, "hello"), code: 1009, opts: { readMessageMax: 4 } }
  ];

  function reserved(): Uint8Array {
    const f = peer(OP_TEXT, "x");
    f[0] = f[0]! | 0x40;
    return f;
  }

  for (const c of cases) {
    test(`${c.name} closes with ${c.code}`, async () => {
      const { conn, ws } = server(c.opts);
      conn.enqueue(c.frame);
      await expect(ws.read()).rejects.toMatchObject({ code: "protocol_error", stage: "read" });
      expect(conn.writes).toHaveLength(1);
      expect(closeCodeOf(conn.writes[0])).toBe(c.code);
      expect(conn.closed).toBe(true);
      expect(ws.state).toBe("closed");
      await expect(ws.read()).rejects.toMatchObject({ code: "protocol_error" });
    });
  }

  test("a client rejects masked frames", async () => {
    const conn = new QueueConn();
    const ws = new WebSocketConnection(conn, { role: "client" });
    conn.enqueue(peer(OP_TEXT, "x"));
    await expect(ws.read()).rejects.toMatchObject({ code: "protocol_error" });
    const close = decodeFrame(conn.writes[0]!);
    expect(close.masked).toBe(true);
    expect(readU16be(close.payload, 0)).toBe(1002);
  });
});

describe("WebSocketConnection close handshake", () => {
  test("a peer close is echoed once and fails the read", async () => {
    const { conn, ws } = server();
    conn.enqueue(peer(OP_CLOSE, new Uint8Array([0x03, 0xe9, 0x62, 0x79, 0x65])));
    await expect(ws.read()).rejects.toMatchObject({ code: "connection_closed" });
    expect(conn.writes).toHaveLength(1);
    expect(closeCodeOf(conn.writes[0])).toBe(1001);
    expect(ws.state).toBe("closed");
    expect(conn.closed).toBe(true);

    await expect(ws.read()).rejects.toMatchObject({ code: "connection_closed" });
    await expect(ws.write("late")).rejects.toMatchObject({ code: "connection_closed" });
    await ws.close();
    expect(conn.writes).toHaveLength(1);
  });

  test("an empty peer close is echoed with 1000", async () => {
    const { conn, ws } = server();
    conn.enqueue(peer(OP_CLOSE, new Uint8Array()));
    await expect(ws.read()).rejects.toMatchObject({ code: "connection_closed" });
    expect(closeCodeOf(conn.writes[0])).toBe(1000);
  });

  test("closeReceived lasts until the echo is written", async () => {
    const { conn, ws } = server();
    conn.holdWrites = true;
    conn.enqueue(peer(OP_CLOSE, closePayload(1000)));
    const read = ws.read();
    await tick();
    expect(ws.state).toBe("closeReceived");
    await expect(ws.write("x")).rejects.toMatchObject({ code: "connection_closed" });
    conn.releaseWrite();
    await expect(read).rejects.toMatchObject({ code: "connection_closed" });
    expect(ws.state).toBe("closed");
  });

  test("close waits for the peer's close frame", async () => {
    const { conn, ws } = server();
    const done = ws.close(1000, "done");
    expect(ws.state).toBe("active");
    await tick();
    expect(ws.state).toBe("closeSent");
    const sent = decodeFrame(conn.writes[0]!);
    expect(sent.opcode).toBe(OP_CLOSE);
    expect(td.decode(sent.payload.subarray(2))).toBe("done");

    conn.enqueue(peer(OP_CLOSE, closePayload(1000)));
    await done;
    expect(ws.state).toBe("closed");
    expect(conn.writes).toHaveLength(1);
    expect(conn.closed).toBe(true);
  });

  test("close discards data frames and answers pings while waiting", async () => {
    const { conn, ws } = server();
    const done = ws.close();
    conn.enqueue(peer(OP_TEXT, "ignored"));
    conn.enqueue(peer(OP_PING, "still-there"));
    conn.enqueue(peer(OP_CLOSE, closePayload(1000)));
    await done;
    expect(conn.writes.map((w) => decodeFrame(w).opcode)).toEqual([OP_CLOSE, OP_PONG]);
  });

  test("close lets an in-flight read observe the peer close", async () => {
    const { conn, ws } = server();
    const read = ws.read();
    const done = ws.close();
    conn.enqueue(peer(OP_CLOSE, closePayload(1000)));
    await expect(read).rejects.toMatchObject({ code: "connection_closed" });
    await done;
    expect(conn.writes).toHaveLength(1);
  });

  test("a peer close while a data frame holds the writer slot still gets our close frame out", async () => {
    const { conn, ws } = server();
    conn.holdWrites = true;
    const write = ws.write("data");
    const read = ws.read();
    const done = ws.close(1000);
    conn.enqueue(peer(OP_CLOSE, closePayload(1001)));
    await tick();
    expect(ws.state).toBe("closeReceived");

    conn.releaseWrite();
    await write;
    await tick();
    conn.releaseWrite();
    await expect(read).rejects.toMatchObject({ code: "connection_closed" });
    await done;

    expect(conn.writes.map((w) => decodeFrame(w).opcode)).toEqual([OP_TEXT, OP_CLOSE]);
    expect(closeCodeOf(conn.writes[1])).toBe(1000);
    expect(ws.state).toBe("closed");
    expect(conn.closed).toBe(true);
  });

  test("a read while close drains the connection fails as closed", async () => {
    const { conn, ws } = server();
    const done = ws.close();
    await tick();
    await expect(ws.read()).rejects.toMatchObject({ code: "connection_closed", stage: "read" });
    conn.enqueue(peer(OP_CLOSE, closePayload(1000)));
    await done;
    expect(ws.state).toBe("closed");
  });

  test("a second close is a no-op sharing the first one's completion", async () => {
    const { conn, ws } = server();
    const a = ws.close();
    const b = ws.close(1001);
    conn.enqueue(peer(OP_CLOSE, closePayload(1000)));
    await Promise.all([a, b]);
    expect(conn.writes).toHaveLength(1);
    expect(closeCodeOf(conn.writes[0])).toBe(1000);
  });

  test("end of stream after our close frame completes the handshake", async () => {
    const { conn, ws } = server();
    const done = ws.close();
    conn.end();
    await done;
    expect(ws.state).toBe("closed");
  });

  test("end of stream while active is a transport error", async () => {
    const { conn, ws } = server();
    conn.end();
    await expect(ws.read()).rejects.toMatchObject({ code: "transport_error", message: "read (transport_error): unexpected end of stream" });
    await expect(ws.read()).rejects.toMatchObject({ code: "transport_error" });
  });

  test("invalid close arguments are rejected", async () => {
    const { ws } = server();
    await expect(ws.close(1005)).rejects.toMatchObject({ code: "invalid_input" });
    await expect(ws.close(1000, "r".repeat(124))).rejects.toMatchObject({ code: "invalid_input" });
    expect(ws.state).toBe("active");
  });
});

describe("WebSocketConnection writes", () => {
  test("a server writes unmasked frames and a client masks them", async () => {
    const { conn, ws } = server();
    await ws.write("hi");
    expect(Array.from(conn.writes[0]!)).toEqual([0x81, 0x02, 0x68, 0x69]);

    const cconn = new QueueConn();
    const client = new WebSocketConnection(cconn, { role: "client" });
    await client.write("hi");
    const f = decodeFrame(cconn.writes[0]!);
    expect(f.masked).toBe(true);
    expect(td.decode(f.payload)).toBe("hi");
  });

  test("messages are split at writeBufferBytes", async () => {
    const { conn, ws } = server({ writeBufferBytes: 4 });
    await ws.write("abcdefghij");
    expect(conn.writes.map((w) => decodeFrame(w)).map((f) => [f.opcode, f.fin, td.decode(f.payload)])).toEqual([
      [OP_TEXT, false, "abcd"],
      [OP_CONTINUATION, false, "efgh"],
      [OP_CONTINUATION, true, "ij"]
    ]);
  });

  test("autoFragment off sends one frame", async () => {
    const { conn, ws } = server({ writeBufferBytes: 4, autoFragment: false });
    await ws.write("abcdefghij");
    expect(conn.writes).toHaveLength(1);
  });

  test("binary mode selects the binary opcode for byte messages", async () => {
    const { conn, ws } = server();
    ws.binary(true);
    await ws.write(new Uint8Array([9]));
    await ws.write("text");
    expect(conn.writes.map((w) => decodeFrame(w).opcode)).toEqual([OP_BINARY, OP_TEXT]);
  });

  test("a control frame goes out between two fragments", async () => {
    const { conn, ws } = server({ writeBufferBytes: 4 });
    conn.holdWrites = true;
    const w = ws.write("abcdefgh");
    expect(conn.writes).toHaveLength(1);
    const p = ws.ping("p");
    expect(conn.writes).toHaveLength(1);

    conn.releaseWrite();
    await tick();
    expect(conn.writes).toHaveLength(2);
    conn.releaseWrite();
    await tick();
    expect(conn.writes).toHaveLength(3);
    conn.releaseWrite();
    await Promise.all([w, p]);

    expect(conn.writes.map((b) => decodeFrame(b)).map((f) => [f.opcode, f.fin])).toEqual([
      [OP_TEXT, false],
      [OP_PING, true],
      [OP_CONTINUATION, true]
    ]);
  });

  test("a second concurrent write is rejected", async () => {
    const { conn, ws } = server();
    conn.holdWrites = true;
    const first = ws.write("a");
    await expect(ws.write("b")).rejects.toMatchObject({ code: "invalid_state", stage: "write" });
    conn.releaseWrite();
    await first;
    expect(conn.writes).toHaveLength(1);
  });

  test("writeSome sends a message frame by frame", async () => {
    const { conn, ws } = server();
    await ws.writeSome("ab", false);
    await expect(ws.write("x")).rejects.toMatchObject({ code: "invalid_state" });
    await ws.writeSome("cd", true);
    await ws.write("x");
    expect(conn.writes.map((w) => decodeFrame(w)).map((f) => [f.opcode, f.fin, td.decode(f.payload)])).toEqual([
      [OP_TEXT, false, "ab"],
      [OP_CONTINUATION, true, "cd"],
      [OP_TEXT, true, "x"]
    ]);
  });

  test("control payloads are limited to 125 bytes", async () => {
    const { conn, ws } = server();
    await expect(ws.ping(new Uint8Array(126))).rejects.toMatchObject({ code: "invalid_input", stage: "control" });
    await ws.pong(new Uint8Array(125));
    expect(decodeFrame(conn.writes[0]!).payload.length).toBe(125);
  });

  test("a transport write failure is sticky", async () => {
    const { conn, ws } = server();
    conn.failWrites = new Error("EPIPE");
    await expect(ws.write("x")).rejects.toMatchObject({ code: "transport_error", message: "write (transport_error): EPIPE" });
    expect(conn.closed).toBe(true);
    expect(ws.state).toBe("closed");
    await expect(ws.write("y")).rejects.toMatchObject({ code: "transport_error" });
    await expect(ws.read()).rejects.toMatchObject({ code: "transport_error" });
  });

  test("a failed automatic reply fails the read", async () => {
    const onError = vi.fn();
    const { conn, ws } = server({ observer: { onError } });
    conn.failWrites = new Error("EPIPE");
    conn.enqueue(peer(OP_PING, "p"));
    await expect(ws.read()).rejects.toMatchObject({ code: "transport_error", message: "write (transport_error): EPIPE" });
    await tick();
    expect(onError.mock.calls.map((c) => c[0])).toEqual(["transport_error", "auto_reply_failed"]);
  });

  test("the observer counts frames and control events", async () => {
    const onFrameWrite = vi.fn();
    const onFrameRead = vi.fn();
    const onControl = vi.fn();
    const { conn, ws } = server({ observer: { onFrameWrite, onFrameRead, onControl } });
    conn.enqueue(peer(OP_PING, "abc"));
    conn.enqueue(peer(OP_TEXT, "hello"));
    await ws.read();
    await tick();
    expect(onFrameRead.mock.calls).toEqual([
      [OP_PING, 3],
      [OP_TEXT, 5]
    ]);
    expect(onFrameWrite.mock.calls).toEqual([[OP_PONG, 3]]);
    expect(onControl.mock.calls).toEqual([
      ["ping", "recv"],
      ["pong", "send"]
    ]);
  });
});
