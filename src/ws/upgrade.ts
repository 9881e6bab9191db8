import { sha1 } from "@noble/hashes/sha1";

import { ACCEPT_GUID } from "./constants.js";
import { tokenList, type Fields } from "../http/fields.js";
import { request, response, type Message } from "../http/message.js";
import { base64Decode, base64Encode } from "../utils/base64.js";
import { utf8 } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";
import { randomBytes } from "../utils/random.js";

export const WEBSOCKET_VERSION = "13";

// generateKey returns a fresh Sec-WebSocket-Key value.
export function generateKey(): string {
  return base64Encode(randomBytes(16));
}

// computeAcceptKey derives Sec-WebSocket-Accept from the client's key.
export function computeAcceptKey(key: string): string {
  return base64Encode(sha1(utf8(key + ACCEPT_GUID)));
}

export type UpgradeRequestOptions = Readonly<{
  key?: string;
  protocols?: readonly string[];
  /** Extra fields appended after the handshake fields. */
  fields?: Iterable<readonly [string, string]>;
}>;

// upgradeRequest builds the client's opening handshake.
export function upgradeRequest(host: string, target: string, opts: UpgradeRequestOptions = {}): { message: Message; key: string } {
  const key = opts.key ?? generateKey();
  const message = request({
    method: "GET",
    target,
    fields: [
      ["Host", host],
      ["Upgrade", "websocket"],
      ["Connection", "Upgrade"],
      ["Sec-WebSocket-Key", key],
      ["Sec-WebSocket-Version", WEBSOCKET_VERSION]
    ]
  });
  if (opts.protocols != null && opts.protocols.length > 0) message.fields.add("Sec-WebSocket-Protocol", opts.protocols.join(", "));
  for (const [name, value] of opts.fields ?? []) message.fields.add(name, value);
  return { message, key };
}

function invalid(message: string): WireError {
  return new WireError({ code: "invalid_input", stage: "validate", message });
}

function hasToken(fields: Fields, name: string, token: string): boolean {
  return tokenList(fields.getAll(name).join(",")).includes(token);
}

// acceptKeyOf checks a received opening handshake and returns its Sec-WebSocket-Key.
export function acceptKeyOf(req: Message): string {
  const h = req.header;
  if (h.kind !== "request") throw invalid("not a request");
  if (h.method !== "GET") throw invalid(`upgrade needs GET, got ${h.method}`);
  if (h.version < 11) throw invalid("upgrade needs HTTP/1.1");
  if (!hasToken(h.fields, "Connection", "upgrade")) throw invalid("missing Connection: upgrade");
  if (!hasToken(h.fields, "Upgrade", "websocket")) throw invalid("missing Upgrade: websocket");
  if (h.fields.get("Sec-WebSocket-Version")?.trim() !== WEBSOCKET_VERSION) throw invalid("unsupported Sec-WebSocket-Version");
  const key = h.fields.get("Sec-WebSocket-Key")?.trim() ?? "";
  let raw: Uint8Array;
  try {
    raw = base64Decode(key);
  } catch (e) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: "malformed Sec-WebSocket-Key", cause: e });
  }
  if (raw.length !== 16) throw invalid("Sec-WebSocket-Key must encode 16 bytes");
  return key;
}

// upgradeResponse builds the server's 101 reply to a client key.
export function upgradeResponse(key: string, protocol?: string): Message {
  const message = response({
    status: 101,
    fields: [
      ["Upgrade", "websocket"],
      ["Connection", "Upgrade"],
      ["Sec-WebSocket-Accept", computeAcceptKey(key)]
    ]
  });
  if (protocol != null) message.fields.add("Sec-WebSocket-Protocol", protocol);
  return message;
}

// validateUpgradeResponse checks the server's reply against the key the client sent.
export function validateUpgradeResponse(res: Message, key: string): void {
  const h = res.header;
  const fail = (message: string) => new WireError({ code: "protocol_error", stage: "validate", message });
  if (h.kind !== "response") throw fail("not a response");
  if (h.status !== 101) throw fail(`expected status 101, got ${h.status}`);
  if (!hasToken(h.fields, "Upgrade", "websocket")) throw fail("missing Upgrade: websocket");
  if (!hasToken(h.fields, "Connection", "upgrade")) throw fail("missing Connection: upgrade");
  if (h.fields.get("Sec-WebSocket-Accept")?.trim() !== computeAcceptKey(key)) throw fail("Sec-WebSocket-Accept mismatch");
}
