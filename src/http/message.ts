import { EmptyBody, type Body } from "./body.js";
import { Fields, tokenList, validateFieldValue } from "./fields.js";
import { obsoleteReason, statusPermitsBody } from "./status.js";
import { WireError } from "../utils/errors.js";

// RequestHeader is the start-line and fields of a request.
export type RequestHeader = {
  kind: "request";
  method: string;
  target: string;
  /** 10 * major + minor, e.g. 11 for HTTP/1.1. */
  version: number;
  fields: Fields;
};

// ResponseHeader is the status-line and fields of a response.
export type ResponseHeader = {
  kind: "response";
  status: number;
  /** Reason phrase; the customary phrase for `status` is used when empty. */
  reason: string;
  version: number;
  fields: Fields;
};

export type Header = RequestHeader | ResponseHeader;

type FieldsInit = Fields | Readonly<Record<string, string>> | Iterable<readonly [string, string]>;

function toFields(init: FieldsInit | undefined): Fields {
  if (init instanceof Fields) return init;
  return new Fields(init);
}

// Message pairs a header with a streamable body.
export class Message<B extends Body = Body> {
  readonly header: Header;
  body: B;

  constructor(header: Header, body: B) {
    this.header = header;
    this.body = body;
  }

  get fields(): Fields {
    return this.header.fields;
  }

  get version(): number {
    return this.header.version;
  }

  // chunked reports whether the last transfer coding is chunked.
  chunked(): boolean {
    const codings = tokenList(this.fields.getAll("Transfer-Encoding").join(","));
    return codings.length > 0 && codings[codings.length - 1] === "chunked";
  }

  hasContentLength(): boolean {
    return this.fields.has("Content-Length");
  }

  // contentLength parses Content-Length, throwing when it is malformed.
  contentLength(): number | undefined {
    const raw = this.fields.get("Content-Length");
    if (raw === undefined) return undefined;
    if (!/^\d+$/.test(raw.trim())) {
      throw new WireError({ code: "invalid_input", stage: "validate", message: `invalid Content-Length ${JSON.stringify(raw)}` });
    }
    const n = Number(raw.trim());
    if (!Number.isSafeInteger(n)) {
      throw new WireError({ code: "invalid_input", stage: "validate", message: "Content-Length out of range" });
    }
    return n;
  }

  // keepAlive applies the version default and the Connection field.
  keepAlive(): boolean {
    const tokens = tokenList(this.fields.getAll("Connection").join(","));
    if (this.version >= 11) return !tokens.includes("close");
    return tokens.includes("keep-alive");
  }

  // setKeepAlive edits the Connection field so keepAlive() returns value.
  setKeepAlive(value: boolean): void {
    const others = tokenList(this.fields.getAll("Connection").join(",")).filter((t) => t !== "close" && t !== "keep-alive");
    if (this.version >= 11) {
      if (!value) others.push("close");
    } else if (value) {
      others.push("keep-alive");
    }
    if (others.length === 0) this.fields.delete("Connection");
    else this.fields.set("Connection", others.join(", "));
  }

  // needEof reports whether the connection must be closed once this message is sent.
  needEof(): boolean {
    if (!this.keepAlive()) return true;
    if (this.header.kind === "request") return false;
    if (!statusPermitsBody(this.header.status)) return false;
    return !this.chunked() && !this.hasContentLength();
  }

  // preparePayload sets Content-Length or Transfer-Encoding from the body.
  preparePayload(): void {
    const h = this.header;
    const size = this.body.size();
    this.fields.delete("Content-Length");
    const codings = tokenList(this.fields.getAll("Transfer-Encoding").join(",")).filter((t) => t !== "chunked");
    if (codings.length === 0) this.fields.delete("Transfer-Encoding");
    else this.fields.set("Transfer-Encoding", codings.join(", "));

    if (h.kind === "response" && !statusPermitsBody(h.status)) {
      if (size !== undefined && size > 0) {
        throw new WireError({ code: "invalid_input", stage: "validate", message: `status ${h.status} cannot carry a body` });
      }
      return;
    }
    if (size !== undefined && codings.length === 0) {
      if (size > 0 || h.kind === "response" || methodExpectsBody(h)) this.fields.set("Content-Length", size);
      return;
    }
    if (h.version >= 11) {
      codings.push("chunked");
      this.fields.set("Transfer-Encoding", codings.join(", "));
      return;
    }
    // HTTP/1.0 without a known length: a response is delimited by closing the connection.
    if (h.kind === "request") {
      throw new WireError({ code: "invalid_input", stage: "validate", message: "HTTP/1.0 request body needs a known length" });
    }
    this.setKeepAlive(false);
  }
}

function methodExpectsBody(h: RequestHeader): boolean {
  return h.method === "POST" || h.method === "PUT" || h.method === "PATCH";
}

export type RequestInit = Readonly<{
  method?: string;
  target?: string;
  version?: number;
  fields?: FieldsInit;
  body?: Body;
}>;

export type ResponseInit = Readonly<{
  status?: number;
  reason?: string;
  version?: number;
  fields?: FieldsInit;
  body?: Body;
}>;

// request builds a request message; defaults to GET / HTTP/1.1 with an empty body.
export function request(init: RequestInit = {}): Message {
  const method = init.method ?? "GET";
  const target = init.target ?? "/";
  if (!/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(method)) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: `invalid method ${JSON.stringify(method)}` });
  }
  if (target === "" || /[\s]/.test(target)) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: `invalid target ${JSON.stringify(target)}` });
  }
  const header: RequestHeader = {
    kind: "request",
    method,
    target,
    version: validateVersion(init.version ?? 11),
    fields: toFields(init.fields)
  };
  return new Message(header, init.body ?? new EmptyBody());
}

// response builds a response message; defaults to 200 OK HTTP/1.1 with an empty body.
export function response(init: ResponseInit = {}): Message {
  const status = init.status ?? 200;
  if (!Number.isInteger(status) || status < 100 || status > 999) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: `invalid status ${status}` });
  }
  const reason = init.reason ?? "";
  validateFieldValue(reason);
  const header: ResponseHeader = {
    kind: "response",
    status,
    reason,
    version: validateVersion(init.version ?? 11),
    fields: toFields(init.fields)
  };
  return new Message(header, init.body ?? new EmptyBody());
}

function validateVersion(v: number): number {
  if (v !== 10 && v !== 11) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: `unsupported version ${v}` });
  }
  return v;
}

// formatHeader renders the start-line, field lines and the terminating blank line.
export function formatHeader(h: Header): string {
  const version = `HTTP/${Math.floor(h.version / 10)}.${h.version % 10}`;
  let out =
    h.kind === "request"
      ? `${h.method} ${h.target} ${version}\r\n`
      : `${version} ${String(h.status).padStart(3, "0")} ${h.reason !== "" ? h.reason : obsoleteReason(h.status)}\r\n`;
  for (const f of h.fields) out += `${f.name}: ${f.value}\r\n`;
  return out + "\r\n";
}
