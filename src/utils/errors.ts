export type WireStage = "validate" | "serialize" | "write" | "read" | "control" | "close";

export type WireErrorCode =
  | "transport_error"
  | "serialization_error"
  | "body_error"
  | "invalid_state"
  | "invalid_input"
  | "protocol_error"
  | "connection_closed"
  | "end_of_stream";

// WireError is the single error type surfaced by serializers, write operations and framed connections.
export class WireError extends Error {
  readonly code: WireErrorCode;
  readonly stage: WireStage;
  override readonly cause?: unknown;

  constructor(args: Readonly<{ code: WireErrorCode; stage: WireStage; message?: string; cause?: unknown }>) {
    const prefix = `${args.stage} (${args.code})`;
    const message = args.message != null && args.message !== "" ? `${prefix}: ${args.message}` : prefix;
    super(message, args.cause !== undefined ? { cause: args.cause } : undefined);
    this.name = "WireError";
    this.code = args.code;
    this.stage = args.stage;
    if (args.cause !== undefined) this.cause = args.cause;
  }
}

export function isWireError(e: unknown): e is WireError {
  return e instanceof WireError;
}

export function hasCode(e: unknown, code: WireErrorCode): e is WireError {
  return e instanceof WireError && e.code === code;
}

// isConnectionClosed reports a completed close handshake (graceful, unlike transport_error).
export function isConnectionClosed(e: unknown): e is WireError {
  return hasCode(e, "connection_closed");
}

export function isEndOfStream(e: unknown): e is WireError {
  return hasCode(e, "end_of_stream");
}

// asTransportError wraps anything thrown by a transport primitive, keeping WireErrors as they are.
export function asTransportError(e: unknown, stage: WireStage): WireError {
  if (e instanceof WireError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new WireError({ code: "transport_error", stage, message, cause: e });
}

// StreamEOFError marks the end of an incoming byte stream.
export class StreamEOFError extends Error {
  constructor(message = "eof") {
    super(message);
    this.name = "StreamEOFError";
  }
}
