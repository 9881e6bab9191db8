export type WriteResult = "ok" | "fail";

export type ControlKind = "ping" | "pong" | "close";
export type ControlDirection = "recv" | "send";

export type CloseKind = "local" | "peer" | "error";

export type ErrorReason =
  | "transport_error"
  | "protocol_error"
  | "message_too_big"
  | "invalid_utf8"
  | "body_error"
  | "auto_reply_failed";

// WireObserver receives counters and lifecycle events; every hook is optional on input.
export type WireObserver = {
  onMessageWrite(result: WriteResult, bytes: number, elapsedSeconds: number): void;
  onFrameRead(opcode: number, payloadBytes: number): void;
  onFrameWrite(opcode: number, payloadBytes: number): void;
  onControl(kind: ControlKind, direction: ControlDirection): void;
  onClose(kind: CloseKind, code?: number): void;
  onError(reason: ErrorReason): void;
};

export type WireObserverLike = Partial<WireObserver>;

export const NoopObserver: WireObserver = {
  onMessageWrite: () => {},
  onFrameRead: () => {},
  onFrameWrite: () => {},
  onControl: () => {},
  onClose: () => {},
  onError: () => {}
};

export function normalizeObserver(observer?: WireObserverLike): WireObserver {
  if (observer == null) return NoopObserver;
  return {
    onMessageWrite: observer.onMessageWrite ?? NoopObserver.onMessageWrite,
    onFrameRead: observer.onFrameRead ?? NoopObserver.onFrameRead,
    onFrameWrite: observer.onFrameWrite ?? NoopObserver.onFrameWrite,
    onControl: observer.onControl ?? NoopObserver.onControl,
    onClose: observer.onClose ?? NoopObserver.onClose,
    onError: observer.onError ?? NoopObserver.onError
  };
}

export function nowSeconds(): number {
  if (typeof performance !== "undefined" && typeof performance.now === "function") {
    return performance.now() / 1000;
  }
  return Date.now() / 1000;
}
