export * from "./http/index.js";
export * from "./ws/index.js";

export type { WireErrorCode, WireStage } from "./utils/errors.js";
export { hasCode, isConnectionClosed, isEndOfStream, isWireError, WireError } from "./utils/errors.js";

export type {
  CloseKind,
  ControlDirection,
  ControlKind,
  ErrorReason,
  WireObserver,
  WireObserverLike,
  WriteResult
} from "./observability/observer.js";
export { NoopObserver, normalizeObserver } from "./observability/observer.js";

export {
  DEFAULT_READ_MESSAGE_MAX,
  DEFAULT_WRITE_BUFFER_BYTES,
  DEFAULT_WRITE_LIMIT,
  MAX_CONTROL_PAYLOAD
} from "./defaults.js";
