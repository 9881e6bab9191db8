export type {
  ByteDuplex,
  CloseState,
  ControlCallback,
  IncomingMessage,
  ReadInfo,
  Role,
  WebSocketOptions
} from "./connection.js";
export { WebSocketConnection } from "./connection.js";

export {
  CLOSE_ABNORMAL,
  CLOSE_GOING_AWAY,
  CLOSE_INTERNAL_ERROR,
  CLOSE_INVALID_PAYLOAD,
  CLOSE_NO_STATUS,
  CLOSE_NORMAL,
  CLOSE_POLICY_VIOLATION,
  CLOSE_PROTOCOL_ERROR,
  CLOSE_TOO_BIG,
  CLOSE_UNSUPPORTED_DATA,
  isValidCloseCode,
  OP_BINARY,
  OP_CLOSE,
  OP_CONTINUATION,
  OP_PING,
  OP_PONG,
  OP_TEXT
} from "./constants.js";

export type { UpgradeRequestOptions } from "./upgrade.js";
export {
  acceptKeyOf,
  computeAcceptKey,
  generateKey,
  upgradeRequest,
  upgradeResponse,
  validateUpgradeResponse,
  WEBSOCKET_VERSION
} from "./upgrade.js";
