import { WireError } from "./utils/errors.js";

// Bytes offered to the transport per bounded write when the caller gives no limit.
export const DEFAULT_WRITE_LIMIT = 8192;

// Maximum payload bytes per outgoing frame when auto-fragmenting.
export const DEFAULT_WRITE_BUFFER_BYTES = 4096;

// Maximum size of one incoming framed message.
export const DEFAULT_READ_MESSAGE_MAX = 16 * (1 << 20);

// Received bytes a SocketDuplex buffers before pausing its stream.
export const DEFAULT_RECV_HIGH_WATER_MARK = 1 << 20;

// Received bytes a SocketDuplex buffers before failing its stream.
export const DEFAULT_MAX_QUEUED_BYTES = 4 * (1 << 20);

// Control frame payloads are limited by the framing protocol.
export const MAX_CONTROL_PAYLOAD = 125;

// normalizeLimit resolves an optional non-negative integer option.
export function normalizeLimit(name: string, v: number | undefined, dflt: number): number {
  if (v === undefined) return dflt;
  if (!Number.isSafeInteger(v) || v < 0) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: `${name} must be a non-negative integer` });
  }
  return v;
}
