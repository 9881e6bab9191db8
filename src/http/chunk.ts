import { ascii } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";

export const CRLF = ascii("\r\n");

// ChunkDecorator injects chunk extensions and trailer fields into chunked output.
export type ChunkDecorator = Readonly<{
  /** Extension text for a chunk carrying `size` payload bytes, e.g. `;sig=abc`. */
  chunk(size: number): string;
  /** Trailer field lines, each terminated by CRLF, or "". */
  trailer(): string;
}>;

export const noChunkDecorator: ChunkDecorator = {
  chunk: () => "",
  trailer: () => ""
};

// chunkHeader renders `hex-size[ext] CRLF`.
export function chunkHeader(size: number, ext: string): Uint8Array {
  if (/[\r\n]/.test(ext)) {
    throw new WireError({ code: "serialization_error", stage: "serialize", message: "chunk extension contains a line break" });
  }
  return ascii(`${size.toString(16)}${ext}\r\n`);
}

// lastChunk renders `0 CRLF [trailer] CRLF`.
export function lastChunk(trailer: string): Uint8Array {
  if (trailer !== "" && (!trailer.endsWith("\r\n") || trailer.includes("\r\n\r\n"))) {
    throw new WireError({ code: "serialization_error", stage: "serialize", message: "malformed chunk trailer" });
  }
  return ascii(`0\r\n${trailer}\r\n`);
}

// chunkOverhead is the framing size around a chunk of at most `size` bytes, without extensions.
export function chunkOverhead(size: number): number {
  return size.toString(16).length + 2 * CRLF.length;
}
