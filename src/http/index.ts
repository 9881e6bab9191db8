export type { Body, BodyChunk, BodyReader, BodyWriter } from "./body.js";
export { BufferSink, BytesBody, EmptyBody, FileBody, FileSink, IterableBody } from "./body.js";

export type { ChunkDecorator } from "./chunk.js";
export { noChunkDecorator } from "./chunk.js";

export type { Field } from "./fields.js";
export { Fields, tokenList, validateFieldName, validateFieldValue } from "./fields.js";

export type { Header, RequestHeader, RequestInit, ResponseHeader, ResponseInit } from "./message.js";
export { formatHeader, Message, request, response } from "./message.js";

export type { Produced, SerializerOptions } from "./serializer.js";
export { Serializer } from "./serializer.js";

export { obsoleteReason, statusPermitsBody } from "./status.js";

export type { AsyncWriteStream, SyncWriteStream, WriteOptions } from "./write.js";
export {
  serializeMessage,
  write,
  writeHeader,
  writeHeaderSync,
  writeMessage,
  writeMessageSync,
  writeSome,
  writeSomeSync,
  writeSync
} from "./write.js";
