export * from "./stream/errors.js";
export * from "./stream/bytes.js";
export * from "./stream/protocols.js";
export type { TokenReader } from "./stream/tokenReader.js";
export { Reader } from "./stream/reader.js";
export { ReaderAccess, openReader } from "./stream/readerAccess.js";
export { ChunkedReader, type ChunkPosition } from "./stream/chunkedReader.js";
export { QueueSource, type Source } from "./stream/source.js";
export {
  ActorSink,
  ReaderSink,
  type ChunkReceiver,
  type Sink,
} from "./stream/sink.js";
export { Writer, type Printable, type Writable } from "./stream/writer.js";
export {
  LengthPrefixedFrame,
  Line,
  type LineTerminator,
} from "./stream/framing.js";
export { createPair } from "./stream/pair.js";
