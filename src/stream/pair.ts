import { openReader } from "./readerAccess.js";
import { ReaderSink } from "./sink.js";
import { Writer } from "./writer.js";
import type { Reader } from "./reader.js";

/**
 * A reader and a writer joined by a loopback sink: whatever the writer
 * flushes can be read back. For exercising protocol code without I/O.
 */
export function createPair(capacity?: number): {
  reader: Reader;
  writer: Writer;
} {
  const { reader, access } = openReader(capacity);
  const writer = new Writer(new ReaderSink(access), capacity);
  return { reader, writer };
}
