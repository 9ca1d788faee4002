import {
  writeUint16,
  writeUint32,
  writeUint64,
  toBuffer,
  type Endianness,
} from "./bytes.js";
import { COALESCE_LIMIT, DEFAULT_CAPACITY } from "./protocols.js";
import type { Sink } from "./sink.js";

/** A value that knows how to write itself to a `Writer`. */
export interface Writable {
  writeTo(writer: Writer): void;
}

export type Printable = Writable | string | Uint8Array;

/**
 * Batching writer in front of a `Sink`.
 *
 * Scalars and writes of up to 64 bytes are copied into the current chunk.
 * Anything larger first hands the current chunk to the sink and then goes to
 * the sink itself, uncopied. The sink sees nothing until a chunk is handed
 * off, and nothing is delivered until `flush()`.
 *
 * @example
 * ```typescript
 * const { reader, writer } = createPair();
 * writer.push(0x41).write("BC").flush();
 * reader.extractAll().toString(); // "ABC"
 * ```
 */
export class Writer {
  private chunk: Buffer;
  private length = 0;

  constructor(
    private readonly sink: Sink,
    initialCapacity: number = DEFAULT_CAPACITY
  ) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 1) {
      throw new RangeError(
        `Capacity must be a positive integer. Got ${initialCapacity}`
      );
    }
    this.chunk = Buffer.allocUnsafe(initialCapacity);
  }

  /** Bytes in the chunk being filled. */
  get bufferedBytes(): number {
    return this.length;
  }

  private reserve(n: number) {
    const needed = this.length + n;
    if (needed <= this.chunk.length) return;
    const next = Buffer.allocUnsafe(Math.max(this.chunk.length * 2, needed));
    this.chunk.copy(next, 0, 0, this.length);
    this.chunk = next;
  }

  push(byte: number): this {
    this.reserve(1);
    this.chunk[this.length++] = byte;
    return this;
  }

  pushU16(value: number, endian: Endianness = "native"): this {
    this.reserve(2);
    this.length = writeUint16(this.chunk, this.length, value, endian);
    return this;
  }

  pushU32(value: number, endian: Endianness = "native"): this {
    this.reserve(4);
    this.length = writeUint32(this.chunk, this.length, value, endian);
    return this;
  }

  pushU64(value: bigint, endian: Endianness = "native"): this {
    this.reserve(8);
    this.length = writeUint64(this.chunk, this.length, value, endian);
    return this;
  }

  write(data: Uint8Array | string): this {
    const bytes = toBuffer(data);
    if (bytes.length <= COALESCE_LIMIT) {
      this.reserve(bytes.length);
      bytes.copy(this.chunk, this.length);
      this.length += bytes.length;
    } else {
      this.handOff();
      this.sink.writeBytes(bytes);
    }
    return this;
  }

  print(...values: Printable[]): this {
    for (const value of values) {
      if (typeof value === "string" || value instanceof Uint8Array) {
        this.write(value);
      } else {
        value.writeTo(this);
      }
    }
    return this;
  }

  /** Sends the filled part of the current chunk on and starts a fresh one. */
  private handOff() {
    if (this.length === 0) return;
    this.sink.writeBytes(this.chunk.subarray(0, this.length));
    this.chunk = Buffer.allocUnsafe(this.chunk.length);
    this.length = 0;
  }

  /** Hands off the current chunk and asks the sink to deliver everything. */
  flush(): this {
    this.handOff();
    this.sink.writeFlush();
    return this;
  }
}
