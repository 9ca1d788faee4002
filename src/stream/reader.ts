import { OutOfDataError } from "./errors.js";
import { CR, FRAME_HEADER_BYTES, LF } from "./protocols.js";
import { readUint16, readUint32, readUint64, type Endianness } from "./bytes.js";
import {
  parsePositiveInteger,
  tokenEquals,
  tokenEqualsAsciiLowercase,
} from "./tokens.js";
import type { ReaderStorage } from "./readerStorage.js";
import type { TokenReader } from "./tokenReader.js";

function checkCount(n: number) {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Count must be a non-negative integer. Got ${n}`);
  }
}

/**
 * Read side of a contiguous stream buffer.
 *
 * Multi-byte values are decoded straight from contiguous memory. The write
 * side (append, growth, raw regions) lives on `ReaderAccess`, which only the
 * owner of the stream holds; see `openReader()`.
 *
 * @example
 * ```typescript
 * const { reader, access } = openReader();
 * access.append(Buffer.from("GET /\r\n"));
 * reader.extractLine().toString(); // "GET /"
 * ```
 */
export class Reader implements TokenReader {
  constructor(private readonly s: ReaderStorage) {}

  get cursor(): number {
    return this.s.cursor;
  }

  get marker(): number {
    return this.s.marker;
  }

  /** Bytes currently held, from the start of storage. */
  get size(): number {
    return this.s.size;
  }

  get bytesAhead(): number {
    return this.s.size - this.s.cursor;
  }

  /** Absolute stream position of the cursor. */
  get bytesBehind(): number {
    return this.s.cursor + this.s.lost;
  }

  get tokenByteSize(): number {
    return this.s.cursor - this.s.marker;
  }

  markHere(): void {
    this.s.marker = this.s.cursor;
  }

  rewindToMarker(): void {
    this.s.cursor = this.s.marker;
  }

  private require(n: number) {
    const available = this.bytesAhead;
    if (n > available) throw new OutOfDataError(n, available);
  }

  advance(n: number): void {
    checkCount(n);
    this.require(n);
    this.s.cursor += n;
  }

  /**
   * Consumes bytes while `predicate` holds. Reaching the end first throws
   * `OutOfDataError`, with the bytes already matched left consumed.
   */
  advanceWhile(predicate: (byte: number) => boolean): void {
    const { buf } = this.s;
    while (this.s.cursor < this.s.size) {
      if (!predicate(buf[this.s.cursor])) return;
      this.s.cursor++;
    }
    throw new OutOfDataError(1, 0);
  }

  peekByte(n = 0): number {
    checkCount(n);
    this.require(n + 1);
    return this.s.buf[this.s.cursor + n];
  }

  peekU16(n = 0, endian: Endianness = "native"): number {
    checkCount(n);
    this.require(n + 2);
    return readUint16(this.s.buf, this.s.cursor + n, endian);
  }

  peekU32(n = 0, endian: Endianness = "native"): number {
    checkCount(n);
    this.require(n + 4);
    return readUint32(this.s.buf, this.s.cursor + n, endian);
  }

  peekU64(n = 0, endian: Endianness = "native"): bigint {
    checkCount(n);
    this.require(n + 8);
    return readUint64(this.s.buf, this.s.cursor + n, endian);
  }

  takeByte(): number {
    const value = this.peekByte();
    this.s.cursor += 1;
    return value;
  }

  takeU16(endian: Endianness = "native"): number {
    const value = this.peekU16(0, endian);
    this.s.cursor += 2;
    return value;
  }

  takeU32(endian: Endianness = "native"): number {
    const value = this.peekU32(0, endian);
    this.s.cursor += 4;
    return value;
  }

  takeU64(endian: Endianness = "native"): bigint {
    const value = this.peekU64(0, endian);
    this.s.cursor += 8;
    return value;
  }

  eachTokenByte(fn: (byte: number) => void): void {
    for (let i = this.s.marker; i < this.s.cursor; i++) fn(this.s.buf[i]);
  }

  eachTokenSlice(fn: (slice: Buffer) => void): void {
    if (this.tokenByteSize > 0) fn(this.tokenAsBuffer());
  }

  /** View into storage, no copy. */
  tokenAsBuffer(): Buffer {
    return this.s.buf.subarray(this.s.marker, this.s.cursor);
  }

  tokenAsString(encoding: BufferEncoding = "utf8"): string {
    return this.s.buf.toString(encoding, this.s.marker, this.s.cursor);
  }

  tokenAsPositiveInteger(): number {
    return parsePositiveInteger(this);
  }

  isTokenEqualTo(other: string | Uint8Array): boolean {
    return tokenEquals(this, other);
  }

  isTokenAsciiLowercaseEqualTo(other: string | Uint8Array): boolean {
    return tokenEqualsAsciiLowercase(this, other);
  }

  /**
   * Hands the token over as its own buffer without copying and discards
   * everything before the cursor. Marker and cursor restart at 0.
   */
  extractToken(): Buffer {
    return this.s.chop(this.s.marker, this.s.cursor, this.s.cursor);
  }

  extractAll(): Buffer {
    this.s.cursor = this.s.size;
    return this.extractToken();
  }

  /**
   * Extracts marker..LF without the terminator (and one CR before it).
   * Throws `OutOfDataError` without moving anything if no LF is buffered.
   */
  extractLine(): Buffer {
    const { buf, cursor, size } = this.s;
    const lf = buf.subarray(0, size).indexOf(LF, cursor);
    if (lf === -1) throw new OutOfDataError(size - cursor + 1, size - cursor);

    const start = this.s.marker;
    const end = lf > start && buf[lf - 1] === CR ? lf - 1 : lf;
    return this.s.chop(start, end, lf + 1);
  }

  /** Payload of a frame prefixed with a 4-byte big-endian length. */
  extractFrameLengthPrefixed(): Buffer {
    const length = this.peekU32(0, "big");
    this.require(FRAME_HEADER_BYTES + length);

    const start = this.s.cursor + FRAME_HEADER_BYTES;
    return this.s.chop(start, start + length, start + length);
  }

  /** Drops every held byte, resetting positions and the lost count. */
  clear(): void {
    this.s.reset();
  }
}
