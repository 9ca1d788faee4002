import { OutOfDataError } from "./errors.js";
import { CR, FRAME_HEADER_BYTES, LF } from "./protocols.js";
import { decodeBigUint, decodeUint, type Endianness } from "./bytes.js";
import {
  parsePositiveInteger,
  tokenEquals,
  tokenEqualsAsciiLowercase,
} from "./tokens.js";
import type { TokenReader } from "./tokenReader.js";

/**
 * A place in the chunk list. Always normalised: either `offset` is inside
 * `chunks[chunk]`, or `chunk === chunks.length` and `offset === 0`.
 */
export type ChunkPosition = { chunk: number; offset: number };

function checkCount(n: number) {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Count must be a non-negative integer. Got ${n}`);
  }
}

/**
 * Cursor/marker reader over chunks exactly as they arrived. Chunks are kept
 * by reference and never copied on ingest; reads walk across chunk
 * boundaries, and multi-byte values are assembled a byte at a time.
 */
export class ChunkedReader implements TokenReader {
  private chunks: Buffer[] = [];
  private cursorPos: ChunkPosition = { chunk: 0, offset: 0 };
  private markerPos: ChunkPosition = { chunk: 0, offset: 0 };
  private bytesAheadOfCursor = 0;
  private bytesAheadOfMarker = 0;
  private totalBufferSize = 0;
  private lost = 0;

  /**
   * Add a new chunk. Empty chunks are ignored.
   */
  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.chunks.push(
      Buffer.isBuffer(chunk)
        ? chunk
        : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
    );
    this.totalBufferSize += chunk.length;
    this.bytesAheadOfCursor += chunk.length;
    this.bytesAheadOfMarker += chunk.length;
  }

  get cursor(): Readonly<ChunkPosition> {
    return this.cursorPos;
  }

  get marker(): Readonly<ChunkPosition> {
    return this.markerPos;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  get bytesAhead(): number {
    return this.bytesAheadOfCursor;
  }

  get bytesBehind(): number {
    return this.lost + this.totalBufferSize - this.bytesAheadOfCursor;
  }

  get tokenByteSize(): number {
    return this.bytesAheadOfMarker - this.bytesAheadOfCursor;
  }

  markHere(): void {
    this.markerPos = { ...this.cursorPos };
    this.bytesAheadOfMarker = this.bytesAheadOfCursor;
  }

  rewindToMarker(): void {
    this.cursorPos = { ...this.markerPos };
    this.bytesAheadOfCursor = this.bytesAheadOfMarker;
  }

  /** Position `n` bytes past `from`; the caller checks `n` is available. */
  private walk(from: ChunkPosition, n: number): ChunkPosition {
    let { chunk, offset } = from;
    let remaining = n;
    while (remaining > 0) {
      const left = this.chunks[chunk].length - offset;
      if (remaining < left) {
        offset += remaining;
        remaining = 0;
      } else {
        remaining -= left;
        chunk++;
        offset = 0;
      }
    }
    return { chunk, offset };
  }

  private require(n: number) {
    if (n > this.bytesAheadOfCursor) {
      throw new OutOfDataError(n, this.bytesAheadOfCursor);
    }
  }

  advance(n: number): void {
    checkCount(n);
    this.require(n);
    this.cursorPos = this.walk(this.cursorPos, n);
    this.bytesAheadOfCursor -= n;
  }

  /**
   * Consumes bytes while `predicate` holds. Reaching the end first throws
   * `OutOfDataError`, with the bytes already matched left consumed.
   */
  advanceWhile(predicate: (byte: number) => boolean): void {
    while (this.bytesAheadOfCursor > 0) {
      const { chunk, offset } = this.cursorPos;
      if (!predicate(this.chunks[chunk][offset])) return;
      this.cursorPos =
        offset + 1 < this.chunks[chunk].length
          ? { chunk, offset: offset + 1 }
          : { chunk: chunk + 1, offset: 0 };
      this.bytesAheadOfCursor--;
    }
    throw new OutOfDataError(1, 0);
  }

  peekByte(n = 0): number {
    checkCount(n);
    this.require(n + 1);
    const { chunk, offset } = this.walk(this.cursorPos, n);
    return this.chunks[chunk][offset];
  }

  /** Gathers `width` bytes starting `n` bytes past the cursor. */
  private gather(n: number, width: number): number[] {
    checkCount(n);
    this.require(n + width);
    const bytes: number[] = [];
    let { chunk, offset } = this.walk(this.cursorPos, n);
    while (bytes.length < width) {
      bytes.push(this.chunks[chunk][offset]);
      if (++offset === this.chunks[chunk].length) {
        chunk++;
        offset = 0;
      }
    }
    return bytes;
  }

  peekU16(n = 0, endian: Endianness = "native"): number {
    return decodeUint(this.gather(n, 2), endian);
  }

  peekU32(n = 0, endian: Endianness = "native"): number {
    return decodeUint(this.gather(n, 4), endian);
  }

  peekU64(n = 0, endian: Endianness = "native"): bigint {
    return decodeBigUint(this.gather(n, 8), endian);
  }

  takeByte(): number {
    const value = this.peekByte();
    this.advance(1);
    return value;
  }

  takeU16(endian: Endianness = "native"): number {
    const value = this.peekU16(0, endian);
    this.advance(2);
    return value;
  }

  takeU32(endian: Endianness = "native"): number {
    const value = this.peekU32(0, endian);
    this.advance(4);
    return value;
  }

  takeU64(endian: Endianness = "native"): bigint {
    const value = this.peekU64(0, endian);
    this.advance(8);
    return value;
  }

  /**
   * Execute a callback for each slice of the token, marker to cursor.
   */
  eachTokenSlice(fn: (slice: Buffer) => void): void {
    let remaining = this.tokenByteSize;
    let { chunk, offset } = this.markerPos;

    while (remaining > 0) {
      const current = this.chunks[chunk];
      const toProcess = Math.min(current.length - offset, remaining);
      fn(current.subarray(offset, offset + toProcess));
      remaining -= toProcess;
      chunk++;
      offset = 0;
    }
  }

  eachTokenByte(fn: (byte: number) => void): void {
    this.eachTokenSlice((slice) => {
      for (const c of slice) fn(c);
    });
  }

  /**
   * The token as one buffer: a view into the chunk when it sits in a single
   * chunk, otherwise a concatenation of the spanned slices.
   */
  tokenAsBuffer(): Buffer {
    const slices: Buffer[] = [];
    this.eachTokenSlice((slice) => slices.push(slice));
    if (slices.length === 0) return Buffer.alloc(0);
    if (slices.length === 1) return slices[0];
    return Buffer.concat(slices, this.tokenByteSize);
  }

  tokenAsString(encoding: BufferEncoding = "utf8"): string {
    return this.tokenAsBuffer().toString(encoding);
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
   * Returns the token, marks at the cursor and drops chunks that are now
   * entirely consumed.
   */
  extractToken(): Buffer {
    const token = this.tokenAsBuffer();
    this.markHere();
    this.compact();
    return token;
  }

  extractAll(): Buffer {
    this.advance(this.bytesAheadOfCursor);
    return this.extractToken();
  }

  /**
   * Extracts marker..LF without the terminator (and one CR before it).
   * Throws `OutOfDataError` without moving anything if no LF is buffered.
   */
  extractLine(): Buffer {
    const ahead = this.findByte(LF);
    if (ahead === -1) {
      throw new OutOfDataError(
        this.bytesAheadOfCursor + 1,
        this.bytesAheadOfCursor
      );
    }

    this.advance(ahead);
    const tokenSize = this.tokenByteSize;
    const hasCr = tokenSize > 0 && this.lastTokenByte() === CR;
    let line = this.tokenAsBuffer();
    if (hasCr) line = line.subarray(0, tokenSize - 1);

    this.advance(1);
    this.markHere();
    this.compact();
    return line;
  }

  /** Payload of a frame prefixed with a 4-byte big-endian length. */
  extractFrameLengthPrefixed(): Buffer {
    const length = this.peekU32(0, "big");
    this.require(FRAME_HEADER_BYTES + length);

    this.advance(FRAME_HEADER_BYTES);
    this.markHere();
    this.advance(length);
    return this.extractToken();
  }

  /** Distance from the cursor to the first `byte`, or -1. */
  private findByte(byte: number): number {
    let distance = 0;
    let { chunk, offset } = this.cursorPos;
    for (; chunk < this.chunks.length; chunk++, offset = 0) {
      const current = this.chunks[chunk];
      const idx = current.indexOf(byte, offset);
      if (idx !== -1) return distance + idx - offset;
      distance += current.length - offset;
    }
    return -1;
  }

  private lastTokenByte(): number {
    const { chunk, offset } = this.cursorPos;
    if (offset > 0) return this.chunks[chunk][offset - 1];
    const previous = this.chunks[chunk - 1];
    return previous[previous.length - 1];
  }

  /**
   * Drops chunks lying entirely behind both marker and cursor, shifting the
   * stored chunk indices to match. Returns how many chunks were dropped.
   */
  compact(): number {
    const dead = this.markerPos.chunk;
    if (dead === 0) return 0;

    let dropped = 0;
    for (let i = 0; i < dead; i++) dropped += this.chunks[i].length;

    this.chunks = this.chunks.slice(dead);
    this.totalBufferSize -= dropped;
    this.lost += dropped;
    this.markerPos = {
      chunk: this.markerPos.chunk - dead,
      offset: this.markerPos.offset,
    };
    this.cursorPos = {
      chunk: this.cursorPos.chunk - dead,
      offset: this.cursorPos.offset,
    };
    return dead;
  }

  /** Drops every chunk and resets positions and counters. */
  clear(): void {
    this.chunks = [];
    this.cursorPos = { chunk: 0, offset: 0 };
    this.markerPos = { chunk: 0, offset: 0 };
    this.bytesAheadOfCursor = 0;
    this.bytesAheadOfMarker = 0;
    this.totalBufferSize = 0;
    this.lost = 0;
  }
}
