import type { Endianness } from "./bytes.js";

/**
 * Read-side vocabulary shared by the contiguous and the chunked reader.
 *
 * A token is the range between the marker and the cursor. Operations that
 * need more bytes than are buffered throw `OutOfDataError` and leave the
 * reader untouched, except `advanceWhile`, which keeps what it consumed.
 */
export interface TokenReader {
  readonly bytesAhead: number;
  readonly bytesBehind: number;
  readonly tokenByteSize: number;

  markHere(): void;
  rewindToMarker(): void;
  advance(n: number): void;
  advanceWhile(predicate: (byte: number) => boolean): void;

  peekByte(n?: number): number;
  peekU16(n?: number, endian?: Endianness): number;
  peekU32(n?: number, endian?: Endianness): number;
  peekU64(n?: number, endian?: Endianness): bigint;

  takeByte(): number;
  takeU16(endian?: Endianness): number;
  takeU32(endian?: Endianness): number;
  takeU64(endian?: Endianness): bigint;

  eachTokenByte(fn: (byte: number) => void): void;
  eachTokenSlice(fn: (slice: Buffer) => void): void;

  tokenAsBuffer(): Buffer;
  tokenAsString(encoding?: BufferEncoding): string;
  tokenAsPositiveInteger(): number;
  isTokenEqualTo(other: string | Uint8Array): boolean;
  isTokenAsciiLowercaseEqualTo(other: string | Uint8Array): boolean;

  extractToken(): Buffer;
  extractAll(): Buffer;
  extractLine(): Buffer;
  extractFrameLengthPrefixed(): Buffer;

  clear(): void;
}
