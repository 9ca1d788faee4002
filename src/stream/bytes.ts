import os from "node:os";

export type Endianness = "big" | "little" | "native";

export const NATIVE_ENDIANNESS: "big" | "little" =
  os.endianness() === "LE" ? "little" : "big";

function resolve(endian: Endianness): "big" | "little" {
  return endian === "native" ? NATIVE_ENDIANNESS : endian;
}

export function readUint16(buf: Buffer, offset: number, endian: Endianness) {
  return resolve(endian) === "big"
    ? buf.readUInt16BE(offset)
    : buf.readUInt16LE(offset);
}

export function readUint32(buf: Buffer, offset: number, endian: Endianness) {
  return resolve(endian) === "big"
    ? buf.readUInt32BE(offset)
    : buf.readUInt32LE(offset);
}

export function readUint64(buf: Buffer, offset: number, endian: Endianness) {
  return resolve(endian) === "big"
    ? buf.readBigUInt64BE(offset)
    : buf.readBigUInt64LE(offset);
}

export function writeUint16(
  buf: Buffer,
  offset: number,
  value: number,
  endian: Endianness
) {
  return resolve(endian) === "big"
    ? buf.writeUInt16BE(value, offset)
    : buf.writeUInt16LE(value, offset);
}

export function writeUint32(
  buf: Buffer,
  offset: number,
  value: number,
  endian: Endianness
) {
  return resolve(endian) === "big"
    ? buf.writeUInt32BE(value, offset)
    : buf.writeUInt32LE(value, offset);
}

export function writeUint64(
  buf: Buffer,
  offset: number,
  value: bigint,
  endian: Endianness
) {
  return resolve(endian) === "big"
    ? buf.writeBigUInt64BE(value, offset)
    : buf.writeBigUInt64LE(value, offset);
}

/**
 * Folds bytes gathered one at a time (e.g. across chunk boundaries) into an
 * unsigned integer. `bytes` is in stream order.
 */
export function decodeUint(bytes: number[], endian: Endianness): number {
  const ordered = resolve(endian) === "big" ? bytes : [...bytes].reverse();
  let result = 0;
  for (const b of ordered) {
    result = result * 256 + b;
  }
  return result;
}

export function decodeBigUint(bytes: number[], endian: Endianness): bigint {
  const ordered = resolve(endian) === "big" ? bytes : [...bytes].reverse();
  let result = 0n;
  for (const b of ordered) {
    result = (result << 8n) | BigInt(b);
  }
  return result;
}

export function toBuffer(bytes: Uint8Array | string): Buffer {
  if (typeof bytes === "string") return Buffer.from(bytes, "utf8");
  if (Buffer.isBuffer(bytes)) return bytes;
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
