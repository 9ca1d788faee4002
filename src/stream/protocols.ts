export const LF = 0x0a; // '\n'
export const CR = 0x0d; // '\r'

// 4-byte big-endian payload length
export const FRAME_HEADER_BYTES = 4;

export const DEFAULT_CAPACITY = 1024;
export const DEFAULT_GROWTH_STEP = DEFAULT_CAPACITY;

// Writes up to this size are copied into the current chunk instead of handed off
export const COALESCE_LIMIT = 64;

export function isDigit(c: number) {
  return c >= 0x30 && c <= 0x39;
}

export function toAsciiLower(c: number) {
  return c >= 0x41 && c <= 0x5a ? c + 0x20 : c;
}
