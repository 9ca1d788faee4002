import { InvalidTokenError } from "./errors.js";
import { isDigit, toAsciiLower } from "./protocols.js";
import { toBuffer } from "./bytes.js";
import type { TokenReader } from "./tokenReader.js";

type TokenBytes = Pick<TokenReader, "tokenByteSize" | "eachTokenByte">;

export function parsePositiveInteger(reader: TokenBytes): number {
  if (reader.tokenByteSize === 0) {
    throw new InvalidTokenError("Empty token is not an integer");
  }

  let result = 0;
  reader.eachTokenByte((c) => {
    if (!isDigit(c)) {
      throw new InvalidTokenError(`Invalid digit in token: ${c}`, c);
    }
    result = result * 10 + (c - 0x30);
    if (result > Number.MAX_SAFE_INTEGER) {
      throw new InvalidTokenError("Integer token exceeds safe range");
    }
  });
  return result;
}

function compareToken(
  reader: TokenBytes,
  other: string | Uint8Array,
  fold: (c: number) => number
): boolean {
  const expected = toBuffer(other);
  if (expected.length !== reader.tokenByteSize) return false;

  let i = 0;
  let equal = true;
  reader.eachTokenByte((c) => {
    if (equal && fold(c) !== expected[i]) equal = false;
    i++;
  });
  return equal;
}

export function tokenEquals(reader: TokenBytes, other: string | Uint8Array) {
  return compareToken(reader, other, (c) => c);
}

// `other` must already be lowercase; only the token side is folded
export function tokenEqualsAsciiLowercase(
  reader: TokenBytes,
  other: string | Uint8Array
) {
  return compareToken(reader, other, toAsciiLower);
}
