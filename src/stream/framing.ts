import type { Writable, Writer } from "./writer.js";

/** 4-byte big-endian length followed by the payload. */
export class LengthPrefixedFrame implements Writable {
  constructor(readonly payload: Uint8Array | string) {}

  writeTo(writer: Writer): void {
    const bytes =
      typeof this.payload === "string"
        ? Buffer.from(this.payload, "utf8")
        : this.payload;
    writer.pushU32(bytes.length, "big").write(bytes);
  }
}

export type LineTerminator = "\n" | "\r\n";

export class Line implements Writable {
  constructor(
    readonly text: string,
    readonly terminator: LineTerminator = "\n"
  ) {}

  writeTo(writer: Writer): void {
    writer.write(this.text).write(this.terminator);
  }
}
