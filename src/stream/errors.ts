export type StreamErrorKind =
  | "out-of-data"
  | "invalid-token"
  | "incomplete-flush"
  | "source-closed";

/** Base class for every failure the stream engine reports. */
export abstract class StreamError extends Error {
  abstract readonly kind: StreamErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Not enough bytes are buffered yet. Recoverable: rewind to the marker and
 * retry once more bytes have arrived.
 */
export class OutOfDataError extends StreamError {
  readonly kind = "out-of-data";
  /** Bytes the operation needed ahead of the cursor. */
  readonly requested: number;
  /** Bytes that were actually available. */
  readonly available: number;

  constructor(requested: number, available: number) {
    super(
      `Not enough bytes available. Requested: ${requested}, Available: ${available}`
    );
    this.requested = requested;
    this.available = available;
  }
}

/** Token content broke a format rule; waiting for more bytes won't help. */
export class InvalidTokenError extends StreamError {
  readonly kind = "invalid-token";
  readonly byte?: number;

  constructor(message: string, byte?: number) {
    super(message);
    this.byte = byte;
  }
}

/** A sink could not deliver everything it had buffered. */
export class IncompleteFlushError extends StreamError {
  readonly kind = "incomplete-flush";
  readonly pendingBytes: number;

  constructor(pendingBytes: number) {
    super(`Flush incomplete, ${pendingBytes} bytes still pending`);
    this.pendingBytes = pendingBytes;
  }
}

export class SourceClosedError extends StreamError {
  readonly kind = "source-closed";

  constructor() {
    super("Source is closed");
  }
}

export function isOutOfData(err: unknown): err is OutOfDataError {
  return err instanceof OutOfDataError;
}
