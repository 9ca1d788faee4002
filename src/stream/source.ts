import { SourceClosedError } from "./errors.js";

/**
 * Something that can fill a writable region of a reader.
 * `emit` returns how many bytes it wrote and throws `SourceClosedError` once
 * it can never supply more.
 */
export interface Source {
  emit(region: Buffer): number;
}

/**
 * In-memory source fed by `push()`. Copies as much as fits per `emit`,
 * splitting a queued chunk when the region is smaller.
 */
export class QueueSource implements Source {
  private queue: Buffer[] = [];
  private closed = false;

  push(bytes: Uint8Array | string): void {
    if (this.closed) throw new SourceClosedError();
    const buf =
      typeof bytes === "string"
        ? Buffer.from(bytes, "utf8")
        : Buffer.from(bytes); // copy: the caller may reuse its array
    if (buf.length > 0) this.queue.push(buf);
  }

  close(): void {
    this.closed = true;
  }

  get pendingBytes(): number {
    return this.queue.reduce((sum, chunk) => sum + chunk.length, 0);
  }

  emit(region: Buffer): number {
    if (this.queue.length === 0 && this.closed) throw new SourceClosedError();

    let written = 0;
    while (this.queue.length > 0 && written < region.length) {
      const chunk = this.queue[0];
      const toCopy = Math.min(chunk.length, region.length - written);
      chunk.copy(region, written, 0, toCopy);
      written += toCopy;

      if (toCopy === chunk.length) {
        this.queue.shift();
      } else {
        this.queue[0] = chunk.subarray(toCopy);
      }
    }
    return written;
  }
}
