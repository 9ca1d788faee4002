import { Reader } from "./reader.js";
import { ReaderStorage } from "./readerStorage.js";
import type { Source } from "./source.js";

/**
 * Owner-only write side of a contiguous reader.
 *
 * Growth can move the storage, so it is kept off the `Reader` handed to
 * parsing code. While a region from `writableRegion()` is outstanding, every
 * call that could reallocate throws until `commit()` closes it.
 */
export class ReaderAccess {
  constructor(private readonly s: ReaderStorage) {}

  get capacity(): number {
    return this.s.capacity;
  }

  get regionOutstanding(): boolean {
    return this.s.region !== null;
  }

  private refuseWhileOutstanding(op: string) {
    if (this.s.region) {
      throw new RangeError(`Cannot ${op} while a region is outstanding`);
    }
  }

  /** Ensures room for `n` bytes past the cursor. */
  reserveBytesAhead(n: number): void {
    this.refuseWhileOutstanding("reserve");
    this.s.ensureCapacity(this.s.cursor + n);
  }

  /** Ensures room for `n` bytes past what is already held. */
  reserveAdditional(n: number): void {
    this.refuseWhileOutstanding("reserve");
    this.s.ensureCapacity(this.s.size + n);
  }

  append(bytes: Uint8Array): void {
    this.refuseWhileOutstanding("append");
    this.reserveAdditional(bytes.length);
    this.s.buf.set(bytes, this.s.size);
    this.s.size += bytes.length;
  }

  /**
   * Free storage for an out-of-band fill. Never empty: when storage is full
   * it first grows by one growth step.
   */
  writableRegion(): Buffer {
    if (this.s.region) return this.s.region;
    if (this.s.size === this.s.capacity) this.reserveAdditional(this.s.growthStep);
    this.s.region = this.s.buf.subarray(this.s.size);
    return this.s.region;
  }

  /** Records `n` bytes written into the outstanding region and closes it. */
  commit(n: number): void {
    const { region } = this.s;
    if (!region) throw new RangeError("No writable region outstanding");
    if (!Number.isInteger(n) || n < 0 || n > region.length) {
      throw new RangeError(
        `Commit must be within the region. Got n=${n}, regionLength=${region.length}`
      );
    }
    this.s.size += n;
    this.s.region = null;
  }

  /**
   * Lets `source` write into free storage. Returns the byte count; a closed
   * source throws `SourceClosedError` and leaves nothing outstanding.
   */
  fillFrom(source: Source): number {
    const region = this.writableRegion();
    let written = 0;
    try {
      written = source.emit(region);
    } finally {
      this.commit(written);
    }
    return written;
  }
}

export function openReader(
  initialCapacity?: number,
  growthStep?: number
): { reader: Reader; access: ReaderAccess } {
  const storage = new ReaderStorage(initialCapacity, growthStep);
  return { reader: new Reader(storage), access: new ReaderAccess(storage) };
}
