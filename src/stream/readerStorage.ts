import { DEFAULT_CAPACITY, DEFAULT_GROWTH_STEP } from "./protocols.js";

/**
 * Growable storage plus the positions both reader views work on.
 * Invariant: 0 <= marker <= cursor <= size <= buf.length.
 */
export class ReaderStorage {
  buf: Buffer;
  size = 0;
  cursor = 0;
  marker = 0;
  lost = 0;
  /** Free space handed out by `writableRegion()` and not yet committed. */
  region: Buffer | null = null;

  constructor(
    readonly initialCapacity: number = DEFAULT_CAPACITY,
    readonly growthStep: number = DEFAULT_GROWTH_STEP
  ) {
    if (!Number.isInteger(initialCapacity) || initialCapacity < 1) {
      throw new RangeError(
        `Capacity must be a positive integer. Got ${initialCapacity}`
      );
    }
    this.buf = Buffer.allocUnsafe(initialCapacity);
  }

  get capacity(): number {
    return this.buf.length;
  }

  /**
   * Makes room for `needed` bytes in total. Reallocates only when the current
   * storage is too small, dropping everything before the marker as it copies.
   */
  ensureCapacity(needed: number): void {
    if (needed <= this.buf.length) return;
    if (this.region) {
      throw new RangeError("Cannot grow storage while a region is outstanding");
    }

    const drop = this.marker;
    const required = needed - drop;
    const doubled = Math.max(this.buf.length * 2, required);
    const steps = Math.ceil(doubled / this.growthStep);
    const next = Buffer.allocUnsafe(steps * this.growthStep);

    this.buf.copy(next, 0, drop, this.size);
    this.buf = next;
    this.size -= drop;
    this.cursor -= drop;
    this.marker = 0;
    this.lost += drop;
  }

  /**
   * Hands out [start, end) and forgets everything before `discardTo`.
   * The returned slice is memory the storage never writes to again.
   */
  chop(start: number, end: number, discardTo: number): Buffer {
    const token = this.buf.subarray(start, end);
    this.buf = this.buf.subarray(discardTo);
    this.size -= discardTo;
    this.lost += discardTo;
    this.cursor = 0;
    this.marker = 0;
    return token;
  }

  reset(): void {
    this.buf = Buffer.allocUnsafe(this.initialCapacity);
    this.size = 0;
    this.cursor = 0;
    this.marker = 0;
    this.lost = 0;
    this.region = null;
  }
}
