import { IncompleteFlushError } from "./errors.js";
import type { ReaderAccess } from "./readerAccess.js";

/**
 * Synchronous destination for a writer's chunks. `writeBytes` only accepts a
 * chunk; `writeFlush` delivers everything accepted so far or throws
 * `IncompleteFlushError`, keeping what was not delivered.
 */
export interface Sink {
  writeBytes(bytes: Buffer): void;
  writeFlush(): void;
}

/**
 * Receives a whole batch of chunks in one message. Delivery happens on the
 * receiver's side; the caller gives up the array it passes.
 */
export interface ChunkReceiver {
  readonly closed: boolean;
  writeChunks(chunks: Buffer[]): void;
}

function byteLength(chunks: Buffer[]) {
  return chunks.reduce((sum, chunk) => sum + chunk.length, 0);
}

/**
 * Loopback sink: flushing appends every pending chunk to a reader. A reader
 * with a region outstanding cannot take bytes, so the flush is incomplete.
 */
export class ReaderSink implements Sink {
  private pending: Buffer[] = [];

  constructor(private readonly access: ReaderAccess) {}

  writeBytes(bytes: Buffer): void {
    this.pending.push(bytes);
  }

  writeFlush(): void {
    if (this.pending.length === 0) return;
    if (this.access.regionOutstanding) {
      throw new IncompleteFlushError(byteLength(this.pending));
    }
    this.access.reserveAdditional(byteLength(this.pending));
    for (const chunk of this.pending) this.access.append(chunk);
    this.pending = [];
  }
}

/**
 * Batches chunks and hands the whole batch to a `ChunkReceiver` on flush.
 * A closed receiver leaves the batch pending so a later flush can retry.
 */
export class ActorSink implements Sink {
  private pending: Buffer[] = [];

  constructor(private readonly receiver: ChunkReceiver) {}

  get pendingChunks(): number {
    return this.pending.length;
  }

  writeBytes(bytes: Buffer): void {
    this.pending.push(bytes);
  }

  writeFlush(): void {
    if (this.pending.length === 0) return;
    if (this.receiver.closed) {
      throw new IncompleteFlushError(byteLength(this.pending));
    }

    const batch = this.pending;
    this.pending = [];
    this.receiver.writeChunks(batch);
  }
}
