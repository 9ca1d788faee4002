import type { Duplex } from "node:stream";
import type { ChunkReceiver } from "../../stream/sink.js";

/** Delivers writer batches to a socket, corked so a batch goes out together. */
export class SocketChunkReceiver implements ChunkReceiver {
  constructor(private readonly sock: Duplex) {}

  get closed(): boolean {
    return this.sock.destroyed || !this.sock.writable;
  }

  writeChunks(chunks: Buffer[]): void {
    this.sock.cork();
    for (const chunk of chunks) this.sock.write(chunk);
    this.sock.uncork();
  }
}
