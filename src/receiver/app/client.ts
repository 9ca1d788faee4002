import net from "net";
import type { Duplex } from "node:stream";
import { ChunkedReader } from "../../stream/chunkedReader.js";
import { isOutOfData } from "../../stream/errors.js";
import { LengthPrefixedFrame, Line } from "../../stream/framing.js";
import { FRAME_HEADER_BYTES, LF } from "../../stream/protocols.js";
import { ActorSink } from "../../stream/sink.js";
import { Writer } from "../../stream/writer.js";
import {
  DEFAULT_MAX_FRAME_BYTES,
  PREVIEW_BYTES,
  type Framing,
} from "./protocols.js";
import { SocketChunkReceiver } from "./socketReceiver.js";

export type FrameClientOptions = {
  host: string;
  port: number;
  readTimeoutMs: number;
  framing: Framing;
  writerCapacity?: number;
  maxFrameBytes?: number;
};

export type FrameClientHandlers = {
  onFrame: (payload: Buffer) => void | Promise<void>;
  onDiscard?: (
    payloadPreview: Buffer,
    totalLen: number,
    reason: string
  ) => void | Promise<void>;
  onError: (err: Error) => void;
  onLog?: (msg: string) => void;
};

export type FrameClientStats = {
  frames: number;
  discarded: number;
  bytesReceived: number;
  bufferedBytes: number;
};

export class FrameClient {
  private sock?: Duplex;
  private writer?: Writer;
  private reader = new ChunkedReader();

  private discardRemaining = 0;
  private discardingLine = false;

  private frames = 0;
  private discarded = 0;
  private bytesReceived = 0;

  private processing = false;
  private chunkQueue: Buffer[] = [];

  constructor(
    private opts: FrameClientOptions,
    private h: FrameClientHandlers
  ) {}

  private get maxFrameBytes() {
    return this.opts.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const s = net.createConnection({
        host: this.opts.host,
        port: this.opts.port,
      });

      s.setTimeout(this.opts.readTimeoutMs, () => {
        this.h.onLog?.(`read timeout ${this.opts.readTimeoutMs}ms`);
        s.end();
      });

      s.once("error", reject);
      s.once("connect", () => {
        s.off("error", reject);
        s.on("error", (err) => this.h.onError(err));
        this.h.onLog?.(`connected to ${this.opts.host}:${this.opts.port}`);
        resolve();
      });

      this.attach(s);
    });
  }

  /** Wires an already open stream: reads feed the parser, sends go to it. */
  attach(sock: Duplex): void {
    this.sock = sock;
    this.writer = new Writer(
      new ActorSink(new SocketChunkReceiver(sock)),
      this.opts.writerCapacity
    );

    sock.on("data", (chunk: Buffer) => {
      this.receive(chunk).catch(this.h.onError);
    });
    sock.on("close", () => this.h.onLog?.("socket closed"));
  }

  /**
   * Queues a received chunk and parses frames out of everything buffered.
   * Chunks are handled strictly in arrival order, one at a time.
   */
  async receive(chunk: Buffer): Promise<void> {
    this.chunkQueue.push(chunk);
    if (this.processing) return;
    this.processing = true;

    try {
      let next = this.chunkQueue.shift();
      while (next) {
        this.bytesReceived += next.length;
        this.reader.append(next);
        await this.processBuffered();
        next = this.chunkQueue.shift();
      }
    } finally {
      this.processing = false;
    }
  }

  private async processBuffered() {
    while (this.reader.bytesAhead > 0) {
      if (this.discardRemaining > 0) {
        this.skipDiscarded();
        continue;
      }
      if (this.discardingLine) {
        if (this.skipDiscardedLine()) continue;
        return;
      }

      if (await this.checkOversizedFrame()) continue;

      let frame: Buffer;
      try {
        frame =
          this.opts.framing === "line"
            ? this.reader.extractLine()
            : this.reader.extractFrameLengthPrefixed();
      } catch (err) {
        if (!isOutOfData(err)) throw err;
        if (await this.holdPartial()) continue;
        return; // Need more data
      }

      if (this.opts.framing === "line" && frame.length > this.maxFrameBytes) {
        await this.discard(
          frame.subarray(0, PREVIEW_BYTES),
          frame.length,
          `Line exceeds ${this.maxFrameBytes} bytes`
        );
        continue;
      }

      this.frames++;
      await this.h.onFrame(frame);
    }
  }

  /**
   * Leaves an incomplete frame buffered. A partial line keeps the cursor at
   * the end of what was scanned so the next LF search starts there.
   */
  private async holdPartial(): Promise<boolean> {
    if (this.opts.framing !== "line") {
      this.reader.rewindToMarker();
      return false;
    }
    this.reader.advance(this.reader.bytesAhead);
    return this.checkOversizedLine();
  }

  // --- Discard Handling ---

  /** Skips a length-prefixed frame whose header declares more than the limit. */
  private async checkOversizedFrame(): Promise<boolean> {
    if (this.opts.framing !== "length-prefixed") return false;
    if (this.reader.bytesAhead < FRAME_HEADER_BYTES) return false;

    const declared = this.reader.peekU32(0, "big");
    if (declared <= this.maxFrameBytes) return false;

    this.reader.advance(FRAME_HEADER_BYTES);
    this.reader.markHere();
    this.discardRemaining = declared;
    await this.discard(
      this.preview(Math.min(PREVIEW_BYTES, declared)),
      declared,
      `Frame exceeds ${this.maxFrameBytes} bytes`
    );
    return true;
  }

  /**
   * Starts skipping a partial line that can no longer fit the limit. One byte
   * of slack covers a CR that the line will lose once its LF arrives.
   */
  private async checkOversizedLine(): Promise<boolean> {
    const pending = this.reader.tokenByteSize;
    if (pending <= this.maxFrameBytes + 1) return false;

    this.reader.rewindToMarker();
    this.discardingLine = true;
    await this.discard(
      this.preview(Math.min(PREVIEW_BYTES, pending)),
      pending,
      `Line exceeds ${this.maxFrameBytes} bytes`
    );
    return true;
  }

  private async discard(preview: Buffer, totalLen: number, reason: string) {
    this.discarded++;
    this.h.onLog?.(`discarding frame: ${reason}`);
    await this.h.onDiscard?.(preview, totalLen, reason);
  }

  private preview(limit: number): Buffer {
    this.reader.markHere();
    this.reader.advance(Math.min(limit, this.reader.bytesAhead));
    const preview = Buffer.from(this.reader.tokenAsBuffer());
    this.reader.rewindToMarker();
    return preview;
  }

  private skipDiscarded() {
    const toDiscard = Math.min(this.reader.bytesAhead, this.discardRemaining);
    this.reader.advance(toDiscard);
    this.reader.extractToken();
    this.discardRemaining -= toDiscard;

    if (this.discardRemaining === 0) {
      this.h.onLog?.("finished discarding oversized frame");
    }
  }

  /** Drops bytes up to and including the next LF; false if none arrived yet. */
  private skipDiscardedLine(): boolean {
    this.reader.markHere();
    try {
      this.reader.advanceWhile((c) => c !== LF);
    } catch (err) {
      if (!isOutOfData(err)) throw err;
      this.reader.extractToken();
      return false;
    }
    this.reader.advance(1);
    this.reader.extractToken();
    this.discardingLine = false;
    this.h.onLog?.("finished discarding oversized line");
    return true;
  }

  // --- Public API ---

  private requireWriter(): Writer {
    if (!this.writer) throw new Error("client is not connected");
    return this.writer;
  }

  sendLine(text: string) {
    this.requireWriter().print(new Line(text, "\r\n")).flush();
  }

  sendFrame(payload: Uint8Array | string) {
    this.requireWriter().print(new LengthPrefixedFrame(payload)).flush();
  }

  stats(): FrameClientStats {
    return {
      frames: this.frames,
      discarded: this.discarded,
      bytesReceived: this.bytesReceived,
      bufferedBytes: this.reader.tokenByteSize + this.reader.bytesAhead,
    };
  }

  end() {
    this.sock?.end();
  }
}
