import { Duplex } from "node:stream";
import { describe, expect, it, vi } from "vitest";

import {
  FrameClient,
  type FrameClientOptions,
} from "../../src/receiver/app/client.js";
import { IncompleteFlushError } from "../../src/stream/errors.js";

function fakeSocket() {
  const written: Buffer[] = [];
  const sock = new Duplex({
    read() {},
    write(chunk: Buffer, _enc, cb) {
      written.push(chunk);
      cb();
    },
  });
  return { sock, written };
}

function frame(payload: string) {
  const header = Buffer.alloc(4);
  header.writeUInt32BE(Buffer.byteLength(payload));
  return Buffer.concat([header, Buffer.from(payload)]);
}

function setup(overrides: Partial<FrameClientOptions> = {}) {
  const frames: string[] = [];
  const discards: { preview: string; totalLen: number; reason: string }[] = [];
  const errors: Error[] = [];
  const client = new FrameClient(
    {
      host: "127.0.0.1",
      port: 9000,
      readTimeoutMs: 1000,
      framing: "line",
      ...overrides,
    },
    {
      onFrame: (payload) => {
        frames.push(payload.toString());
      },
      onDiscard: (preview, totalLen, reason) => {
        discards.push({ preview: preview.toString(), totalLen, reason });
      },
      onError: (err) => errors.push(err),
    }
  );
  return { client, frames, discards, errors };
}

describe("FrameClient", () => {
  it("emits lines once their terminator arrives", async () => {
    const { client, frames } = setup();

    await client.receive(Buffer.from("hel"));
    expect(frames).toEqual([]);
    expect(client.stats().bufferedBytes).toBe(3);

    await client.receive(Buffer.from("lo\r\nwor"));
    expect(frames).toEqual(["hello"]);

    await client.receive(Buffer.from("ld\n"));
    expect(frames).toEqual(["hello", "world"]);
    expect(client.stats()).toEqual({
      frames: 2,
      discarded: 0,
      bytesReceived: 13,
      bufferedBytes: 0,
    });
  });

  it("emits length-prefixed frames split over reads", async () => {
    const { client, frames } = setup({ framing: "length-prefixed" });
    const wire = Buffer.concat([frame("hello"), frame("world")]);

    await client.receive(wire.subarray(0, 7));
    expect(frames).toEqual([]);

    await client.receive(wire.subarray(7));
    expect(frames).toEqual(["hello", "world"]);
  });

  it("handles queued chunks in arrival order with async handlers", async () => {
    const frames: string[] = [];
    const client = new FrameClient(
      { host: "127.0.0.1", port: 9000, readTimeoutMs: 1000, framing: "line" },
      {
        onFrame: async (payload) => {
          await new Promise((res) => setTimeout(res, 5));
          frames.push(payload.toString());
        },
        onError: () => {},
      }
    );

    const first = client.receive(Buffer.from("a\n"));
    const second = client.receive(Buffer.from("b\n"));
    await second;
    await first;

    expect(frames).toEqual(["a", "b"]);
  });

  it("discards length-prefixed frames above the limit", async () => {
    const { client, frames, discards } = setup({
      framing: "length-prefixed",
      maxFrameBytes: 4,
    });
    const wire = Buffer.concat([frame("abcdef"), frame("ok")]);

    await client.receive(wire.subarray(0, 7));
    await client.receive(wire.subarray(7));

    expect(discards).toEqual([
      { preview: "abc", totalLen: 6, reason: "Frame exceeds 4 bytes" },
    ]);
    expect(frames).toEqual(["ok"]);
    expect(client.stats().discarded).toBe(1);
  });

  it("discards a line that grows past the limit", async () => {
    const { client, frames, discards } = setup({ maxFrameBytes: 4 });

    await client.receive(Buffer.from("abcdefg"));
    await client.receive(Buffer.from("hi\nok\n"));

    expect(discards).toEqual([
      { preview: "abcdefg", totalLen: 7, reason: "Line exceeds 4 bytes" },
    ]);
    expect(frames).toEqual(["ok"]);
  });

  it("discards an oversized line however the stream is split", async () => {
    const whole = setup({ maxFrameBytes: 4 });
    await whole.client.receive(Buffer.from("abcdefg\nok\n"));

    const split = setup({ maxFrameBytes: 4 });
    await split.client.receive(Buffer.from("abcdefg"));
    await split.client.receive(Buffer.from("\nok\n"));

    for (const { frames, discards } of [whole, split]) {
      expect(frames).toEqual(["ok"]);
      expect(discards).toEqual([
        { preview: "abcdefg", totalLen: 7, reason: "Line exceeds 4 bytes" },
      ]);
    }
  });

  it("assembles a line delivered one byte at a time", async () => {
    const { client, frames } = setup({ maxFrameBytes: 8 });
    for (const byte of Buffer.from("abcdefgh\r\n")) {
      await client.receive(Buffer.of(byte));
    }

    expect(frames).toEqual(["abcdefgh"]);
    expect(client.stats().discarded).toBe(0);
    expect(client.stats().bufferedBytes).toBe(0);
  });

  it("reads frames from an attached stream", async () => {
    const { client, frames } = setup();
    const { sock } = fakeSocket();
    client.attach(sock);

    sock.push(Buffer.from("one\ntwo\n"));

    await vi.waitFor(() => expect(frames).toEqual(["one", "two"]));
  });

  it("writes lines and frames to the attached stream", async () => {
    const { client } = setup();
    const { sock, written } = fakeSocket();
    client.attach(sock);

    client.sendLine("PING");
    client.sendFrame("hey");

    await vi.waitFor(() =>
      expect(Buffer.concat(written)).toEqual(
        Buffer.concat([Buffer.from("PING\r\n"), frame("hey")])
      )
    );
  });

  it("refuses to send before a stream is attached", () => {
    const { client } = setup();
    expect(() => client.sendLine("PING")).toThrow("client is not connected");
  });

  it("reports an incomplete flush once the stream is gone", () => {
    const { client } = setup();
    const { sock } = fakeSocket();
    client.attach(sock);
    sock.destroy();

    expect(() => client.sendFrame("late")).toThrow(IncompleteFlushError);
  });
});
