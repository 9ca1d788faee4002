import net from "net";
import { afterEach, describe, expect, it } from "vitest";

import { runSession } from "../../src/receiver/app/session.js";

function replyingServer(reply: string) {
  const received: string[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((sock) => {
    sockets.add(sock);
    sock.on("close", () => sockets.delete(sock));
    sock.on("data", (chunk: Buffer) => {
      received.push(chunk.toString());
      sock.write(reply);
    });
  });

  const listen = () =>
    new Promise<number>((resolve) => {
      server.listen(0, "127.0.0.1", () => {
        const address = server.address();
        resolve(typeof address === "object" && address ? address.port : 0);
      });
    });

  const close = () =>
    new Promise<void>((resolve) => {
      for (const sock of sockets) sock.destroy();
      server.close(() => resolve());
    });

  return { received, listen, close };
}

describe("runSession", () => {
  let close: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await close?.();
    close = undefined;
  });

  it("greets the peer, stores lines until the target and counts discards", async () => {
    const server = replyingServer("one\ntwo\nthis-is-too-long\nthree\n");
    close = server.close;
    const port = await server.listen();

    const result = await runSession({
      host: "127.0.0.1",
      port,
      framing: "line",
      sqlitePath: ":memory:",
      minFrames: 3,
      readTimeoutMs: 200,
      maxFrameBytes: 8,
      greeting: "HELLO",
    });

    expect(server.received.join("")).toBe("HELLO\r\n");
    expect(result).toEqual({
      line: 3,
      lengthPrefixed: 0,
      total: 3,
      discarded: 1,
    });
  });

  it("rejects when nothing is listening", async () => {
    const server = replyingServer("");
    const port = await server.listen();
    await server.close();

    await expect(
      runSession({
        host: "127.0.0.1",
        port,
        framing: "line",
        sqlitePath: ":memory:",
        minFrames: 1,
        readTimeoutMs: 200,
      })
    ).rejects.toThrow();
  });
});
