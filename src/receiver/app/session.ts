import { FrameClient } from "./client.js";
import { counts, insertDiscarded, insertFrame, openDb } from "./db.js";
import type { Framing } from "./protocols.js";
import { log } from "../utils/logger.js";

export type SessionOptions = {
  host: string;
  port: number;
  framing: Framing;
  sqlitePath: string;
  minFrames: number;
  readTimeoutMs: number;
  writerCapacity?: number;
  maxFrameBytes?: number;
  greeting?: string;
};

const sleep = (ms: number) => new Promise((res) => setTimeout(res, ms));

export async function runSession(opts: SessionOptions) {
  const db = openDb(opts.sqlitePath);
  const startCounts = counts(db);
  log.info({ startCounts }, "starting session");

  try {
    let received = 0;
    let lastActivity = Date.now();

    const client = new FrameClient(
      {
        host: opts.host,
        port: opts.port,
        framing: opts.framing,
        readTimeoutMs: opts.readTimeoutMs,
        writerCapacity: opts.writerCapacity,
        maxFrameBytes: opts.maxFrameBytes,
      },
      {
        onFrame: (payload) => {
          insertFrame(db, opts.framing, payload);
          received++;
          lastActivity = Date.now();
        },
        onDiscard: (preview, totalLen, reason) => {
          insertDiscarded(db, preview, totalLen, reason);
          lastActivity = Date.now();
        },
        onError: (e) => log.error(e, "stream error"),
        onLog: (m) => log.info(m),
      }
    );

    await client.connect();

    if (opts.greeting !== undefined) {
      if (opts.framing === "line") client.sendLine(opts.greeting);
      else client.sendFrame(opts.greeting);
    }

    // collect until the target is reached, then drain until the link goes quiet
    while (received < opts.minFrames) {
      await sleep(250);
      if (Date.now() - lastActivity >= opts.readTimeoutMs) {
        log.warn({ received }, "link went quiet before frame target");
        break;
      }
    }
    while (Date.now() - lastActivity < opts.readTimeoutMs) {
      await sleep(Math.min(250, opts.readTimeoutMs));
    }

    client.end();

    const endCounts = counts(db);
    log.info({ received, stats: client.stats(), endCounts }, "session finished");
    return endCounts;
  } finally {
    db.close();
  }
}
