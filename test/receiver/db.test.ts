import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  counts,
  insertDiscarded,
  insertFrame,
  openDb,
  type DB,
} from "../../src/receiver/app/db.js";

type FrameRow = { payload: Buffer; payload_len: number; framing: string };

describe("capture store", () => {
  let db: DB;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("stores frames with their length", () => {
    const id = insertFrame(db, "line", Buffer.from("hello"));
    expect(id).toBe(1);

    const row = db
      .prepare<[number], FrameRow>(
        `SELECT payload, payload_len, framing FROM frames WHERE id = ?`
      )
      .get(id);
    expect(row?.payload.toString()).toBe("hello");
    expect(row?.payload_len).toBe(5);
    expect(row?.framing).toBe("line");
  });

  it("counts frames by framing and discards separately", () => {
    insertFrame(db, "line", Buffer.from("a"));
    insertFrame(db, "length-prefixed", Buffer.from("b"));
    insertFrame(db, "length-prefixed", Buffer.from("c"));
    insertDiscarded(db, Buffer.from("xyz"), 100, "Frame exceeds 4 bytes");

    expect(counts(db)).toEqual({
      line: 1,
      lengthPrefixed: 2,
      total: 3,
      discarded: 1,
    });
  });
});
