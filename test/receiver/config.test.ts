import { describe, expect, it } from "vitest";

import { parseConfig } from "../../src/receiver/utils/config.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      STREAM_HOST: "127.0.0.1",
      STREAM_PORT: 9000,
      STREAM_FRAMING: "line",
      SQLITE_PATH: "./sqlite-db/frames.db",
      MIN_FRAMES: 100,
      READ_TIMEOUT_MS: 5000,
      WRITER_CAPACITY: 1024,
      MAX_FRAME_BYTES: 16 * 1024 * 1024,
    });
  });

  it("coerces numbers and accepts length-prefixed framing", () => {
    const cfg = parseConfig({
      STREAM_PORT: "7000",
      STREAM_FRAMING: "length-prefixed",
    });
    expect(cfg.STREAM_PORT).toBe(7000);
    expect(cfg.STREAM_FRAMING).toBe("length-prefixed");
  });

  it("rejects out-of-range ports and unknown framings", () => {
    expect(() => parseConfig({ STREAM_PORT: "70000" })).toThrow();
    expect(() => parseConfig({ STREAM_FRAMING: "xml" })).toThrow();
  });
});
