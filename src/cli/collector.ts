#!/usr/bin/env node
import { Command, Option } from "commander";
import { cfg } from "../receiver/utils/config.js";
import { log } from "../receiver/utils/logger.js";
import { runSession } from "../receiver/app/session.js";
import { FRAMINGS, type Framing } from "../receiver/app/protocols.js";

function isFraming(value: string): value is Framing {
  return FRAMINGS.some((f) => f === value);
}

const program = new Command();
program
  .name("stream-collector")
  .description("Reads framed messages from a TCP peer into SQLite.")
  .option("--host <host>", "peer host", cfg.STREAM_HOST)
  .option("--port <port>", "peer port", `${cfg.STREAM_PORT}`)
  .addOption(
    new Option("--framing <framing>", "frame format")
      .choices([...FRAMINGS])
      .default(cfg.STREAM_FRAMING)
  )
  .option("--db <path>", "SQLite path", cfg.SQLITE_PATH)
  .option("--min <n>", "Minimum frames to collect", `${cfg.MIN_FRAMES}`)
  .option("--rt <ms>", "Read timeout ms", `${cfg.READ_TIMEOUT_MS}`)
  .option("--greeting <text>", "Frame sent right after connecting")
  .action(async (opts) => {
    const framing = String(opts.framing);
    if (!isFraming(framing)) throw new Error(`unknown framing: ${framing}`);

    await runSession({
      host: String(opts.host),
      port: parseInt(opts.port, 10),
      framing,
      sqlitePath: String(opts.db),
      minFrames: parseInt(opts.min, 10),
      readTimeoutMs: parseInt(opts.rt, 10),
      writerCapacity: cfg.WRITER_CAPACITY,
      maxFrameBytes: cfg.MAX_FRAME_BYTES,
      greeting: typeof opts.greeting === "string" ? opts.greeting : undefined,
    });
  });

program.parseAsync().catch((err) => {
  log.error(err, "collector failed");
  process.exitCode = 1;
});
