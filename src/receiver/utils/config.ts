import "dotenv/config";
import { z } from "zod";
import { FRAMINGS } from "../app/protocols.js";

const schema = z.object({
  STREAM_HOST: z.string().default("127.0.0.1"),
  STREAM_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  STREAM_FRAMING: z.enum(FRAMINGS).default("line"),
  SQLITE_PATH: z.string().default("./sqlite-db/frames.db"),
  MIN_FRAMES: z.coerce.number().int().min(1).default(100),
  READ_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
  WRITER_CAPACITY: z.coerce.number().int().min(1).default(1024),
  MAX_FRAME_BYTES: z.coerce.number().int().min(1).default(16 * 1024 * 1024),
});

export type AppConfig = z.infer<typeof schema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  return schema.parse(env);
}

export const cfg: AppConfig = parseConfig(process.env);
