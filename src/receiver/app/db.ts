import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { Framing } from "./protocols.js";

export type DB = Database.Database;

export function openDb(filename: string): DB {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  applyMigrations(db);
  return db;
}

function applyMigrations(db: DB) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS frames (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      framing TEXT NOT NULL,
      payload BLOB NOT NULL,
      payload_len INTEGER NOT NULL,
      inserted_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS discarded (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      payload_preview BLOB NOT NULL,
      payload_total_len INTEGER NOT NULL,
      discard_reason TEXT NOT NULL,
      inserted_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );
  `);
}

export function insertFrame(db: DB, framing: Framing, payload: Buffer) {
  const stmt = db.prepare(
    `INSERT INTO frames (framing, payload, payload_len) VALUES (?, ?, ?)`
  );
  const info = stmt.run(framing, payload, payload.length);
  return Number(info.lastInsertRowid);
}

export function insertDiscarded(
  db: DB,
  preview: Buffer,
  totalLen: number,
  reason: string
) {
  const stmt = db.prepare(
    `INSERT INTO discarded (payload_preview, payload_total_len, discard_reason) VALUES (?, ?, ?)`
  );
  stmt.run(preview, totalLen, reason);
}

export function counts(db: DB) {
  const rows = db
    .prepare<[], { framing: string; c: number }>(
      `SELECT framing, COUNT(*) c FROM frames GROUP BY framing`
    )
    .all();
  const discarded = db
    .prepare<[], { c: number }>(`SELECT COUNT(*) c FROM discarded`)
    .get();

  const line = rows.find((r) => r.framing === "line")?.c ?? 0;
  const lengthPrefixed =
    rows.find((r) => r.framing === "length-prefixed")?.c ?? 0;
  return {
    line,
    lengthPrefixed,
    total: line + lengthPrefixed,
    discarded: discarded?.c ?? 0,
  };
}
