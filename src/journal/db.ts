import { mkdir } from "node:fs/promises";
import path from "node:path";

import Database from "better-sqlite3";

import { getJournalPath } from "@/config/paths";
import { applyMigrations } from "./migrations";

export type JournalDb = Database.Database;

const BUSY_TIMEOUT_MS = 5_000;

export async function openJournalDb(dbPath: string = getJournalPath()): Promise<JournalDb> {
  await mkdir(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  // Concurrent invocations wait this long for the write lock, then fail.
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  db.pragma("foreign_keys = ON");
  applyMigrations(db);
  return db;
}
