// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

// Mirrors ./schema; applied on every open.
const HISTORY_DDL = `
CREATE TABLE IF NOT EXISTS harvest_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  item_id TEXT NOT NULL,
  body TEXT NOT NULL,
  link TEXT,
  created_at INTEGER,
  processed INTEGER NOT NULL DEFAULT 0,
  recorded_at INTEGER NOT NULL DEFAULT (unixepoch())
);
CREATE INDEX IF NOT EXISTS harvest_history_item_id_idx ON harvest_history (item_id);
CREATE INDEX IF NOT EXISTS harvest_history_link_idx ON harvest_history (link);
`;

export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.exec(HISTORY_DDL);
  } catch (err) {
    sqlite.close();
    throw err;
  }

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type AppDatabase = BetterSQLite3Database<typeof schema>;
