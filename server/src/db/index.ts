import Database from "better-sqlite3";
import { dirname } from "path";
import { mkdirSync, existsSync } from "fs";

export type Db = Database.Database;

const IN_MEMORY = ":memory:";

function ensureParentDir(path: string) {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Open the SQLite database at `path` (":memory:" for a throwaway one).
 * The caller owns the handle and passes it to whatever needs it.
 */
export function openDb(path: string): Db {
  if (path !== IN_MEMORY) ensureParentDir(path);
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

export function closeDb(db: Db) {
  if (db.open) db.close();
}
