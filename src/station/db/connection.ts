import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";

/**
 * Opens (or creates) the station database at the given path, creating the
 * parent directory when needed. Uses `:memory:` for testing.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");

  return db;
}
