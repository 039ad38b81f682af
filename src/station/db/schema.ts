import type Database from "better-sqlite3";

const CURRENT_VERSION = 1;

const SCHEMA_V1 = `
-- Submission attempts, one row per dispatched pass
CREATE TABLE IF NOT EXISTS passes (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    pass_dir         TEXT NOT NULL,
    pass_name        TEXT NOT NULL,
    satellite_name   TEXT NOT NULL,
    captured_at      TEXT NOT NULL,
    timestamp_source TEXT NOT NULL,
    post_id          TEXT,
    status           TEXT NOT NULL DEFAULT 'posting',
    uploads_ok       INTEGER NOT NULL DEFAULT 0,
    uploads_failed   INTEGER NOT NULL DEFAULT 0,
    archived_path    TEXT,
    error_msg        TEXT,
    created_at       DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at       DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Timing overrides pushed by the server
CREATE TABLE IF NOT EXISTS station_settings (
    key         TEXT PRIMARY KEY,
    value       INTEGER NOT NULL,
    updated_at  DATETIME DEFAULT CURRENT_TIMESTAMP
);

-- Schema versioning
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER NOT NULL,
    applied_at  DATETIME DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_passes_status ON passes(status);
CREATE INDEX IF NOT EXISTS idx_passes_dir ON passes(pass_dir);
`;

function hasSchemaTable(db: Database.Database): boolean {
  const row = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
    )
    .get();
  return row !== undefined;
}

/**
 * Returns the current schema version from the database, or 0 if no schema exists.
 */
function getSchemaVersion(db: Database.Database): number {
  if (!hasSchemaTable(db)) return 0;
  const row = db
    .prepare<[], { version: number | null }>("SELECT MAX(version) as version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

/**
 * Ensures the database schema is up to date.
 * Runs migrations inside a transaction. Safe to call on every startup.
 */
export function ensureSchema(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= CURRENT_VERSION) {
    return;
  }

  db.transaction(() => {
    if (currentVersion < 1) {
      db.exec(SCHEMA_V1);
      db.prepare("INSERT INTO schema_version (version) VALUES (?)").run(CURRENT_VERSION);
    }
  })();
}
