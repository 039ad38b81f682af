import type Database from "better-sqlite3";
import type { TimingUpdate } from "../runtimeSettings";
import type {
  NewPassAttempt,
  PassAttemptUpdate,
  PassRow,
  PassStatus,
  SettingKey,
  SettingRow,
} from "./types";

// ============================================================
// Passes
// ============================================================

export function insertPassAttempt(db: Database.Database, attempt: NewPassAttempt): PassRow {
  const result = db
    .prepare<NewPassAttempt>(`
      INSERT INTO passes (pass_dir, pass_name, satellite_name, captured_at, timestamp_source)
      VALUES (@pass_dir, @pass_name, @satellite_name, @captured_at, @timestamp_source)
    `)
    .run(attempt);
  const row = getPassById(db, Number(result.lastInsertRowid));
  if (!row) {
    throw new Error(`Pass attempt ${String(result.lastInsertRowid)} vanished after insert`);
  }
  return row;
}

export function getPassById(db: Database.Database, id: number): PassRow | undefined {
  return db.prepare<[number], PassRow>("SELECT * FROM passes WHERE id = ?").get(id);
}

/**
 * Move an attempt to a new status. Fields left out of the update keep their
 * stored values.
 */
export function updatePassAttempt(
  db: Database.Database,
  id: number,
  update: PassAttemptUpdate
): void {
  const current = getPassById(db, id);
  if (!current) return;

  db.prepare(`
    UPDATE passes
    SET status = @status,
        post_id = @post_id,
        uploads_ok = @uploads_ok,
        uploads_failed = @uploads_failed,
        archived_path = @archived_path,
        error_msg = @error_msg,
        updated_at = CURRENT_TIMESTAMP
    WHERE id = @id
  `).run({
    id,
    status: update.status,
    post_id: update.post_id !== undefined ? update.post_id : current.post_id,
    uploads_ok: update.uploads_ok ?? current.uploads_ok,
    uploads_failed: update.uploads_failed ?? current.uploads_failed,
    archived_path: update.archived_path !== undefined ? update.archived_path : current.archived_path,
    error_msg: update.error_msg !== undefined ? update.error_msg : current.error_msg,
  });
}

/** Most recent attempts first. */
export function listRecentPasses(db: Database.Database, limit = 20): PassRow[] {
  return db
    .prepare<[number], PassRow>("SELECT * FROM passes ORDER BY id DESC LIMIT ?")
    .all(limit);
}

export function listPassesForDir(db: Database.Database, passDir: string): PassRow[] {
  return db
    .prepare<[string], PassRow>("SELECT * FROM passes WHERE pass_dir = ? ORDER BY id ASC")
    .all(passDir);
}

export function countPassesByStatus(db: Database.Database): Partial<Record<PassStatus, number>> {
  const rows = db
    .prepare<[], { status: PassStatus; n: number }>(
      "SELECT status, COUNT(*) as n FROM passes GROUP BY status"
    )
    .all();
  const counts: Partial<Record<PassStatus, number>> = {};
  for (const row of rows) {
    counts[row.status] = row.n;
  }
  return counts;
}

// ============================================================
// Station settings
// ============================================================

export function getSetting(db: Database.Database, key: SettingKey): SettingRow | undefined {
  return db
    .prepare<[SettingKey], SettingRow>("SELECT * FROM station_settings WHERE key = ?")
    .get(key);
}

export function upsertSetting(db: Database.Database, key: SettingKey, value: number): void {
  db.prepare(`
    INSERT INTO station_settings (key, value)
    VALUES (?, ?)
    ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = CURRENT_TIMESTAMP
  `).run(key, value);
}

/** Timing overrides persisted from earlier server pushes. */
export function loadTimingOverrides(db: Database.Database): TimingUpdate {
  const update: TimingUpdate = {};
  const processDelay = getSetting(db, "process_delay");
  const healthCheck = getSetting(db, "health_check_interval");
  if (processDelay) update.processDelaySeconds = processDelay.value;
  if (healthCheck) update.healthCheckIntervalSeconds = healthCheck.value;
  return update;
}

export function saveTimingOverrides(db: Database.Database, update: TimingUpdate): void {
  db.transaction(() => {
    if (update.processDelaySeconds !== undefined) {
      upsertSetting(db, "process_delay", update.processDelaySeconds);
    }
    if (update.healthCheckIntervalSeconds !== undefined) {
      upsertSetting(db, "health_check_interval", update.healthCheckIntervalSeconds);
    }
  })();
}
