import type { TimestampSource } from "../../contracts";

export type PassStatus = "posting" | "post_failed" | "posted" | "archived" | "archive_failed";

export interface PassRow {
  id: number;
  pass_dir: string;
  pass_name: string;
  satellite_name: string;
  /** RFC 3339, UTC */
  captured_at: string;
  timestamp_source: TimestampSource;
  post_id: string | null;
  status: PassStatus;
  uploads_ok: number;
  uploads_failed: number;
  archived_path: string | null;
  error_msg: string | null;
  created_at: string;
  updated_at: string;
}

export interface NewPassAttempt {
  pass_dir: string;
  pass_name: string;
  satellite_name: string;
  captured_at: string;
  timestamp_source: TimestampSource;
}

export interface PassAttemptUpdate {
  status: PassStatus;
  post_id?: string | null;
  uploads_ok?: number;
  uploads_failed?: number;
  archived_path?: string | null;
  error_msg?: string | null;
}

export type SettingKey = "process_delay" | "health_check_interval";

export interface SettingRow {
  key: SettingKey;
  value: number;
  updated_at: string;
}
