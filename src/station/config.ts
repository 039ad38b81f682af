import * as dotenv from "dotenv";
import * as path from "path";
import { ConfigError } from "../lib/errors";

export const DEFAULT_HEALTH_CHECK_INTERVAL_SECONDS = 300;
export const DEFAULT_PROCESS_DELAY_SECONDS = 60;
export const DEFAULT_SWEEP_INTERVAL_SECONDS = 300;

export interface StationConfig {
  /** Station token sent as `Authorization: Station <token>` */
  stationToken: string;
  /** Collection service base URL (http or https) */
  apiUrl: string;
  /** Directories whose immediate children are candidate passes */
  watchPaths: string[];
  /** Completed passes are moved here, keeping their directory name */
  archiveDir: string;
  /** SQLite file for the pass ledger and runtime settings */
  dbPath: string;
  healthCheckIntervalSeconds: number;
  /** Wait before the first classification of a new directory */
  processDelaySeconds: number;
  /** Periodic re-sweep of the watch roots */
  sweepIntervalSeconds: number;
  /** Skip TLS certificate verification */
  insecure: boolean;
  verbose: boolean;
  /** Connect the live settings channel */
  controlChannel: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Load a .env file into process.env without overriding variables that are
 * already set. A missing file is not an error.
 */
export function loadEnvFile(envPath?: string): void {
  dotenv.config({
    path: envPath ?? path.resolve(process.cwd(), ".env"),
    override: false,
  });
}

function parsePositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`Invalid ${name}: must be a positive whole number of seconds.`);
  }
  return n;
}

function parseBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`Invalid ${name}: "${env[name]}". Use true or false.`);
}

/** Station database location; shared by `run` and `status`. */
export function dbPathFromEnv(env: Env = process.env): string {
  return path.resolve(env.PASSLINK_DB_PATH?.trim() || "./passlink.db");
}

export function loadConfig(env: Env = process.env): StationConfig {
  const stationToken = env.PASSLINK_STATION_TOKEN?.trim();
  if (!stationToken) {
    throw new ConfigError(
      "PASSLINK_STATION_TOKEN is not set. Add it to .env or set it as an environment variable."
    );
  }

  const apiUrl = env.PASSLINK_API_URL?.trim().replace(/\/+$/, "");
  if (!apiUrl) {
    throw new ConfigError("PASSLINK_API_URL is not set.");
  }
  if (!/^https?:\/\//i.test(apiUrl)) {
    throw new ConfigError(`Invalid PASSLINK_API_URL: "${apiUrl}". Must start with http:// or https://.`);
  }

  const watchPaths = (env.PASSLINK_WATCH_PATHS ?? "./data")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => path.resolve(s));

  const archiveDir = path.resolve(env.PASSLINK_ARCHIVE_DIR?.trim() || "./processed");
  const dbPath = dbPathFromEnv(env);

  return {
    stationToken,
    apiUrl,
    watchPaths,
    archiveDir,
    dbPath,
    healthCheckIntervalSeconds: parsePositiveInt(
      env,
      "PASSLINK_HEALTH_CHECK_INTERVAL",
      DEFAULT_HEALTH_CHECK_INTERVAL_SECONDS
    ),
    processDelaySeconds: parsePositiveInt(env, "PASSLINK_PROCESS_DELAY", DEFAULT_PROCESS_DELAY_SECONDS),
    sweepIntervalSeconds: parsePositiveInt(
      env,
      "PASSLINK_SWEEP_INTERVAL",
      DEFAULT_SWEEP_INTERVAL_SECONDS
    ),
    insecure: parseBool(env, "PASSLINK_INSECURE", false),
    verbose: parseBool(env, "PASSLINK_VERBOSE", false),
    controlChannel: parseBool(env, "PASSLINK_CONTROL_CHANNEL", true),
  };
}

/** Show enough of a token to recognize it in logs. */
export function maskToken(token: string): string {
  if (token.length <= 12) return "*".repeat(token.length);
  return token.slice(0, 8) + "*".repeat(token.length - 12) + token.slice(-4);
}
