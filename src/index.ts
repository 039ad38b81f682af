#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { parseArgs, USAGE, type ParsedArgs } from "./cli/parseArgs";
import { ConfigError, UsageError, errorMessage } from "./lib/errors";
import { formatRfc3339, metadataToJson } from "./pipeline/metadata";
import { validatePass } from "./pipeline/ingest";
import { dbPathFromEnv, loadConfig, loadEnvFile } from "./station/config";
import { openDatabase } from "./station/db/connection";
import { countPassesByStatus, listRecentPasses } from "./station/db/queries";
import { ensureSchema } from "./station/db/schema";
import { runStation } from "./station";
import { createLogger } from "./station/logger";
import { VERSION } from "./version";

// --- Validate Command ---

function runValidate(passDir: string): number {
  const result = validatePass(passDir);

  for (const w of result.warnings) {
    console.error(`Warning: ${w}`);
  }
  for (const e of result.errors) {
    console.error(`Error: ${e}`);
  }

  const pass = result.pass;
  if (pass) {
    const { record, artifacts } = pass;
    console.log(`Satellite: ${record.satelliteName}`);
    console.log(`Timestamp: ${formatRfc3339(record.timestamp)} (${pass.timestampSource})`);
    console.log(`Metadata:  ${metadataToJson(record.metadata)}`);
    for (const cadu of artifacts.cadu) {
      console.log(`CADU:      ${path.relative(passDir, cadu)}`);
    }
    if (artifacts.cbor) {
      console.log(`Product:   ${path.relative(passDir, artifacts.cbor)}`);
    }
    for (const image of artifacts.images) {
      console.log(`Image:     ${path.relative(passDir, image)}`);
    }
  }

  if (result.valid) {
    console.log(`Validation passed: ${passDir}`);
    return 0;
  }
  console.error(`Validation failed: ${passDir}`);
  return 1;
}

// --- Status Command ---

function runStatus(limit: number): number {
  const dbPath = dbPathFromEnv();
  if (!fs.existsSync(dbPath)) {
    console.log(`No station database at ${dbPath}`);
    return 0;
  }

  const db = openDatabase(dbPath);
  try {
    ensureSchema(db);
    const counts = countPassesByStatus(db);
    const summary = Object.entries(counts)
      .map(([status, n]) => `${status}=${n}`)
      .join(" ");
    console.log(`Passes: ${summary || "none"}`);

    for (const row of listRecentPasses(db, limit)) {
      const post = row.post_id ? ` post=${row.post_id}` : "";
      const error = row.error_msg ? ` error="${row.error_msg}"` : "";
      console.log(
        `${row.created_at}  ${row.status.padEnd(14)} ${row.satellite_name} ${row.captured_at} ${row.pass_name}${post}${error}`
      );
    }
  } finally {
    db.close();
  }
  return 0;
}

// --- Main ---

async function execute(parsed: ParsedArgs): Promise<number> {
  switch (parsed.command) {
    case "version":
      console.log(`passlink ${VERSION}`);
      return 0;
    case "validate":
      return runValidate(parsed.passDir);
    case "status":
      loadEnvFile(parsed.envFile ?? undefined);
      return runStatus(parsed.limit);
    case "run": {
      loadEnvFile(parsed.envFile ?? undefined);
      const config = loadConfig();
      const logger = createLogger({ verbose: config.verbose });
      return runStation(config, logger);
    }
  }
}

async function main(): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }

  try {
    process.exit(await execute(parsed));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Error: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
