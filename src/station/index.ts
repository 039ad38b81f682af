import * as fs from "fs";
import type Database from "better-sqlite3";
import { errorMessage } from "../lib/errors";
import { VERSION } from "../version";
import { StationApiClient, type HealthResponse, type StationApi } from "./api/client";
import { maskToken, type StationConfig } from "./config";
import { ControlChannel } from "./control/channel";
import { controlChannelUrl, type StatusUpdatePayload } from "./control/messages";
import { openDatabase } from "./db/connection";
import { loadTimingOverrides, saveTimingOverrides } from "./db/queries";
import { ensureSchema } from "./db/schema";
import { DirectoryDetector } from "./detector";
import { PassDispatcher, type DispatchOutcome } from "./dispatcher";
import type { Logger } from "./logger";
import { Mailbox, type StationMessage } from "./mailbox";
import { ProcessedState } from "./processedState";
import { RuntimeSettings, timingFromServerSettings, type TimingUpdate } from "./runtimeSettings";
import { UploadOrchestrator } from "./uploader";

export interface StationDeps {
  /** Defaults to an HTTP client built from the config */
  api?: StationApi;
  mailbox?: Mailbox<StationMessage>;
  /** Defaults to opening `config.dbPath` */
  db?: Database.Database;
  onOutcome?: (outcome: DispatchOutcome) => void;
  /** Install SIGINT/SIGTERM handlers. Default true. */
  handleSignals?: boolean;
}

/** Exit code the supervisor should see. */
export type StationExit = 0 | 1;

/**
 * Run the station until a shutdown signal (exit 0) or a restart command
 * (exit 1). Startup failures are thrown.
 */
export async function runStation(
  config: StationConfig,
  logger: Logger,
  deps: StationDeps = {}
): Promise<StationExit> {
  const log = logger.child("station");
  const startedAt = Date.now();

  log.info("Starting", {
    version: VERSION,
    api_url: config.apiUrl,
    token: maskToken(config.stationToken),
    watch_paths: config.watchPaths.join(","),
    archive_dir: config.archiveDir,
  });

  // --- Persistence and settings ---
  const db = deps.db ?? openDatabase(config.dbPath);
  ensureSchema(db);

  const settings = new RuntimeSettings({
    processDelaySeconds: config.processDelaySeconds,
    healthCheckIntervalSeconds: config.healthCheckIntervalSeconds,
  });
  if (settings.apply(loadTimingOverrides(db))) {
    log.info("Applied stored timing overrides", settingsFields(settings));
  }

  fs.mkdirSync(config.archiveDir, { recursive: true });

  // --- Remote ---
  let client: StationApiClient | null = null;
  let api: StationApi;
  if (deps.api) {
    api = deps.api;
  } else {
    client = new StationApiClient({
      baseUrl: config.apiUrl,
      stationToken: config.stationToken,
      insecure: config.insecure,
    });
    api = client;
  }

  let health: HealthResponse;
  try {
    health = await api.stationHealth();
  } catch (err) {
    await client?.close();
    if (!deps.db) db.close();
    throw new Error(`Initial health check failed: ${errorMessage(err)}`);
  }
  log.info("Health check OK", { station_id: health.station_id, status: health.status });

  const mailbox = deps.mailbox ?? new Mailbox<StationMessage>();
  const applyUpdate = (update: TimingUpdate, source: string): boolean => {
    if (!settings.apply(update)) return false;
    saveTimingOverrides(db, update);
    log.info("Timing settings updated", { source, ...settingsFields(settings) });
    return true;
  };
  applyUpdate(timingFromServerSettings(health.settings), "health");

  // --- Pipeline ---
  const tracker = new ProcessedState();
  const orchestrator = new UploadOrchestrator({
    api,
    tracker,
    archiveRoot: config.archiveDir,
    logger: logger.child("upload"),
    db,
  });
  const dispatcher = new PassDispatcher({
    tracker,
    submitter: orchestrator,
    settings,
    logger: logger.child("dispatch"),
    onOutcome: deps.onOutcome,
  });
  const detector = new DirectoryDetector({
    roots: config.watchPaths,
    tracker,
    queue: dispatcher,
    logger: logger.child("watcher"),
  });
  await detector.start();

  // --- Control channel ---
  let channel: ControlChannel | null = null;
  if (config.controlChannel && health.station_id) {
    channel = new ControlChannel({
      url: controlChannelUrl(config.apiUrl, health.station_id),
      stationToken: config.stationToken,
      insecure: config.insecure,
      mailbox,
      logger: logger.child("control"),
      status: (): StatusUpdatePayload => ({
        version: VERSION,
        uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
        config: {
          health_check_interval: settings.snapshot().healthCheckIntervalSeconds,
          process_delay: settings.snapshot().processDelaySeconds,
        },
      }),
    });
    channel.start();
  } else if (config.controlChannel) {
    log.warn("Health response carried no station id, control channel disabled");
  }

  // --- Timers and signals ---
  let healthTimer = setInterval(() => mailbox.post({ type: "health_tick" }), settings.healthCheckIntervalMs);
  const sweepTimer = setInterval(
    () => mailbox.post({ type: "sweep_tick" }),
    config.sweepIntervalSeconds * 1000
  );
  const resetHealthTimer = (): void => {
    clearInterval(healthTimer);
    healthTimer = setInterval(() => mailbox.post({ type: "health_tick" }), settings.healthCheckIntervalMs);
  };

  const onSigint = (): void => mailbox.post({ type: "shutdown", signal: "SIGINT" });
  const onSigterm = (): void => mailbox.post({ type: "shutdown", signal: "SIGTERM" });
  const handleSignals = deps.handleSignals ?? true;
  if (handleSignals) {
    process.on("SIGINT", onSigint);
    process.on("SIGTERM", onSigterm);
  }

  log.info("Station running", settingsFields(settings));

  // --- Main loop ---
  let exitCode: StationExit | null = null;
  while (exitCode === null) {
    const message = await mailbox.next();
    switch (message.type) {
      case "health_tick":
        try {
          const result = await api.stationHealth();
          log.debug("Health check OK", { status: result.status });
          if (applyUpdate(timingFromServerSettings(result.settings), "health")) {
            resetHealthTimer();
          }
        } catch (err) {
          log.warn("Health check failed", { error: errorMessage(err) });
        }
        break;
      case "sweep_tick":
        detector.sweep();
        break;
      case "settings_changed":
        if (applyUpdate(message.update, "control")) {
          resetHealthTimer();
        }
        break;
      case "restart_requested":
        log.warn("Restart requested, shutting down");
        exitCode = 1;
        break;
      case "shutdown":
        log.info("Shutting down", { signal: message.signal });
        exitCode = 0;
        break;
    }
  }

  // --- Teardown ---
  clearInterval(healthTimer);
  clearInterval(sweepTimer);
  if (handleSignals) {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  }
  channel?.stop();
  await detector.stop();
  await dispatcher.stop();
  await client?.close();
  if (!deps.db) db.close();

  log.info("Stopped", { processed: tracker.size });
  return exitCode;
}

function settingsFields(settings: RuntimeSettings): Record<string, number> {
  const snap = settings.snapshot();
  return {
    process_delay: snap.processDelaySeconds,
    health_check_interval: snap.healthCheckIntervalSeconds,
  };
}
