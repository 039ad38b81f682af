import * as fs from "fs";
import * as path from "path";
import type Database from "better-sqlite3";
import type { IngestedPass } from "../contracts";
import { errorMessage } from "../lib/errors";
import { archiveDestination } from "../lib/pathSafety";
import { formatRfc3339, metadataToJson } from "../pipeline/metadata";
import type { CreatePostRequest, StationApi } from "./api/client";
import { insertPassAttempt, updatePassAttempt } from "./db/queries";
import type { PassAttemptUpdate } from "./db/types";
import type { Logger } from "./logger";
import type { ProcessedState } from "./processedState";

export type ArtifactKind = "cadu" | "cbor" | "image";

export interface UploadFailure {
  kind: ArtifactKind;
  file: string;
  error: string;
}

export interface UploadTally {
  succeeded: number;
  failures: UploadFailure[];
}

/**
 * What happened to one pass. Never thrown; every per-pass failure ends up
 * here.
 */
export type SubmissionOutcome =
  | { status: "post_failed"; passDir: string; error: string }
  | {
      status: "archived";
      passDir: string;
      postId: string;
      archivedPath: string;
      uploads: UploadTally;
    }
  | {
      status: "archive_failed";
      passDir: string;
      postId: string;
      uploads: UploadTally;
      error: string;
    };

export interface OrchestratorOptions {
  api: StationApi;
  tracker: ProcessedState;
  archiveRoot: string;
  logger: Logger;
  /** Station database for the submission ledger; null disables it */
  db?: Database.Database | null;
}

export function buildPostRequest(pass: IngestedPass): CreatePostRequest {
  return {
    timestamp: formatRfc3339(pass.record.timestamp),
    satellite_name: pass.record.satelliteName,
    metadata: metadataToJson(pass.record.metadata),
  };
}

/**
 * Submits one ingested pass: create the remote post, upload every artifact
 * best-effort, signal health, then move the directory into the archive.
 *
 * Only a failed post creation makes the directory eligible again. Once the
 * post exists the marker stays, whatever happens to uploads or the move.
 */
export class UploadOrchestrator {
  private readonly api: StationApi;
  private readonly tracker: ProcessedState;
  private readonly archiveRoot: string;
  private readonly log: Logger;
  private readonly db: Database.Database | null;

  constructor(options: OrchestratorOptions) {
    this.api = options.api;
    this.tracker = options.tracker;
    this.archiveRoot = options.archiveRoot;
    this.log = options.logger;
    this.db = options.db ?? null;
  }

  async submit(pass: IngestedPass): Promise<SubmissionOutcome> {
    const { passDir, record, artifacts } = pass;
    const attemptId = this.recordAttempt(pass);

    // --- Post ---
    let postId: string;
    try {
      const post = await this.api.createPost(buildPostRequest(pass));
      postId = post.id;
    } catch (err) {
      const error = errorMessage(err);
      this.log.error("Failed to create post", { path: passDir, error });
      this.tracker.clear(passDir);
      this.recordUpdate(attemptId, { status: "post_failed", error_msg: error });
      return { status: "post_failed", passDir, error };
    }

    this.log.info("Created post", {
      post_id: postId,
      satellite: record.satelliteName,
      timestamp: formatRfc3339(record.timestamp),
    });
    this.recordUpdate(attemptId, { status: "posted", post_id: postId });

    // --- Artifacts ---
    const uploads: UploadTally = { succeeded: 0, failures: [] };
    for (const cadu of artifacts.cadu) {
      await this.uploadOne(uploads, postId, "cadu", cadu, () => this.api.uploadCadu(postId, cadu));
    }
    const cbor = artifacts.cbor;
    if (cbor !== null) {
      await this.uploadOne(uploads, postId, "cbor", cbor, () => this.api.uploadCbor(postId, cbor));
    }
    for (const image of artifacts.images) {
      await this.uploadOne(uploads, postId, "image", image, () => this.api.uploadImage(postId, image));
    }

    // --- Health ---
    try {
      await this.api.stationHealth();
    } catch (err) {
      this.log.warn("Health check failed", { error: errorMessage(err) });
    }

    // --- Archive ---
    let archivedPath: string;
    try {
      archivedPath = archiveDestination(this.archiveRoot, passDir);
      fs.renameSync(passDir, archivedPath);
    } catch (err) {
      const error = errorMessage(err);
      this.log.error("Failed to archive pass", { path: passDir, error });
      this.recordUpdate(attemptId, {
        status: "archive_failed",
        uploads_ok: uploads.succeeded,
        uploads_failed: uploads.failures.length,
        error_msg: error,
      });
      return { status: "archive_failed", passDir, postId, uploads, error };
    }

    this.log.info("Archived pass", { path: archivedPath, post_id: postId });
    this.recordUpdate(attemptId, {
      status: "archived",
      uploads_ok: uploads.succeeded,
      uploads_failed: uploads.failures.length,
      archived_path: archivedPath,
      error_msg: uploads.failures.length > 0 ? summarizeFailures(uploads.failures) : null,
    });
    return { status: "archived", passDir, postId, archivedPath, uploads };
  }

  private async uploadOne(
    tally: UploadTally,
    postId: string,
    kind: ArtifactKind,
    file: string,
    upload: () => Promise<void>
  ): Promise<void> {
    try {
      await upload();
      tally.succeeded += 1;
      this.log.info(`Uploaded ${kind}`, { post_id: postId, file: path.basename(file) });
    } catch (err) {
      const error = errorMessage(err);
      tally.failures.push({ kind, file, error });
      this.log.error(`Failed to upload ${kind}`, { file, error });
    }
  }

  // --- Ledger ---

  private recordAttempt(pass: IngestedPass): number | null {
    if (!this.db) return null;
    try {
      return insertPassAttempt(this.db, {
        pass_dir: pass.passDir,
        pass_name: path.basename(pass.passDir),
        satellite_name: pass.record.satelliteName,
        captured_at: formatRfc3339(pass.record.timestamp),
        timestamp_source: pass.timestampSource,
      }).id;
    } catch (err) {
      this.log.warn("Could not record pass attempt", { error: errorMessage(err) });
      return null;
    }
  }

  private recordUpdate(attemptId: number | null, update: PassAttemptUpdate): void {
    if (!this.db || attemptId === null) return;
    try {
      updatePassAttempt(this.db, attemptId, update);
    } catch (err) {
      this.log.warn("Could not update pass attempt", { id: attemptId, error: errorMessage(err) });
    }
  }
}

function summarizeFailures(failures: readonly UploadFailure[]): string {
  return failures.map((f) => `${f.kind} ${path.basename(f.file)}: ${f.error}`).join("; ");
}
