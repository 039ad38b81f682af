import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { ingestPass } from "../../src/pipeline/ingest";
import { ensureSchema } from "../../src/station/db/schema";
import { listPassesForDir } from "../../src/station/db/queries";
import { ProcessedState } from "../../src/station/processedState";
import { UploadOrchestrator, buildPostRequest } from "../../src/station/uploader";
import { cleanup, createTempRoot, createTestPass } from "../fixtures";
import { FakeStationApi, memoryLogger } from "./helpers";

describe("UploadOrchestrator", () => {
  let root: string;
  let watchRoot: string;
  let archiveRoot: string;
  let db: Database.Database;
  let api: FakeStationApi;
  let tracker: ProcessedState;
  let orchestrator: UploadOrchestrator;

  async function preparePass(): Promise<string> {
    const passDir = await createTestPass(watchRoot, {
      name: "pass1",
      dataset: { satellite_name: "NOAA-19", timestamp: "2024-01-01T00:00:00Z" },
      cadu: ["frames.cadu"],
      products: [{ dir: "IMG", timestamps: [-1, 100], images: ["a.png", "b.png", "c.png"] }],
    });
    tracker.markInProgress(passDir);
    return passDir;
  }

  beforeEach(() => {
    root = createTempRoot();
    watchRoot = path.join(root, "data");
    archiveRoot = path.join(root, "processed");
    fs.mkdirSync(watchRoot);
    fs.mkdirSync(archiveRoot);
    db = new Database(":memory:");
    ensureSchema(db);
    api = new FakeStationApi();
    tracker = new ProcessedState();
    orchestrator = new UploadOrchestrator({
      api,
      tracker,
      archiveRoot,
      logger: memoryLogger().logger,
      db,
    });
  });

  afterEach(() => {
    db.close();
    cleanup(root);
  });

  it("posts, uploads every artifact in order, signals health, then archives", async () => {
    const passDir = await preparePass();

    const outcome = await orchestrator.submit(ingestPass(passDir));

    expect(outcome).toEqual({
      status: "archived",
      passDir,
      postId: "post-1",
      archivedPath: path.join(archiveRoot, "pass1"),
      uploads: { succeeded: 5, failures: [] },
    });
    expect(api.calls).toEqual([
      "post NOAA-19",
      "cadu post-1 frames.cadu",
      "cbor post-1 product.cbor",
      "image post-1 a.png",
      "image post-1 b.png",
      "image post-1 c.png",
      "health",
    ]);
    expect(api.posts[0]).toEqual({
      timestamp: "1970-01-01T00:01:40Z",
      satellite_name: "NOAA-19",
      metadata: "{}",
    });
    expect(fs.existsSync(passDir)).toBe(false);
    expect(fs.existsSync(path.join(archiveRoot, "pass1", "IMG", "product.cbor"))).toBe(true);
    expect(tracker.isMarked(passDir)).toBe(true);
  });

  it("keeps going when one of three images fails and still archives", async () => {
    const passDir = await preparePass();
    api.failingUploads.add("b.png");

    const outcome = await orchestrator.submit(ingestPass(passDir));

    expect(outcome.status).toBe("archived");
    expect(api.calls.filter((c) => c.startsWith("image"))).toEqual([
      "image post-1 a.png",
      "image post-1 b.png",
      "image post-1 c.png",
    ]);
    if (outcome.status !== "archived") return;
    expect(outcome.uploads.succeeded).toBe(4);
    expect(outcome.uploads.failures).toEqual([
      {
        kind: "image",
        file: path.join(passDir, "IMG", "b.png"),
        error: "image upload failed with status 500: nope",
      },
    ]);

    const [row] = listPassesForDir(db, passDir);
    expect(row.status).toBe("archived");
    expect(row.uploads_ok).toBe(4);
    expect(row.uploads_failed).toBe(1);
    expect(row.error_msg).toBe("image b.png: image upload failed with status 500: nope");
    expect(row.archived_path).toBe(path.join(archiveRoot, "pass1"));
  });

  it("clears the marker and leaves the directory when post creation fails", async () => {
    const passDir = await preparePass();
    api.postFailures = 1;

    const outcome = await orchestrator.submit(ingestPass(passDir));

    expect(outcome).toEqual({
      status: "post_failed",
      passDir,
      error: "API request failed with status 503: unavailable",
    });
    expect(api.calls).toEqual(["post NOAA-19"]);
    expect(tracker.isMarked(passDir)).toBe(false);
    expect(fs.existsSync(passDir)).toBe(true);
    expect(fs.readdirSync(archiveRoot)).toEqual([]);

    const [row] = listPassesForDir(db, passDir);
    expect(row.status).toBe("post_failed");
    expect(row.post_id).toBeNull();
    expect(row.error_msg).toBe("API request failed with status 503: unavailable");
  });

  it("keeps the marker when the archive move fails", async () => {
    const passDir = await preparePass();
    fs.rmSync(archiveRoot, { recursive: true });
    fs.writeFileSync(archiveRoot, "not a directory");

    const outcome = await orchestrator.submit(ingestPass(passDir));

    expect(outcome.status).toBe("archive_failed");
    expect(tracker.isMarked(passDir)).toBe(true);
    expect(fs.existsSync(passDir)).toBe(true);
    expect(listPassesForDir(db, passDir)[0].status).toBe("archive_failed");
  });

  it("treats a failed health signal as non-fatal", async () => {
    const passDir = await preparePass();
    api.healthFails = true;

    const outcome = await orchestrator.submit(ingestPass(passDir));

    expect(outcome.status).toBe("archived");
  });

  it("posts the dataset time when every product timestamp is out of range", async () => {
    const passDir = await createTestPass(watchRoot, {
      name: "pass-range",
      dataset: { satellite_name: "NOAA-19", timestamp: "2024-01-01T00:00:00Z" },
      products: [{ dir: "IMG", timestamps: [-1, 1e20] }],
    });
    tracker.markInProgress(passDir);
    const pass = ingestPass(passDir);

    const outcome = await orchestrator.submit(pass);

    expect(pass.timestampSource).toBe("dataset");
    expect(outcome.status).toBe("archived");
    expect(api.posts.map((p) => p.timestamp)).toEqual(["2024-01-01T00:00:00Z"]);
  });

  it("works without a ledger", async () => {
    const passDir = await preparePass();
    const bare = new UploadOrchestrator({ api, tracker, archiveRoot, logger: memoryLogger().logger });

    const outcome = await bare.submit(ingestPass(passDir));

    expect(outcome.status).toBe("archived");
    expect(listPassesForDir(db, passDir)).toEqual([]);
  });
});

describe("buildPostRequest", () => {
  let root: string;

  afterEach(() => cleanup(root));

  it("formats the capture time and serializes residual metadata", async () => {
    root = createTempRoot();
    const passDir = await createTestPass(root, {
      dataset: { satellite: "METEOR-M2", timestamp: "2024-06-01T08:30:00+02:00", modulation: "LRPT" },
    });

    expect(buildPostRequest(ingestPass(passDir))).toEqual({
      timestamp: "2024-06-01T06:30:00Z",
      satellite_name: "METEOR-M2",
      metadata: '{"modulation":"LRPT"}',
    });
  });
});
