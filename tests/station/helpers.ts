import * as path from "path";
import { ApiError } from "../../src/lib/errors";
import type {
  CreatePostRequest,
  HealthResponse,
  PostResponse,
  StationApi,
} from "../../src/station/api/client";
import { createLogger, type Logger, type LogSink } from "../../src/station/logger";

/** Logger whose lines are kept for assertions instead of printed. */
export function memoryLogger(verbose = false): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const sink: LogSink = {
    log: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
  return { logger: createLogger({ sink, verbose }), lines };
}

/**
 * In-process stand-in for the collection service. Records every call as a
 * short string such as `image post-1 a.png`.
 */
export class FakeStationApi implements StationApi {
  readonly calls: string[] = [];
  readonly posts: CreatePostRequest[] = [];
  /** How many upcoming createPost calls fail */
  postFailures = 0;
  /** Basenames whose upload fails */
  readonly failingUploads = new Set<string>();
  healthFails = false;
  settings: Record<string, unknown> = {};
  stationId = "st-1";
  private nextId = 1;

  async createPost(req: CreatePostRequest): Promise<PostResponse> {
    this.calls.push(`post ${req.satellite_name}`);
    this.posts.push(req);
    if (this.postFailures > 0) {
      this.postFailures -= 1;
      throw new ApiError("API request failed with status 503: unavailable", 503, "unavailable");
    }
    const id = `post-${this.nextId}`;
    this.nextId += 1;
    return { id };
  }

  async uploadImage(postId: string, imagePath: string): Promise<void> {
    this.upload("image", postId, imagePath);
  }

  async uploadCbor(postId: string, cborPath: string): Promise<void> {
    this.upload("cbor", postId, cborPath);
  }

  async uploadCadu(postId: string, caduPath: string): Promise<void> {
    this.upload("cadu", postId, caduPath);
  }

  async stationHealth(): Promise<HealthResponse> {
    this.calls.push("health");
    if (this.healthFails) {
      throw new ApiError("health check failed with status 500: down", 500, "down");
    }
    return {
      status: "ok",
      station_id: this.stationId,
      timestamp: "2024-03-01T12:00:00Z",
      settings: this.settings,
    };
  }

  private upload(kind: string, postId: string, file: string): void {
    const name = path.basename(file);
    this.calls.push(`${kind} ${postId} ${name}`);
    if (this.failingUploads.has(name)) {
      throw new ApiError(`${kind} upload failed with status 500: nope`, 500, "nope");
    }
  }
}
