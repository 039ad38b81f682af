import * as path from "path";
import { openAsBlob } from "fs";
import { Agent, FormData, fetch, type Dispatcher } from "undici";
import { ApiError, errorMessage } from "../../lib/errors";
import {
  CADU_CONTENT_TYPE,
  CBOR_CONTENT_TYPE,
  detectImageContentType,
} from "../../lib/contentType";

export const DEFAULT_TIMEOUT_MS = 30_000;

// --- Wire types ---

export interface CreatePostRequest {
  /** RFC 3339 */
  timestamp: string;
  satellite_name: string;
  /** JSON-encoded residual metadata */
  metadata: string;
}

export interface PostResponse {
  id: string;
  station_id?: string;
  station_name?: string;
  timestamp?: string;
  satellite_name?: string;
  created_at?: string;
}

export interface HealthResponse {
  status: string;
  station_id: string;
  timestamp: string;
  settings: Record<string, unknown>;
}

/** The slice of the collection service the station relies on. */
export interface StationApi {
  createPost(req: CreatePostRequest): Promise<PostResponse>;
  uploadImage(postId: string, imagePath: string): Promise<void>;
  uploadCbor(postId: string, cborPath: string): Promise<void>;
  uploadCadu(postId: string, caduPath: string): Promise<void>;
  stationHealth(): Promise<HealthResponse>;
}

export interface ApiClientOptions {
  baseUrl: string;
  stationToken: string;
  /** Skip TLS certificate verification */
  insecure?: boolean;
  timeoutMs?: number;
  /** Override for tests */
  fetchImpl?: typeof fetch;
}

// --- Response parsing ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/** Unwrap the `{ data: ... }` envelope every endpoint responds with. */
function unwrapData(text: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ApiError(`failed to decode ${what} response`);
  }
  if (!isRecord(parsed) || !isRecord(parsed.data)) {
    throw new ApiError(`unexpected ${what} response shape`);
  }
  return parsed.data;
}

export function parsePostResponse(text: string): PostResponse {
  const data = unwrapData(text, "post");
  const rawId = data.id;
  const id = typeof rawId === "string" || typeof rawId === "number" ? String(rawId) : "";
  if (id.length === 0) {
    throw new ApiError("post response is missing an id");
  }
  return {
    id,
    station_id: optionalString(data, "station_id"),
    station_name: optionalString(data, "station_name"),
    timestamp: optionalString(data, "timestamp"),
    satellite_name: optionalString(data, "satellite_name"),
    created_at: optionalString(data, "created_at"),
  };
}

export function parseHealthResponse(text: string): HealthResponse {
  const data = unwrapData(text, "health");
  return {
    status: optionalString(data, "status") ?? "",
    station_id: optionalString(data, "station_id") ?? "",
    timestamp: optionalString(data, "timestamp") ?? "",
    settings: isRecord(data.settings) ? data.settings : {},
  };
}

// --- Client ---

/**
 * HTTP client for the collection service. Every call carries the station
 * token and a fixed timeout; files are streamed from disk as multipart parts.
 */
export class StationApiClient implements StationApi {
  private readonly baseUrl: string;
  private readonly stationToken: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.stationToken = options.stationToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.dispatcher = options.insecure
      ? new Agent({ connect: { rejectUnauthorized: false } })
      : undefined;
  }

  async createPost(req: CreatePostRequest): Promise<PostResponse> {
    const { status, text } = await this.send("/api/posts", {
      body: JSON.stringify(req),
      headers: { "content-type": "application/json" },
    });
    if (status < 200 || status > 299) {
      throw new ApiError(`API request failed with status ${status}: ${text}`, status, text);
    }
    return parsePostResponse(text);
  }

  async uploadImage(postId: string, imagePath: string): Promise<void> {
    const contentType = await detectImageContentType(imagePath);
    await this.uploadFile(postId, "images", "image", imagePath, contentType);
  }

  async uploadCbor(postId: string, cborPath: string): Promise<void> {
    await this.uploadFile(postId, "cbor", "cbor", cborPath, CBOR_CONTENT_TYPE);
  }

  async uploadCadu(postId: string, caduPath: string): Promise<void> {
    await this.uploadFile(postId, "cadu", "cadu", caduPath, CADU_CONTENT_TYPE);
  }

  async stationHealth(): Promise<HealthResponse> {
    const { status, text } = await this.send("/api/stations/health", {});
    if (status !== 200) {
      throw new ApiError(`health check failed with status ${status}: ${text}`, status, text);
    }
    return parseHealthResponse(text);
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }

  private async uploadFile(
    postId: string,
    route: "images" | "cbor" | "cadu",
    field: string,
    filePath: string,
    contentType: string
  ): Promise<void> {
    let blob: Awaited<ReturnType<typeof openAsBlob>>;
    try {
      blob = await openAsBlob(filePath, { type: contentType });
    } catch (err) {
      throw new ApiError(`failed to open ${field} file: ${errorMessage(err)}`);
    }

    const form = new FormData();
    form.append(field, blob, path.basename(filePath));

    const { status, text } = await this.send(
      `/api/posts/${encodeURIComponent(postId)}/${route}`,
      { body: form }
    );
    if (status !== 201) {
      throw new ApiError(`${field} upload failed with status ${status}: ${text}`, status, text);
    }
  }

  private async send(
    route: string,
    init: { body?: string | FormData; headers?: Record<string, string> }
  ): Promise<{ status: number; text: string }> {
    const url = `${this.baseUrl}${route}`;
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        body: init.body,
        headers: {
          ...init.headers,
          authorization: `Station ${this.stationToken}`,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      return { status: response.status, text: await response.text() };
    } catch (err) {
      throw new ApiError(`failed to send request to ${route}: ${errorMessage(err)}`);
    }
  }
}
