import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { FormData, Response, type fetch } from "undici";
import {
  StationApiClient,
  parseHealthResponse,
  parsePostResponse,
} from "../../src/station/api/client";
import { ApiError } from "../../src/lib/errors";
import { cleanup, createTempRoot, writePng } from "../fixtures";

type FetchMock = Mock<typeof fetch>;

function respondWith(status: number, body: string): FetchMock {
  return vi.fn<typeof fetch>().mockImplementation(async () => new Response(body, { status }));
}

function client(fetchImpl: FetchMock): StationApiClient {
  return new StationApiClient({
    baseUrl: "https://collect.example.test/",
    stationToken: "test-secret",
    fetchImpl,
  });
}

function sentForm(fetchImpl: FetchMock): FormData {
  const body = fetchImpl.mock.calls[0][1]?.body;
  if (!(body instanceof FormData)) {
    throw new Error("expected a multipart body");
  }
  return body;
}

describe("StationApiClient.createPost", () => {
  it("posts JSON with the station token and unwraps the id", async () => {
    const fetchImpl = respondWith(201, JSON.stringify({ data: { id: "post-1", station_id: "st-1" } }));
    const req = { timestamp: "1970-01-01T00:01:40Z", satellite_name: "NOAA-19", metadata: "{}" };

    const post = await client(fetchImpl).createPost(req);

    expect(post.id).toBe("post-1");
    expect(post.station_id).toBe("st-1");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://collect.example.test/api/posts");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "content-type": "application/json",
      authorization: "Station test-secret",
    });
    expect(init?.body).toBe(JSON.stringify(req));
  });

  it("accepts any 2xx status and numeric ids", async () => {
    const fetchImpl = respondWith(200, JSON.stringify({ data: { id: 42 } }));
    const post = await client(fetchImpl).createPost({ timestamp: "t", satellite_name: "s", metadata: "{}" });
    expect(post.id).toBe("42");
  });

  it("throws ApiError carrying status and body on failure", async () => {
    const fetchImpl = respondWith(500, "boom");
    const err = await client(fetchImpl)
      .createPost({ timestamp: "t", satellite_name: "s", metadata: "{}" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    if (!(err instanceof ApiError)) return;
    expect(err.message).toBe("API request failed with status 500: boom");
    expect(err.status).toBe(500);
    expect(err.body).toBe("boom");
  });

  it("wraps transport failures", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error("connect ECONNREFUSED"));
    await expect(
      client(fetchImpl).createPost({ timestamp: "t", satellite_name: "s", metadata: "{}" })
    ).rejects.toThrow("failed to send request to /api/posts: connect ECONNREFUSED");
  });

  it("rejects a response without the data envelope", async () => {
    const fetchImpl = respondWith(201, JSON.stringify({ id: "post-1" }));
    await expect(
      client(fetchImpl).createPost({ timestamp: "t", satellite_name: "s", metadata: "{}" })
    ).rejects.toThrow("unexpected post response shape");
  });
});

describe("StationApiClient uploads", () => {
  let root: string;

  beforeEach(() => {
    root = createTempRoot();
  });

  afterEach(() => cleanup(root));

  it("uploads the product descriptor as application/cbor", async () => {
    const file = path.join(root, "product.cbor");
    fs.writeFileSync(file, Buffer.from([0xa0]));
    const fetchImpl = respondWith(201, "");

    await client(fetchImpl).uploadCbor("post-1", file);

    expect(fetchImpl.mock.calls[0][0]).toBe("https://collect.example.test/api/posts/post-1/cbor");
    const part = sentForm(fetchImpl).get("cbor");
    expect(part).not.toBeNull();
    if (part === null || typeof part === "string") return;
    expect(part.name).toBe("product.cbor");
    expect(part.type).toBe("application/cbor");
  });

  it("uploads images with the detected content type", async () => {
    const file = path.join(root, "rgb.png");
    await writePng(file);
    const fetchImpl = respondWith(201, "");

    await client(fetchImpl).uploadImage("post-1", file);

    expect(fetchImpl.mock.calls[0][0]).toBe("https://collect.example.test/api/posts/post-1/images");
    const part = sentForm(fetchImpl).get("image");
    if (part === null || typeof part === "string") throw new Error("missing image part");
    expect(part.type).toBe("image/png");
    expect(part.name).toBe("rgb.png");
  });

  it("requires 201 for uploads", async () => {
    const file = path.join(root, "frames.cadu");
    fs.writeFileSync(file, "frames");
    const fetchImpl = respondWith(200, "ok");

    await expect(client(fetchImpl).uploadCadu("post-1", file)).rejects.toThrow(
      "cadu upload failed with status 200: ok"
    );
  });

  it("fails before sending when the file is missing", async () => {
    const fetchImpl = respondWith(201, "");
    await expect(client(fetchImpl).uploadCadu("post-1", path.join(root, "absent.cadu"))).rejects.toThrow(
      /failed to open cadu file/
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe("StationApiClient.stationHealth", () => {
  it("returns status and settings", async () => {
    const fetchImpl = respondWith(
      200,
      JSON.stringify({
        data: {
          status: "ok",
          station_id: "st-1",
          timestamp: "2024-03-01T12:00:00Z",
          settings: { process_delay: 30 },
        },
      })
    );

    const health = await client(fetchImpl).stationHealth();

    expect(health).toEqual({
      status: "ok",
      station_id: "st-1",
      timestamp: "2024-03-01T12:00:00Z",
      settings: { process_delay: 30 },
    });
    expect(fetchImpl.mock.calls[0][0]).toBe("https://collect.example.test/api/stations/health");
    expect(fetchImpl.mock.calls[0][1]?.body).toBeUndefined();
  });

  it("requires exactly 200", async () => {
    const fetchImpl = respondWith(202, "");
    await expect(client(fetchImpl).stationHealth()).rejects.toThrow("health check failed with status 202: ");
  });
});

describe("response parsing", () => {
  it("rejects invalid JSON", () => {
    expect(() => parsePostResponse("<html>")).toThrow("failed to decode post response");
  });

  it("rejects a post without an id", () => {
    expect(() => parsePostResponse(JSON.stringify({ data: { id: "" } }))).toThrow(
      "post response is missing an id"
    );
  });

  it("defaults missing health fields", () => {
    expect(parseHealthResponse(JSON.stringify({ data: {} }))).toEqual({
      status: "",
      station_id: "",
      timestamp: "",
      settings: {},
    });
  });
});
