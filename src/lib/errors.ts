/**
 * Error classes shared across the pipeline and the station service.
 * Callers narrow with `instanceof`; every class sets `name` so log lines
 * stay readable after serialization.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** dataset.json could not be read, is not JSON, or is not an object. */
export class MetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetadataError";
  }
}

/** product.cbor yielded no usable capture time. */
export class ProductTimestampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProductTimestampError";
  }
}

/** Non-success response (or transport failure) from the collection service. */
export class ApiError extends Error {
  readonly status: number | null;
  readonly body: string;

  constructor(message: string, status: number | null = null, body = "") {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.body = body;
  }
}

/** A computed path would land outside the directory it belongs to. */
export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
