import * as fs from "fs";
import { decode } from "cbor-x";
import { ProductTimestampError, errorMessage } from "../lib/errors";

/** Per-sample marker for "no timestamp captured". */
export const MISSING_TIMESTAMP = -1;

/** Largest epoch-millisecond magnitude a Date can hold. */
const MAX_DATE_MS = 8.64e15;

export interface ProductTimestamps {
  /** Earliest valid sample, truncated to the epoch second. */
  earliest: Date;
  total: number;
  valid: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A usable epoch-seconds sample: a finite number other than -1 whose
 * whole-second value a Date can represent.
 */
export function isValidTimestamp(ts: unknown): ts is number {
  if (typeof ts !== "number" || !Number.isFinite(ts)) return false;
  if (ts === MISSING_TIMESTAMP) return false;
  return Math.abs(Math.trunc(ts) * 1000) <= MAX_DATE_MS;
}

/**
 * Pick the earliest valid epoch-seconds value from a product's timestamp list.
 * Returns null when nothing valid remains.
 */
export function earliestTimestamp(timestamps: readonly unknown[]): number | null {
  let earliest: number | null = null;
  for (const ts of timestamps) {
    if (!isValidTimestamp(ts)) continue;
    if (earliest === null || ts < earliest) earliest = ts;
  }
  return earliest;
}

/** Extract the capture time from already-decoded product data. */
export function resolveProductTimestamps(product: unknown): ProductTimestamps {
  let timestamps: unknown;
  if (product instanceof Map) {
    timestamps = product.get("timestamps");
  } else if (isRecord(product)) {
    timestamps = product.timestamps;
  } else {
    throw new ProductTimestampError("product descriptor is not a map");
  }

  if (!Array.isArray(timestamps) || timestamps.length === 0) {
    throw new ProductTimestampError("no timestamps found in product descriptor");
  }

  const earliest = earliestTimestamp(timestamps);
  if (earliest === null) {
    throw new ProductTimestampError("no valid timestamps found in product descriptor");
  }

  const valid = timestamps.filter(isValidTimestamp).length;

  return {
    earliest: new Date(Math.trunc(earliest) * 1000),
    total: timestamps.length,
    valid,
  };
}

/**
 * Read `product.cbor` and resolve its earliest capture time.
 * Throws ProductTimestampError when the file is unreadable, undecodable,
 * or holds no valid timestamp.
 */
export function readProductTimestamps(cborPath: string): ProductTimestamps {
  let data: Buffer;
  try {
    data = fs.readFileSync(cborPath);
  } catch (err) {
    throw new ProductTimestampError(
      `failed to open product descriptor: ${errorMessage(err)}`
    );
  }

  let product: unknown;
  try {
    product = decode(data);
  } catch (err) {
    throw new ProductTimestampError(
      `failed to parse product descriptor: ${errorMessage(err)}`
    );
  }

  return resolveProductTimestamps(product);
}
