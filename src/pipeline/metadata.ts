import * as fs from "fs";
import * as path from "path";
import { MetadataError } from "../lib/errors";
import {
  DATASET_FILENAME,
  UNKNOWN_SATELLITE,
  type MetadataMap,
  type MetadataValue,
} from "../contracts";

// --- Constants ---

const TIMESTAMP_KEY = "timestamp";

/** Tried in order; the first non-empty string wins. */
const NAME_KEYS = ["satellite_name", "satellite", "name"] as const;

/** Keys lifted onto the Pass Record and therefore removed from the residual map. */
const CONSUMED_KEYS: ReadonlySet<string> = new Set([TIMESTAMP_KEY, ...NAME_KEYS]);

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

export interface DatasetFields {
  timestamp: Date;
  /** False when the clock fallback was used. */
  timestampFromDataset: boolean;
  satelliteName: string;
  metadata: MetadataMap;
  warnings: string[];
}

export interface ParseDatasetOptions {
  now?: () => Date;
}

// --- Tagged values ---

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a JSON.parse result into a tagged MetadataValue.
 * Anything JSON cannot produce is recorded as null.
 */
export function decodeMetadataValue(raw: unknown): MetadataValue {
  if (typeof raw === "string") return { kind: "string", value: raw };
  if (typeof raw === "number") return { kind: "number", value: raw };
  if (typeof raw === "boolean") return { kind: "boolean", value: raw };
  if (Array.isArray(raw)) {
    return { kind: "array", items: raw.map((item) => decodeMetadataValue(item)) };
  }
  if (isPlainObject(raw)) {
    return { kind: "object", fields: decodeMetadataMap(raw) };
  }
  return { kind: "null" };
}

function decodeMetadataMap(obj: Record<string, unknown>): MetadataMap {
  const map = new Map<string, MetadataValue>();
  for (const [key, value] of Object.entries(obj)) {
    map.set(key, decodeMetadataValue(value));
  }
  return map;
}

/** Inverse of decodeMetadataValue. */
export function encodeMetadataValue(value: MetadataValue): unknown {
  switch (value.kind) {
    case "string":
    case "number":
    case "boolean":
      return value.value;
    case "null":
      return null;
    case "array":
      return value.items.map((item) => encodeMetadataValue(item));
    case "object":
      return encodeMetadataMap(value.fields);
  }
}

export function encodeMetadataMap(map: MetadataMap): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of map) {
    out[key] = encodeMetadataValue(value);
  }
  return out;
}

/** JSON string sent as the post's `metadata` field. */
export function metadataToJson(map: MetadataMap): string {
  return JSON.stringify(encodeMetadataMap(map));
}

// --- Timestamps ---

/**
 * Parse an RFC 3339 date-time with a mandatory offset.
 * Returns null for anything else, including impossible calendar dates.
 */
export function parseRfc3339(input: string): Date | null {
  const match = RFC3339_PATTERN.exec(input);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const millis = frac ? Math.floor(Number(`0${frac}`) * 1000) : 0;
  // setUTCFullYear keeps years 0-99 literal where Date.UTC would map them to 19xx.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  // 2024-02-30 rolls over into March; reject instead.
  if (date.getUTCDate() !== day) return null;
  const utc = date.getTime();

  let offsetMinutes = 0;
  if (zone !== "Z") {
    const sign = zone.startsWith("-") ? -1 : 1;
    const [oh, om] = zone.slice(1).split(":").map(Number);
    if (oh > 23 || om > 59) return null;
    offsetMinutes = sign * (oh * 60 + om);
  }

  return new Date(utc - offsetMinutes * 60_000);
}

/** RFC 3339 in UTC at second precision, e.g. 2024-01-01T00:00:00Z. */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// --- dataset.json ---

/**
 * Turn the text of dataset.json into Pass Record fields.
 *
 * Malformed metadata policy:
 * - Invalid JSON -> MetadataError
 * - Not an object -> MetadataError
 * - Missing/unparseable timestamp -> current time + warning
 * - No usable name -> "Unknown"
 */
export function parseDataset(
  content: string,
  options: ParseDatasetOptions = {}
): DatasetFields {
  const now = options.now ?? (() => new Date());

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new MetadataError(`${DATASET_FILENAME} contains invalid JSON.`);
  }

  if (!isPlainObject(parsed)) {
    throw new MetadataError(`${DATASET_FILENAME} must be a JSON object.`);
  }

  const warnings: string[] = [];

  let timestamp: Date;
  let timestampFromDataset = false;
  const rawTimestamp = parsed[TIMESTAMP_KEY];
  if (typeof rawTimestamp === "string") {
    const parsedTimestamp = parseRfc3339(rawTimestamp);
    if (parsedTimestamp) {
      timestamp = parsedTimestamp;
      timestampFromDataset = true;
    } else {
      timestamp = now();
      warnings.push(`Invalid timestamp "${rawTimestamp}", using current time.`);
    }
  } else {
    timestamp = now();
    warnings.push("No timestamp found, using current time.");
  }

  let satelliteName = UNKNOWN_SATELLITE;
  for (const key of NAME_KEYS) {
    const candidate = parsed[key];
    if (typeof candidate === "string" && candidate.length > 0) {
      satelliteName = candidate;
      break;
    }
  }

  const residual = new Map<string, MetadataValue>();
  for (const [key, value] of Object.entries(parsed)) {
    if (CONSUMED_KEYS.has(key)) continue;
    residual.set(key, decodeMetadataValue(value));
  }

  return {
    timestamp,
    timestampFromDataset,
    satelliteName,
    metadata: residual,
    warnings,
  };
}

/** Read and parse `<passDir>/dataset.json`. */
export function readDataset(
  passDir: string,
  options: ParseDatasetOptions = {}
): DatasetFields {
  const datasetPath = path.join(passDir, DATASET_FILENAME);
  let content: string;
  try {
    content = fs.readFileSync(datasetPath, "utf-8");
  } catch {
    throw new MetadataError(`${DATASET_FILENAME} cannot be read: ${datasetPath}`);
  }
  return parseDataset(content, options);
}

/**
 * Optional descriptive fields worth a debug line: NORAD id, frequency,
 * modulation, dataset and product names.
 */
export function describeDataset(metadata: MetadataMap): Record<string, string | number> {
  const details: Record<string, string | number> = {};

  const norad = metadata.get("norad");
  if (norad?.kind === "number") details.norad_id = norad.value;

  const frequency = metadata.get("frequency");
  if (frequency?.kind === "number") details.frequency_mhz = frequency.value;

  const modulation = metadata.get("modulation");
  if (modulation?.kind === "string") details.modulation = modulation.value;

  for (const listKey of ["datasets", "products"]) {
    const list = metadata.get(listKey);
    if (list?.kind !== "array") continue;
    const names: string[] = [];
    for (const item of list.items) {
      if (item.kind !== "object") continue;
      const name = item.fields.get("name");
      if (name?.kind === "string") names.push(name.value);
    }
    details[listKey] = names.length > 0 ? names.join(",") : list.items.length;
  }

  return details;
}
