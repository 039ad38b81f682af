/**
 * Shared contract types for the passlink pipeline.
 * Pipeline and station modules import shared types from here.
 */

// --- Well-known names ---

/** Declarative metadata document; its absence means "not a pass yet". */
export const DATASET_FILENAME = "dataset.json";

/** Binary product descriptor inside a product subdirectory. */
export const PRODUCT_FILENAME = "product.cbor";

export const CADU_SUFFIX = ".cadu";
export const IMAGE_SUFFIX = ".png";

/** Satellite name used when dataset.json names none. */
export const UNKNOWN_SATELLITE = "Unknown";

// --- Metadata ---

/**
 * One decoded value of dataset.json. Tagged so that consumers switch on
 * `kind` instead of probing `typeof` on loose JSON.
 */
export type MetadataValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "array"; items: readonly MetadataValue[] }
  | { kind: "object"; fields: MetadataMap };

/** Insertion-ordered, string-keyed metadata. */
export type MetadataMap = ReadonlyMap<string, MetadataValue>;

// --- Pass Record ---

export interface PassRecord {
  /** Capture time; the product descriptor wins over dataset.json. */
  readonly timestamp: Date;
  readonly satelliteName: string;
  /** Everything in dataset.json except timestamp and the three name keys. */
  readonly metadata: MetadataMap;
}

// --- Artifacts ---

export interface ArtifactSet {
  /** Raw-frame files at the pass root. */
  readonly cadu: readonly string[];
  /** First product descriptor found, if any. */
  readonly cbor: string | null;
  /** Raster images from every product subdirectory holding a descriptor. */
  readonly images: readonly string[];
}

// --- Classification ---

export type CompletenessReason =
  | "complete_cadu"
  | "complete_product"
  | "missing_dataset"
  | "no_artifacts"
  | "not_a_directory";

export interface Classification {
  complete: boolean;
  reason: CompletenessReason;
}

// --- Ingest ---

export type TimestampSource = "product" | "dataset" | "clock";

export interface IngestedPass {
  passDir: string;
  record: PassRecord;
  artifacts: ArtifactSet;
  timestampSource: TimestampSource;
  warnings: string[];
}

// --- Validation Result ---

export interface ValidationResult {
  valid: boolean;
  classification: Classification;
  pass: IngestedPass | null;
  errors: string[];
  warnings: string[];
}
