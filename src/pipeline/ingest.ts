import * as fs from "fs";
import { classifyPassDir, collectArtifacts } from "./classify";
import { readDataset, type ParseDatasetOptions } from "./metadata";
import { readProductTimestamps } from "./productTimestamps";
import { ProductTimestampError, errorMessage } from "../lib/errors";
import type {
  IngestedPass,
  PassRecord,
  TimestampSource,
  ValidationResult,
} from "../contracts";

// Re-exported for callers that import from ingest.
export type { IngestedPass, PassRecord, ValidationResult };

export type IngestOptions = ParseDatasetOptions;

/**
 * Build the Pass Record and Artifact Set for a complete pass directory.
 *
 * Timestamp precedence: earliest product sample, then dataset.json, then the
 * clock. A product descriptor that yields no timestamp only adds a warning.
 * Throws MetadataError when dataset.json is unreadable or malformed.
 */
export function ingestPass(passDir: string, options: IngestOptions = {}): IngestedPass {
  const dataset = readDataset(passDir, options);
  const artifacts = collectArtifacts(passDir);
  const warnings = [...dataset.warnings];

  let timestamp = dataset.timestamp;
  let timestampSource: TimestampSource = dataset.timestampFromDataset ? "dataset" : "clock";

  if (artifacts.cbor) {
    try {
      timestamp = readProductTimestamps(artifacts.cbor).earliest;
      timestampSource = "product";
    } catch (err) {
      if (!(err instanceof ProductTimestampError)) throw err;
      warnings.push(
        `Failed to resolve product timestamps (${err.message}), using ${timestampSource} timestamp.`
      );
    }
  }

  const record: PassRecord = Object.freeze({
    timestamp,
    satelliteName: dataset.satelliteName,
    metadata: dataset.metadata,
  });

  return {
    passDir,
    record,
    artifacts,
    timestampSource,
    warnings,
  };
}

/**
 * Validate a pass directory without uploading anything.
 * Uses the same primitives as the dispatcher: classification, then ingest.
 */
export function validatePass(passDir: string, options: IngestOptions = {}): ValidationResult {
  const errors: string[] = [];

  if (!fs.existsSync(passDir)) {
    return {
      valid: false,
      classification: { complete: false, reason: "not_a_directory" },
      pass: null,
      errors: [`Pass folder not found: ${passDir}`],
      warnings: [],
    };
  }

  const classification = classifyPassDir(passDir);
  if (!classification.complete) {
    errors.push(`Not a complete pass (${classification.reason}).`);
  }

  // Without dataset.json there is nothing to extract.
  let pass: IngestedPass | null = null;
  if (classification.reason !== "missing_dataset" && classification.reason !== "not_a_directory") {
    try {
      pass = ingestPass(passDir, options);
    } catch (err) {
      errors.push(errorMessage(err));
    }
  }

  return {
    valid: errors.length === 0,
    classification,
    pass,
    errors,
    warnings: pass?.warnings ?? [],
  };
}
