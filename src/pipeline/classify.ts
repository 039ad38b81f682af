import * as fs from "fs";
import * as path from "path";
import {
  CADU_SUFFIX,
  DATASET_FILENAME,
  IMAGE_SUFFIX,
  PRODUCT_FILENAME,
  type ArtifactSet,
  type Classification,
} from "../contracts";

// --- Directory primitives ---

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Directory entries sorted by name; empty when the directory cannot be read. */
function readEntries(dir: string): fs.Dirent[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch {
    return [];
  }
}

function caduFiles(passDir: string): string[] {
  return readEntries(passDir)
    .filter((e) => !e.isDirectory() && e.name.endsWith(CADU_SUFFIX))
    .map((e) => path.join(passDir, e.name));
}

/** Immediate subdirectories that hold a product descriptor. */
function productDirs(passDir: string): string[] {
  return readEntries(passDir)
    .filter((e) => e.isDirectory())
    .map((e) => path.join(passDir, e.name))
    .filter((dir) => isFile(path.join(dir, PRODUCT_FILENAME)));
}

// --- Public API ---

/**
 * Decide whether a directory is a finished pass.
 *
 * dataset.json is mandatory. Beyond that, either a root-level raw-frame file
 * or a product subdirectory with a descriptor makes the pass complete.
 * An incomplete directory is not an error; the caller retries later.
 */
export function classifyPassDir(passDir: string): Classification {
  if (!isDirectory(passDir)) {
    return { complete: false, reason: "not_a_directory" };
  }

  if (!isFile(path.join(passDir, DATASET_FILENAME))) {
    return { complete: false, reason: "missing_dataset" };
  }

  if (caduFiles(passDir).length > 0) {
    return { complete: true, reason: "complete_cadu" };
  }

  if (productDirs(passDir).length > 0) {
    return { complete: true, reason: "complete_product" };
  }

  return { complete: false, reason: "no_artifacts" };
}

export function isCompletePass(passDir: string): boolean {
  return classifyPassDir(passDir).complete;
}

/**
 * Discover everything uploadable under a pass directory.
 * The first product directory (by name) supplies the descriptor; images are
 * gathered from every product directory.
 */
export function collectArtifacts(passDir: string): ArtifactSet {
  const cadu = caduFiles(passDir);
  const products = productDirs(passDir);

  const images: string[] = [];
  for (const dir of products) {
    for (const entry of readEntries(dir)) {
      if (!entry.isDirectory() && entry.name.endsWith(IMAGE_SUFFIX)) {
        images.push(path.join(dir, entry.name));
      }
    }
  }

  return {
    cadu,
    cbor: products.length > 0 ? path.join(products[0], PRODUCT_FILENAME) : null,
    images,
  };
}
