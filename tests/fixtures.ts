import sharp from "sharp";
import { Encoder } from "cbor-x";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

const cborEncoder = new Encoder({ useRecords: false });

export interface TestProductOptions {
  /** Subdirectory name, default "product" */
  dir?: string;
  /** Value of the `timestamps` array; omitted when undefined */
  timestamps?: unknown[];
  /** Write these bytes instead of an encoded descriptor */
  raw?: Buffer;
  /** PNG files to add beside the descriptor */
  images?: string[];
}

export interface TestPassOptions {
  /** Directory name under the root, default "pass1" */
  name?: string;
  /**
   * dataset.json content: an object is serialized, a string is written
   * verbatim, null skips the file.
   */
  dataset?: Record<string, unknown> | string | null;
  /** Root-level raw frame files */
  cadu?: string[];
  products?: TestProductOptions[];
}

/** Create an empty temporary directory. Caller is responsible for cleanup. */
export function createTempRoot(prefix = "passlink-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export async function writePng(filePath: string): Promise<void> {
  const png = await sharp({
    create: {
      width: 16,
      height: 8,
      channels: 3,
      background: { r: 20, g: 40, b: 160 },
    },
  })
    .png()
    .toBuffer();
  fs.writeFileSync(filePath, png);
}

export function writeProductDescriptor(filePath: string, value: unknown): void {
  fs.writeFileSync(filePath, cborEncoder.encode(value));
}

/**
 * Create a synthetic pass directory under `root` and return its path.
 *
 * Default: dataset.json naming NOAA-19 and one root-level .cadu file.
 */
export async function createTestPass(root: string, options: TestPassOptions = {}): Promise<string> {
  const passDir = path.join(root, options.name ?? "pass1");
  fs.mkdirSync(passDir, { recursive: true });

  const dataset =
    options.dataset === undefined
      ? { timestamp: "2024-03-01T12:00:00Z", satellite_name: "NOAA-19" }
      : options.dataset;
  if (typeof dataset === "string") {
    fs.writeFileSync(path.join(passDir, "dataset.json"), dataset);
  } else if (dataset !== null) {
    fs.writeFileSync(path.join(passDir, "dataset.json"), JSON.stringify(dataset));
  }

  const cadu = options.cadu ?? (options.products ? [] : ["frames.cadu"]);
  for (const name of cadu) {
    fs.writeFileSync(path.join(passDir, name), Buffer.from([0x1a, 0xcf, 0xfc, 0x1d]));
  }

  for (const product of options.products ?? []) {
    const productDir = path.join(passDir, product.dir ?? "product");
    fs.mkdirSync(productDir, { recursive: true });
    const descriptorPath = path.join(productDir, "product.cbor");
    if (product.raw) {
      fs.writeFileSync(descriptorPath, product.raw);
    } else {
      writeProductDescriptor(
        descriptorPath,
        product.timestamps === undefined ? { instrument: "test" } : { timestamps: product.timestamps }
      );
    }
    for (const image of product.images ?? []) {
      await writePng(path.join(productDir, image));
    }
  }

  return passDir;
}

/**
 * Remove a test directory and all contents.
 */
export function cleanup(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
