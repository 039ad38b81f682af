import sharp from "sharp";

export const OCTET_STREAM = "application/octet-stream";
export const CBOR_CONTENT_TYPE = "application/cbor";
export const CADU_CONTENT_TYPE = OCTET_STREAM;

/** sharp format id -> MIME type */
const IMAGE_MIME_TYPES: Record<string, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
  gif: "image/gif",
  tiff: "image/tiff",
  avif: "image/avif",
  svg: "image/svg+xml",
};

/**
 * Content type of an image, taken from its decoded header rather than its
 * extension. Unreadable or unknown files fall back to octet-stream.
 */
export async function detectImageContentType(filePath: string): Promise<string> {
  let format: string | undefined;
  try {
    format = (await sharp(filePath).metadata()).format;
  } catch {
    return OCTET_STREAM;
  }
  return (format && IMAGE_MIME_TYPES[format]) || OCTET_STREAM;
}
