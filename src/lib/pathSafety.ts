import * as path from "path";
import { PathEscapeError } from "./errors";

/**
 * Verify that a path is contained within the anchor directory.
 * Both are resolved before comparison.
 *
 * Throws if the resolved path escapes the anchor.
 */
export function assertResolvedContainedIn(
  candidate: string,
  anchor: string,
  label: string
): void {
  const resolvedAnchor = path.resolve(anchor);
  const normalizedPath = path.resolve(candidate);
  const anchorPrefix = resolvedAnchor + path.sep;

  if (normalizedPath !== resolvedAnchor && !normalizedPath.startsWith(anchorPrefix)) {
    throw new PathEscapeError(
      `${label} resolves outside its allowed directory. ` +
        `Resolved: ${normalizedPath}, Anchor: ${resolvedAnchor}`
    );
  }
}

/**
 * Validate that a name is a single path component (no separators, no
 * traversal).
 */
export function assertSafeFilename(filename: string, label: string): void {
  if (
    filename.length === 0 ||
    filename === "." ||
    filename === ".." ||
    filename.includes("/") ||
    filename.includes("\\")
  ) {
    throw new PathEscapeError(`${label} contains invalid path components: "${filename}"`);
  }
}

/**
 * Where a pass directory lands when archived: `<archiveRoot>/<basename>`.
 */
export function archiveDestination(archiveRoot: string, passDir: string): string {
  const name = path.basename(path.resolve(passDir));
  assertSafeFilename(name, "Pass directory name");
  const destination = path.join(path.resolve(archiveRoot), name);
  assertResolvedContainedIn(destination, archiveRoot, "Archive destination");
  if (destination === path.resolve(archiveRoot)) {
    throw new PathEscapeError(`Archive destination collapses onto the archive root: ${destination}`);
  }
  return destination;
}
