import * as path from "path";

/**
 * Verify that a resolved absolute path is contained within the anchor
 * directory. Both paths must already be resolved/absolute.
 *
 * Throws if the resolved path escapes the anchor.
 */
export function assertResolvedContainedIn(
  resolvedPath: string,
  anchor: string,
  label: string
): void {
  const resolvedAnchor = path.resolve(anchor);
  const normalizedPath = path.resolve(resolvedPath);
  const anchorPrefix = resolvedAnchor + path.sep;

  if (
    normalizedPath !== resolvedAnchor &&
    !normalizedPath.startsWith(anchorPrefix)
  ) {
    throw new PathEscapeError(
      `${label} resolves outside its allowed directory. ` +
        `Resolved: ${normalizedPath}, Anchor: ${resolvedAnchor}`
    );
  }
}

/**
 * Join a forward-slash relative path onto a root and check that the
 * result stays under it. Returns the absolute path.
 */
export function resolveUnder(root: string, relPath: string, label: string): string {
  const resolved = path.resolve(root, ...relPath.split("/"));
  assertResolvedContainedIn(resolved, root, label);
  if (resolved === path.resolve(root)) {
    throw new PathEscapeError(`${label} resolves to the root directory itself: "${relPath}"`);
  }
  return resolved;
}

/** Convert a platform path to forward slashes. */
export function toForwardSlash(p: string): string {
  return p.replace(/\\/g, "/");
}

/** Forward-slash path of `target` relative to `root`. */
export function toRelativePosix(root: string, target: string): string {
  return toForwardSlash(path.relative(root, target));
}

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}
