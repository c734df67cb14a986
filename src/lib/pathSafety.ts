import * as path from "path";

/**
 * Verify that a path is contained within the anchor directory. Both are
 * resolved first.
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

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}
