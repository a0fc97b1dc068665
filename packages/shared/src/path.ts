import path from "node:path";

/**
 * Source-tree relative path. Always POSIX separators, never normalized
 * against the working directory: these are build-graph identities, not
 * file-system handles.
 */
export type SourcePath = string & { readonly __brand: "SourcePath" };

export function sourcePath(...segments: readonly string[]): SourcePath {
  const joined = path.posix.join(...segments.filter((s) => s.length > 0));
  return (joined === "." ? "" : joined) as SourcePath;
}

export function joinSourcePath(base: SourcePath, ...segments: readonly string[]): SourcePath {
  return sourcePath(base, ...segments);
}
