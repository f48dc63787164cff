/**
 * A regular file discovered under one of the compared roots
 */
export interface FileEntry {
  /** Canonical absolute path of the root the file was found under */
  root: string;
  /** Absolute path of the file */
  path: string;
  /** Path relative to the root, always with forward slashes */
  relativePath: string;
  /** Final path segment */
  name: string;
}

export interface ScanOptions {
  /** Yield symlinks that point at regular files (directories are never followed) */
  followSymlinks?: boolean;
}

/**
 * Outcome of resolving the directory arguments of a run
 */
export interface RootResolution {
  /** Canonical absolute paths, in argument order, without duplicates */
  roots: string[];
  /** Arguments that were rejected, with the reason */
  invalid: Array<{ input: string; reason: string }>;
  /** Arguments that resolved to a root already listed */
  duplicates: Array<{ input: string; root: string }>;
}
