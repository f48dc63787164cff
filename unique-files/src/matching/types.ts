import type { CompareMode } from '../config/types.js';
import type { FileEntry } from '../scanner/types.js';

/**
 * Filename (by-name) or hex digest (by-content); compared for exact equality
 */
export type IdentityKey = string;

/**
 * Every file carrying one identity key, across all roots
 */
export type Bucket = readonly FileEntry[];

/**
 * Identity key → occurrences, folded from every root's scan
 */
export interface IdentityIndex {
  mode: CompareMode;

  /** Roots in comparison order */
  roots: readonly string[];

  buckets: ReadonlyMap<IdentityKey, Bucket>;

  /** Files that made it into the index, per root */
  filesIndexed: ReadonlyMap<string, number>;
}

/**
 * The index contribution of a single root, built independently of the others
 */
export interface PartialIndex {
  root: string;
  buckets: ReadonlyMap<IdentityKey, Bucket>;
  filesIndexed: number;
}

/**
 * A file left out of the index because it could not be hashed
 */
export interface UnreadableFile {
  root: string;
  path: string;
  reason: string;
}

/**
 * Files classified as unique to one root, sorted ascending.
 * Entries are filenames in by-name mode and root-relative paths in by-content mode.
 */
export interface UniqueSet {
  root: string;
  entries: string[];
}
