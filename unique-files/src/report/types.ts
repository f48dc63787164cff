import type { CompareMode } from '../config/types.js';
import type { UnreadableFile } from '../matching/types.js';

/**
 * Unique files of one compared directory
 */
export interface RootReport {
  /** Canonical absolute path */
  root: string;

  /** Basename, used as a column heading */
  name: string;

  /** Files that took part in the comparison */
  filesIndexed: number;

  /** Complete sorted list; never capped */
  uniqueFiles: string[];

  uniqueCount: number;
}

export interface UniqueFilesReport {
  mode: CompareMode;
  roots: RootReport[];

  /** Directory arguments that were rejected */
  invalidRoots: Array<{ input: string; reason: string }>;

  /** Files left out of a by-content comparison */
  unreadable: UnreadableFile[];
}

/**
 * Totals derived from a report
 */
export interface ReportStats {
  directories: number;
  filesIndexed: number;
  uniqueFiles: number;
  invalidRoots: number;
  unreadableFiles: number;
}

export interface Preview<T> {
  shown: T[];
  /** Entries left out of `shown` */
  remaining: number;
}
