import path from 'path';
import { DEFAULT_PREVIEW_LIMIT } from '../config/defaults.js';
import type { IdentityIndex, UnreadableFile, UniqueSet } from '../matching/types.js';
import type { Preview, ReportStats, UniqueFilesReport } from './types.js';

export interface ReportContext {
  invalidRoots?: Array<{ input: string; reason: string }>;
  unreadable?: UnreadableFile[];
}

/**
 * Assembles the directory-keyed report consumed by the formatters
 */
export function buildReport(
  index: IdentityIndex,
  uniqueSets: readonly UniqueSet[],
  context: ReportContext = {}
): UniqueFilesReport {
  const byRoot = new Map(uniqueSets.map(set => [set.root, set.entries]));

  return {
    mode: index.mode,
    roots: index.roots.map(root => {
      const uniqueFiles = byRoot.get(root) ?? [];
      return {
        root,
        name: path.basename(root) || root,
        filesIndexed: index.filesIndexed.get(root) ?? 0,
        uniqueFiles,
        uniqueCount: uniqueFiles.length
      };
    }),
    invalidRoots: context.invalidRoots ?? [],
    unreadable: context.unreadable ?? []
  };
}

/**
 * First `limit` entries plus the count of those left out
 */
export function previewEntries<T>(entries: readonly T[], limit: number = DEFAULT_PREVIEW_LIMIT): Preview<T> {
  return {
    shown: entries.slice(0, limit),
    remaining: Math.max(0, entries.length - limit)
  };
}

/**
 * Generates totals from a report
 */
export function getReportStats(report: UniqueFilesReport): ReportStats {
  let filesIndexed = 0;
  let uniqueFiles = 0;

  for (const root of report.roots) {
    filesIndexed += root.filesIndexed;
    uniqueFiles += root.uniqueCount;
  }

  return {
    directories: report.roots.length,
    filesIndexed,
    uniqueFiles,
    invalidRoots: report.invalidRoots.length,
    unreadableFiles: report.unreadable.length
  };
}
