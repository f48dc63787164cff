import type { CompareMode } from '../config/types.js';
import type { FileEntry } from '../scanner/types.js';
import { collectTree } from '../scanner/tree-scanner.js';
import { hashFiles } from '../hashing/hasher.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  Bucket,
  IdentityIndex,
  IdentityKey,
  PartialIndex,
  UnreadableFile
} from './types.js';

export interface IndexOptions {
  mode: CompareMode;
  followSymlinks?: boolean;
  algorithm?: string;
  chunkSize?: number;
  /** Files hashed at once in by-content mode */
  concurrency?: number;
  onHashProgress?: (completed: number, total: number, filePath: string) => void;
}

export interface IndexBuildResult {
  index: IdentityIndex;
  unreadable: UnreadableFile[];
}

/**
 * Distinct roots a bucket spans
 */
export function directoriesOf(bucket: Bucket): Set<string> {
  return new Set(bucket.map(entry => entry.root));
}

/**
 * Folds one root's keyed files into a partial index
 */
export function indexEntries(
  root: string,
  keyed: ReadonlyArray<{ key: IdentityKey; entry: FileEntry }>
): PartialIndex {
  const buckets = new Map<IdentityKey, FileEntry[]>();

  for (const { key, entry } of keyed) {
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(entry);
    } else {
      buckets.set(key, [entry]);
    }
  }

  return { root, buckets, filesIndexed: keyed.length };
}

/**
 * Merges partial indices into one. Occurrences within a bucket follow the
 * order of the partials, so the result is the same however the partials
 * were produced.
 */
export function mergeIndices(mode: CompareMode, partials: readonly PartialIndex[]): IdentityIndex {
  const buckets = new Map<IdentityKey, FileEntry[]>();
  const filesIndexed = new Map<string, number>();

  for (const partial of partials) {
    filesIndexed.set(partial.root, (filesIndexed.get(partial.root) ?? 0) + partial.filesIndexed);

    for (const [key, occurrences] of partial.buckets) {
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(...occurrences);
      } else {
        buckets.set(key, [...occurrences]);
      }
    }
  }

  return {
    mode,
    roots: partials.map(partial => partial.root),
    buckets,
    filesIndexed
  };
}

async function indexRoot(
  root: string,
  options: IndexOptions
): Promise<{ partial: PartialIndex; unreadable: UnreadableFile[] }> {
  const entries = await collectTree(root, { followSymlinks: options.followSymlinks });
  logger.debug(`Found ${entries.length} files in ${root}`);

  if (options.mode === 'by-name') {
    return {
      partial: indexEntries(root, entries.map(entry => ({ key: entry.name, entry }))),
      unreadable: []
    };
  }

  const { digests, failures } = await hashFiles(
    entries.map(entry => entry.path),
    {
      algorithm: options.algorithm,
      chunkSize: options.chunkSize,
      concurrency: options.concurrency ?? 1,
      onProgress: (completed, filePath) =>
        options.onHashProgress?.(completed, entries.length, filePath)
    }
  );

  const keyed: Array<{ key: IdentityKey; entry: FileEntry }> = [];
  entries.forEach((entry, i) => {
    const digest = digests[i];
    if (digest !== null) {
      keyed.push({ key: digest, entry });
    }
  });

  return {
    partial: indexEntries(root, keyed),
    unreadable: failures.map(failure => ({
      root,
      path: failure.filePath,
      reason: errorMessage(failure.cause)
    }))
  };
}

/**
 * Scans every root and builds the identity index.
 *
 * Each root is indexed on its own and the partial indices are merged at
 * the end. In by-content mode a file that cannot be hashed is left out of
 * the index entirely and listed in `unreadable`.
 */
export async function buildIdentityIndex(
  roots: readonly string[],
  options: IndexOptions
): Promise<IndexBuildResult> {
  const partials: PartialIndex[] = [];
  const unreadable: UnreadableFile[] = [];

  for (const root of roots) {
    logger.debug(`Indexing ${root}`);
    const result = await indexRoot(root, options);
    partials.push(result.partial);
    unreadable.push(...result.unreadable);
  }

  return {
    index: mergeIndices(options.mode, partials),
    unreadable
  };
}
