import { directoriesOf } from './identity-index.js';
import type { IdentityIndex, IdentityKey, UniqueSet } from './types.js';

function emptySets(index: IdentityIndex): Map<string, Set<string>> {
  return new Map(index.roots.map(root => [root, new Set<string>()]));
}

function toUniqueSets(index: IdentityIndex, sets: Map<string, Set<string>>): UniqueSet[] {
  return index.roots.map(root => ({
    root,
    entries: [...(sets.get(root) ?? [])].sort()
  }));
}

/**
 * Number of roots the bucket for `key` spans, looked up afresh in the index
 */
function spanOf(index: IdentityIndex, key: IdentityKey): number {
  const bucket = index.buckets.get(key);
  return bucket ? directoriesOf(bucket).size : 0;
}

/**
 * A filename is unique to a root when no other root has a file of that name
 */
function resolveByName(index: IdentityIndex): UniqueSet[] {
  const sets = emptySets(index);

  for (const [name, bucket] of index.buckets) {
    const roots = directoriesOf(bucket);
    if (roots.size !== 1) {
      continue;
    }
    const [root] = roots;
    sets.get(root)?.add(name);
  }

  return toUniqueSets(index, sets);
}

/**
 * Two passes: first every path whose digest also occurs under another root
 * is marked shared, whatever its name; then each remaining file is kept only
 * if its digest still maps to a single root.
 */
function resolveByContent(index: IdentityIndex): UniqueSet[] {
  const shared = new Set<string>();
  for (const bucket of index.buckets.values()) {
    if (directoriesOf(bucket).size > 1) {
      for (const entry of bucket) {
        shared.add(entry.path);
      }
    }
  }

  const sets = emptySets(index);
  for (const [digest, bucket] of index.buckets) {
    for (const entry of bucket) {
      if (shared.has(entry.path)) {
        continue;
      }
      if (spanOf(index, digest) !== 1) {
        continue;
      }
      sets.get(entry.root)?.add(entry.relativePath);
    }
  }

  return toUniqueSets(index, sets);
}

/**
 * Derives the files unique to each root from the identity index.
 *
 * Returns one set per root, in root order, including empty ones. Sets are
 * complete; any preview cap is applied by the presentation layer.
 */
export function resolveUnique(index: IdentityIndex): UniqueSet[] {
  return index.mode === 'by-name' ? resolveByName(index) : resolveByContent(index);
}
