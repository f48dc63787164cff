import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { buildIdentityIndex, directoriesOf, indexEntries, mergeIndices } from './identity-index.js';
import type { FileEntry } from '../scanner/types.js';
import { hashFiles } from '../hashing/hasher.js';
import { ReadError } from '../utils/errors.js';

vi.mock('../hashing/hasher.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../hashing/hasher.js')>();
  return { ...actual, hashFiles: vi.fn(actual.hashFiles) };
});

function entry(root: string, relativePath: string): FileEntry {
  return {
    root,
    path: `${root}/${relativePath}`,
    relativePath,
    name: path.posix.basename(relativePath)
  };
}

describe('indexEntries', () => {
  it('should group entries sharing a key', () => {
    const a = entry('/a', 'x.txt');
    const b = entry('/a', 'sub/x.txt');
    const c = entry('/a', 'y.txt');

    const partial = indexEntries('/a', [
      { key: 'x.txt', entry: a },
      { key: 'x.txt', entry: b },
      { key: 'y.txt', entry: c }
    ]);

    expect(partial.root).toBe('/a');
    expect(partial.filesIndexed).toBe(3);
    expect(partial.buckets.get('x.txt')).toEqual([a, b]);
    expect(partial.buckets.get('y.txt')).toEqual([c]);
  });
});

describe('mergeIndices', () => {
  it('should concatenate buckets in partial order', () => {
    const a = entry('/a', 'x.txt');
    const b = entry('/b', 'x.txt');
    const c = entry('/b', 'z.txt');

    const index = mergeIndices('by-name', [
      indexEntries('/a', [{ key: 'x.txt', entry: a }]),
      indexEntries('/b', [
        { key: 'x.txt', entry: b },
        { key: 'z.txt', entry: c }
      ])
    ]);

    expect(index.mode).toBe('by-name');
    expect(index.roots).toEqual(['/a', '/b']);
    expect(index.buckets.get('x.txt')).toEqual([a, b]);
    expect(index.buckets.get('z.txt')).toEqual([c]);
    expect(index.filesIndexed.get('/a')).toBe(1);
    expect(index.filesIndexed.get('/b')).toBe(2);
  });

  it('should not mutate the partial indices', () => {
    const a = entry('/a', 'x.txt');
    const b = entry('/b', 'x.txt');
    const first = indexEntries('/a', [{ key: 'x.txt', entry: a }]);

    mergeIndices('by-name', [first, indexEntries('/b', [{ key: 'x.txt', entry: b }])]);

    expect(first.buckets.get('x.txt')).toEqual([a]);
  });
});

describe('directoriesOf', () => {
  it('should count distinct roots only', () => {
    const bucket = [entry('/a', 'x.txt'), entry('/a', 'sub/x.txt'), entry('/b', 'x.txt')];

    expect(directoriesOf(bucket)).toEqual(new Set(['/a', '/b']));
  });
});

describe('buildIdentityIndex', () => {
  let tempDir: string;
  let dirA: string;
  let dirB: string;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'unique-files-index-test-')));
    dirA = path.join(tempDir, 'dirA');
    dirB = path.join(tempDir, 'dirB');
    await fs.mkdir(dirA);
    await fs.mkdir(dirB);
    await fs.writeFile(path.join(dirA, 'a.txt'), 'X');
    await fs.writeFile(path.join(dirA, 'b.txt'), 'Y');
    await fs.writeFile(path.join(dirB, 'a.txt'), 'X');
    await fs.writeFile(path.join(dirB, 'renamed.txt'), 'Y');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should key files by name in by-name mode', async () => {
    const { index, unreadable } = await buildIdentityIndex([dirA, dirB], { mode: 'by-name' });

    expect([...index.buckets.keys()].sort()).toEqual(['a.txt', 'b.txt', 'renamed.txt']);
    expect(directoriesOf(index.buckets.get('a.txt') ?? [])).toEqual(new Set([dirA, dirB]));
    expect(index.filesIndexed.get(dirA)).toBe(2);
    expect(index.filesIndexed.get(dirB)).toBe(2);
    expect(unreadable).toEqual([]);
  });

  it('should key files by md5 digest in by-content mode', async () => {
    const { index } = await buildIdentityIndex([dirA, dirB], { mode: 'by-content', concurrency: 2 });

    // md5("X") and md5("Y")
    const bucketX = index.buckets.get('02129bb861061d1a052c592e2dc6b383') ?? [];
    const bucketY = index.buckets.get('57cec4137b614c87cb4e24a3d003a3e0') ?? [];

    expect(index.buckets.size).toBe(2);
    expect(bucketX.map(e => e.path)).toEqual([path.join(dirA, 'a.txt'), path.join(dirB, 'a.txt')]);
    expect(bucketY.map(e => e.path)).toEqual([path.join(dirA, 'b.txt'), path.join(dirB, 'renamed.txt')]);
  });

  it('should leave unreadable files out of the index', async () => {
    const aPath = path.join(dirA, 'a.txt');
    vi.mocked(hashFiles).mockImplementationOnce(async () => ({
      digests: [null, '57cec4137b614c87cb4e24a3d003a3e0'],
      failures: [new ReadError(aPath, new Error('permission denied'))]
    }));

    const { index, unreadable } = await buildIdentityIndex([dirA, dirB], { mode: 'by-content' });

    expect(unreadable).toEqual([{ root: dirA, path: aPath, reason: 'permission denied' }]);
    expect(index.filesIndexed.get(dirA)).toBe(1);
    expect(index.filesIndexed.get(dirB)).toBe(2);
    expect(index.buckets.get('02129bb861061d1a052c592e2dc6b383')?.map(e => e.path)).toEqual([
      path.join(dirB, 'a.txt')
    ]);
  });
});
