import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { compareDirectories, findUniqueFiles } from './unique-files.js';
import { mergeConfig } from './config/config.js';
import { defaultConfig } from './config/defaults.js';
import { NotEnoughRootsError } from './utils/errors.js';
import { logger } from './utils/logger.js';

const byName = defaultConfig;
const byContent = mergeConfig(defaultConfig, { compare: { byContent: true } });

describe('unique-files integration', () => {
  let tempDir: string;
  let dirA: string;
  let dirB: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'unique-files-integration-test-')));
    dirA = path.join(tempDir, 'dirA');
    dirB = path.join(tempDir, 'dirB');
    await fs.mkdir(dirA);
    await fs.mkdir(dirB);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    logger.setQuiet(false);
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
    for (const [relativePath, content] of Object.entries(files)) {
      const filePath = path.join(dir, relativePath);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content);
    }
  }

  function uniqueLists(report: { roots: { uniqueFiles: string[] }[] }): string[][] {
    return report.roots.map(root => root.uniqueFiles);
  }

  describe('shared and distinct files', () => {
    beforeEach(async () => {
      await writeFiles(dirA, { 'a.txt': 'X', 'b.txt': 'Y' });
      await writeFiles(dirB, { 'a.txt': 'X', 'c.txt': 'Z' });
    });

    it('should find unique names', async () => {
      const report = await compareDirectories([dirA, dirB], byName);

      expect(report.mode).toBe('by-name');
      expect(report.roots.map(root => root.root)).toEqual([dirA, dirB]);
      expect(uniqueLists(report)).toEqual([['b.txt'], ['c.txt']]);
    });

    it('should find unique content', async () => {
      const report = await compareDirectories([dirA, dirB], byContent);

      expect(report.mode).toBe('by-content');
      expect(uniqueLists(report)).toEqual([['b.txt'], ['c.txt']]);
    });

    it('should give the same answer on a second run', async () => {
      const first = await compareDirectories([dirA, dirB], byContent);
      const second = await compareDirectories([dirA, dirB], byContent);

      expect(second).toEqual(first);
    });
  });

  describe('renamed copies', () => {
    beforeEach(async () => {
      await writeFiles(dirA, { 'x.txt': 'P' });
      await writeFiles(dirB, { 'y.txt': 'P' });
    });

    it('should report both names as unique by name', async () => {
      const report = await compareDirectories([dirA, dirB], byName);

      expect(uniqueLists(report)).toEqual([['x.txt'], ['y.txt']]);
    });

    it('should report nothing unique by content', async () => {
      const report = await compareDirectories([dirA, dirB], byContent);

      expect(uniqueLists(report)).toEqual([[], []]);
    });
  });

  it('should never report hidden files or files under hidden directories', async () => {
    await writeFiles(dirA, { '.hidden': 'H', '.git/config': 'G', 'seen.txt': 'S' });
    await writeFiles(dirB, { 'other.txt': 'O' });

    const names = await compareDirectories([dirA, dirB], byName);
    const contents = await compareDirectories([dirA, dirB], byContent);

    expect(uniqueLists(names)).toEqual([['seen.txt'], ['other.txt']]);
    expect(uniqueLists(contents)).toEqual([['seen.txt'], ['other.txt']]);
    expect(names.roots[0].filesIndexed).toBe(1);
  });

  it('should list nested content matches by path within the directory', async () => {
    await writeFiles(dirA, { 'docs/report.txt': 'R', 'docs/draft.txt': 'D' });
    await writeFiles(dirB, { 'archive/report-final.txt': 'R' });

    const report = await compareDirectories([dirA, dirB], byContent);

    expect(uniqueLists(report)).toEqual([['docs/draft.txt'], []]);
  });

  it('should continue without a missing directory when two remain', async () => {
    const dirC = path.join(tempDir, 'dirC');
    const missing = path.join(tempDir, 'missing');
    await fs.mkdir(dirC);
    await writeFiles(dirA, { 'a.txt': 'X' });
    await writeFiles(dirC, { 'c.txt': 'Z' });

    const report = await compareDirectories([dirA, missing, dirC], byName);

    expect(report.roots.map(root => root.root)).toEqual([dirA, dirC]);
    expect(report.invalidRoots.map(invalid => invalid.input)).toEqual([missing]);
    expect(uniqueLists(report)).toEqual([['a.txt'], ['c.txt']]);
  });

  it('should refuse to run with fewer than two usable directories', async () => {
    await expect(
      compareDirectories([dirA, path.join(tempDir, 'missing')], byName)
    ).rejects.toBeInstanceOf(NotEnoughRootsError);
  });

  describe('findUniqueFiles', () => {
    let configPath: string;

    beforeEach(async () => {
      await writeFiles(dirA, { 'a.txt': 'X', 'b.txt': 'Y' });
      await writeFiles(dirB, { 'a.txt': 'X', 'c.txt': 'Z' });
      configPath = path.join(tempDir, 'unique-files.json');
      await fs.writeFile(configPath, JSON.stringify({ output: { previewLimit: 5 } }));
    });

    it('should print the text report to stdout', async () => {
      await findUniqueFiles({ directories: [dirA, dirB], configPath });

      const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));
      const report = printed.find(text => text.startsWith('\nFiles unique to each directory'));

      expect(report?.split('\n').slice(1, 6)).toEqual([
        'Files unique to each directory (by filename):',
        '',
        `${dirA}/  (1 unique files)`,
        '   - b.txt',
        ''
      ]);
    });

    it('should write JSON to the output file', async () => {
      const outputPath = path.join(tempDir, 'out', 'report.json');
      await fs.mkdir(path.dirname(outputPath));

      const report = await findUniqueFiles({
        directories: [dirA, dirB],
        configPath,
        byContent: true,
        formatOverride: 'json',
        outputOverride: outputPath
      });

      const written = JSON.parse(await fs.readFile(outputPath, 'utf-8'));

      expect(written.mode).toBe('by-content');
      expect(written.directories).toEqual([
        { root: dirA, filesIndexed: 2, uniqueCount: 1, uniqueFiles: ['b.txt'] },
        { root: dirB, filesIndexed: 2, uniqueCount: 1, uniqueFiles: ['c.txt'] }
      ]);
      expect(report.roots[0].uniqueCount).toBe(1);
    });

    it('should keep stdout to the JSON document when printing JSON', async () => {
      await findUniqueFiles({ directories: [dirA, dirB], configPath, formatOverride: 'json' });

      const printed = vi.mocked(console.log).mock.calls.map(call => String(call[0]));

      expect(printed).toHaveLength(1);
      expect(JSON.parse(printed[0]).mode).toBe('by-name');
    });
  });
});
