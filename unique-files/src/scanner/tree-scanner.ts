import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import type { FileEntry, ScanOptions } from './types.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Hidden entries are matched on their own name only, never on the
 * ancestors of the root being scanned.
 */
export function isHidden(name: string): boolean {
  return name.startsWith('.');
}

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function toEntry(root: string, fullPath: string, name: string): FileEntry {
  return {
    root,
    path: fullPath,
    relativePath: path.relative(root, fullPath).split(path.sep).join('/'),
    name
  };
}

/**
 * Whether a symlink should be yielded as a file: only when following
 * is enabled and the link resolves to a regular file
 */
async function isLinkedFile(fullPath: string, options: ScanOptions): Promise<boolean> {
  if (!options.followSymlinks) {
    logger.debug(`Skipping symlink: ${fullPath}`);
    return false;
  }

  try {
    const target = await fs.stat(fullPath);
    if (!target.isFile()) {
      logger.debug(`Not following symlinked directory: ${fullPath}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.debug(`Skipping broken symlink: ${fullPath} (${errorMessage(error)})`);
    return false;
  }
}

async function* walk(
  root: string,
  dirPath: string,
  options: ScanOptions
): AsyncGenerator<FileEntry> {
  let entries: Dirent[];

  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Cannot read directory ${dirPath}: ${errorMessage(error)}`);
    return;
  }

  entries.sort(compareNames);

  for (const entry of entries) {
    if (isHidden(entry.name)) {
      continue;
    }

    const fullPath = path.join(dirPath, entry.name);

    if (entry.isSymbolicLink()) {
      if (await isLinkedFile(fullPath, options)) {
        yield toEntry(root, fullPath, entry.name);
      }
    } else if (entry.isDirectory()) {
      yield* walk(root, fullPath, options);
    } else if (entry.isFile()) {
      yield toEntry(root, fullPath, entry.name);
    }
  }
}

/**
 * Lazily enumerates the regular files under a root, depth first.
 *
 * Siblings are visited in ascending name order so the sequence is the
 * same on every run. Names starting with a dot are skipped, and a hidden
 * directory is not descended into.
 *
 * @param root - Canonical absolute path of the directory to scan
 */
export function scanTree(root: string, options: ScanOptions = {}): AsyncGenerator<FileEntry> {
  return walk(root, root, options);
}

/**
 * Drains scanTree into an array
 */
export async function collectTree(root: string, options: ScanOptions = {}): Promise<FileEntry[]> {
  const files: FileEntry[] = [];
  for await (const entry of scanTree(root, options)) {
    files.push(entry);
  }
  return files;
}
