import fs from 'fs/promises';
import path from 'path';
import type { RootResolution } from './types.js';
import { InvalidRootError, NotEnoughRootsError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Resolves one directory argument to its canonical absolute path
 * @throws InvalidRootError if it does not exist or is not a directory
 */
export async function resolveRoot(input: string): Promise<string> {
  let canonical: string;
  try {
    canonical = await fs.realpath(path.resolve(input));
  } catch (error) {
    throw new InvalidRootError(input, errorMessage(error));
  }

  const stats = await fs.stat(canonical);
  if (!stats.isDirectory()) {
    throw new InvalidRootError(input, 'not a directory');
  }

  return canonical;
}

/**
 * Resolves every directory argument, keeping the valid ones.
 *
 * Each rejected argument is reported once. Arguments that resolve to a
 * directory already listed are dropped so a tree is never compared with
 * itself.
 */
export async function resolveRoots(inputs: readonly string[]): Promise<RootResolution> {
  const resolution: RootResolution = { roots: [], invalid: [], duplicates: [] };

  for (const input of inputs) {
    let root: string;
    try {
      root = await resolveRoot(input);
    } catch (error) {
      if (!(error instanceof InvalidRootError)) {
        throw error;
      }
      logger.error(error.message);
      resolution.invalid.push({ input, reason: error.reason });
      continue;
    }

    if (resolution.roots.includes(root)) {
      logger.warn(`Ignoring '${input}': same directory as ${root}`);
      resolution.duplicates.push({ input, root });
      continue;
    }

    resolution.roots.push(root);
  }

  return resolution;
}

/**
 * @throws NotEnoughRootsError when fewer than two roots are usable
 */
export function assertEnoughRoots(resolution: RootResolution): void {
  if (resolution.roots.length < 2) {
    throw new NotEnoughRootsError(resolution.roots.length);
  }
}
