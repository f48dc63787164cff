import crypto from 'crypto';
import fs from 'fs';
import { DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM } from '../config/defaults.js';
import { ReadError } from '../utils/errors.js';
import { mapWithConcurrency } from './concurrency.js';
import { logger } from '../utils/logger.js';

export interface HashOptions {
  /** Bytes read per chunk (default 8192) */
  chunkSize?: number;
  /** Algorithm understood by crypto.createHash (default md5) */
  algorithm?: string;
}

/**
 * Computes the content fingerprint of a file.
 *
 * The file is read sequentially in `chunkSize` pieces, each fed to an
 * incremental digest, so memory use does not grow with file size.
 *
 * @param filePath - Path of the file to hash
 * @returns Lowercase hex digest
 * @throws ReadError if the file cannot be opened or read
 *
 * @example
 * const digest = await hashFile('/data/a.txt');
 * // "5d41402abc4b2a76b9719d911017c592" for the content "hello"
 */
export function hashFile(filePath: string, options: HashOptions = {}): Promise<string> {
  const { chunkSize = DEFAULT_CHUNK_SIZE, algorithm = DEFAULT_HASH_ALGORITHM } = options;

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath, { highWaterMark: chunkSize });

    stream.on('error', (err) => reject(new ReadError(filePath, err)));
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export interface HashManyOptions extends HashOptions {
  /** Maximum number of files read at once */
  concurrency: number;
  onProgress?: (completed: number, filePath: string) => void;
}

export interface HashManyResult {
  /** Digests in input order (null where the file could not be read) */
  digests: (string | null)[];
  failures: ReadError[];
}

/**
 * Hashes a batch of files with bounded concurrency.
 *
 * An unreadable file is reported as a warning and leaves a null slot;
 * it never aborts the batch. Any other failure is rethrown.
 */
export async function hashFiles(
  filePaths: readonly string[],
  options: HashManyOptions
): Promise<HashManyResult> {
  const { concurrency, onProgress, ...hashOptions } = options;

  const { results, errors } = await mapWithConcurrency(
    filePaths,
    concurrency,
    (filePath) => hashFile(filePath, hashOptions),
    onProgress
  );

  const failures: ReadError[] = [];
  for (const { error } of errors) {
    if (!(error instanceof ReadError)) {
      throw error;
    }
    logger.warn(error.message);
    failures.push(error);
  }

  return { digests: results, failures };
}
