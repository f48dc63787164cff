import os from 'os';
import type { UniqueFilesConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = 'unique-files.json';

export const DEFAULT_CHUNK_SIZE = 8192;
export const DEFAULT_HASH_ALGORITHM = 'md5';
export const DEFAULT_PREVIEW_LIMIT = 50;
export const DEFAULT_HASH_CONCURRENCY = Math.max(2, Math.min(8, os.cpus().length || 2));

/**
 * Default configuration values
 */
export const defaultConfig: UniqueFilesConfig = {
  compare: {
    byContent: false,
    followSymlinks: false
  },
  hashing: {
    algorithm: DEFAULT_HASH_ALGORITHM,
    chunkSize: DEFAULT_CHUNK_SIZE,
    concurrency: DEFAULT_HASH_CONCURRENCY
  },
  output: {
    format: 'text',
    layout: 'list',
    previewLimit: DEFAULT_PREVIEW_LIMIT,
    outputFile: null
  }
};
