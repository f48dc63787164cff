import fs from 'fs/promises';
import crypto from 'crypto';
import path from 'path';
import type { PartialUniqueFilesConfig, UniqueFilesConfig } from './types.js';
import { defaultConfig, DEFAULT_CONFIG_FILE } from './defaults.js';
import { ConfigError, errorMessage, isErrnoException } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(value: JsonObject, key: string): JsonObject | undefined {
  const entry = value[key];
  if (entry === undefined) {
    return undefined;
  }
  if (!isObject(entry)) {
    throw new ConfigError(`"${key}" must be an object`);
  }
  return entry;
}

function optionalBoolean(value: JsonObject, key: string, scope: string): boolean | undefined {
  const entry = value[key];
  if (entry === undefined) return undefined;
  if (typeof entry !== 'boolean') {
    throw new ConfigError(`${scope}.${key} must be a boolean`);
  }
  return entry;
}

function optionalNumber(value: JsonObject, key: string, scope: string): number | undefined {
  const entry = value[key];
  if (entry === undefined) return undefined;
  if (typeof entry !== 'number' || !Number.isInteger(entry)) {
    throw new ConfigError(`${scope}.${key} must be an integer`);
  }
  return entry;
}

function optionalString(value: JsonObject, key: string, scope: string): string | undefined {
  const entry = value[key];
  if (entry === undefined) return undefined;
  if (typeof entry !== 'string') {
    throw new ConfigError(`${scope}.${key} must be a string`);
  }
  return entry;
}

/**
 * Reads the known sections out of parsed JSON, checking value types.
 * Enum values are checked later by validateConfig.
 */
export function parseConfig(raw: unknown): PartialUniqueFilesConfig {
  if (!isObject(raw)) {
    throw new ConfigError('configuration must be a JSON object');
  }

  const parsed: PartialUniqueFilesConfig = {};

  const compare = section(raw, 'compare');
  if (compare) {
    parsed.compare = {
      byContent: optionalBoolean(compare, 'byContent', 'compare'),
      followSymlinks: optionalBoolean(compare, 'followSymlinks', 'compare')
    };
  }

  const hashing = section(raw, 'hashing');
  if (hashing) {
    parsed.hashing = {
      algorithm: optionalString(hashing, 'algorithm', 'hashing'),
      chunkSize: optionalNumber(hashing, 'chunkSize', 'hashing'),
      concurrency: optionalNumber(hashing, 'concurrency', 'hashing')
    };
  }

  const output = section(raw, 'output');
  if (output) {
    const format = optionalString(output, 'format', 'output');
    const layout = optionalString(output, 'layout', 'output');
    const outputFile = output.outputFile;
    if (outputFile !== undefined && outputFile !== null && typeof outputFile !== 'string') {
      throw new ConfigError('output.outputFile must be a string or null');
    }

    parsed.output = {
      format: format === 'text' || format === 'json' ? format : undefined,
      layout: layout === 'list' || layout === 'columns' ? layout : undefined,
      previewLimit: optionalNumber(output, 'previewLimit', 'output'),
      outputFile
    };

    if (format !== undefined && parsed.output.format === undefined) {
      throw new ConfigError('output format must be "text" or "json"');
    }
    if (layout !== undefined && parsed.output.layout === undefined) {
      throw new ConfigError('output layout must be "list" or "columns"');
    }
  }

  return parsed;
}

/**
 * Deep merges a partial configuration over a base configuration
 */
export function mergeConfig(
  base: UniqueFilesConfig,
  override: PartialUniqueFilesConfig
): UniqueFilesConfig {
  const { compare = {}, hashing = {}, output = {} } = override;

  return {
    compare: {
      byContent: compare.byContent ?? base.compare.byContent,
      followSymlinks: compare.followSymlinks ?? base.compare.followSymlinks
    },
    hashing: {
      algorithm: hashing.algorithm ?? base.hashing.algorithm,
      chunkSize: hashing.chunkSize ?? base.hashing.chunkSize,
      concurrency: hashing.concurrency ?? base.hashing.concurrency
    },
    output: {
      format: output.format ?? base.output.format,
      layout: output.layout ?? base.output.layout,
      previewLimit: output.previewLimit ?? base.output.previewLimit,
      outputFile: output.outputFile === undefined ? base.output.outputFile : output.outputFile
    }
  };
}

/**
 * Validates the configuration
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: UniqueFilesConfig): void {
  if (config.hashing.chunkSize < 1) {
    throw new ConfigError('chunkSize must be at least 1');
  }

  if (config.hashing.concurrency < 1) {
    throw new ConfigError('concurrency must be at least 1');
  }

  if (!crypto.getHashes().includes(config.hashing.algorithm.toLowerCase())) {
    throw new ConfigError(`unsupported hash algorithm "${config.hashing.algorithm}"`);
  }

  if (config.output.previewLimit < 1) {
    throw new ConfigError('previewLimit must be at least 1');
  }

  if (config.output.format !== 'text' && config.output.format !== 'json') {
    throw new ConfigError('output format must be "text" or "json"');
  }

  if (config.output.layout !== 'list' && config.output.layout !== 'columns') {
    throw new ConfigError('output layout must be "list" or "columns"');
  }
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 */
export function resolveConfigPath(providedPath?: string): string {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  return path.resolve(DEFAULT_CONFIG_FILE);
}

/**
 * Loads configuration merged with defaults.
 *
 * An explicitly provided file must exist; the default `unique-files.json`
 * in the working directory is optional.
 */
export async function loadConfig(providedPath?: string): Promise<UniqueFilesConfig> {
  const configPath = resolveConfigPath(providedPath);

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      if (providedPath) {
        throw new ConfigError(`file not found: ${configPath}`);
      }
      logger.debug(`No configuration file at ${configPath}, using defaults`);
      const config = mergeConfig(defaultConfig, {});
      validateConfig(config);
      return config;
    }
    throw error;
  }

  logger.debug(`Loading configuration from: ${configPath}`);

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`invalid JSON in ${configPath}: ${errorMessage(error)}`);
  }

  const config = mergeConfig(defaultConfig, parseConfig(raw));
  validateConfig(config);
  return config;
}
