import fs from 'fs/promises';
import { loadConfig, mergeConfig, validateConfig } from './config/config.js';
import type {
  CompareMode,
  OutputFormat,
  OutputLayout,
  PartialUniqueFilesConfig,
  UniqueFilesConfig
} from './config/types.js';
import { assertEnoughRoots, resolveRoots } from './scanner/roots.js';
import { buildIdentityIndex } from './matching/identity-index.js';
import { resolveUnique } from './matching/uniqueness-resolver.js';
import { buildReport } from './report/report-model.js';
import { formatReport } from './report/formatters.js';
import type { UniqueFilesReport } from './report/types.js';
import { logger } from './utils/logger.js';

export type { UniqueFilesReport, RootReport, ReportStats } from './report/types.js';
export type { UniqueFilesConfig, CompareMode } from './config/types.js';
export { getReportStats, previewEntries } from './report/report-model.js';

export interface FindUniqueFilesOptions {
  /** Directories to compare (at least two must be usable) */
  directories: string[];
  configPath?: string;
  byContent?: boolean;
  followSymlinks?: boolean;
  outputOverride?: string;
  formatOverride?: OutputFormat;
  layoutOverride?: OutputLayout;
  debug?: boolean;
}

/**
 * Compares the given directories and returns the report, without printing it
 *
 * @throws NotEnoughRootsError if fewer than two directories are usable
 */
export async function compareDirectories(
  directories: readonly string[],
  config: UniqueFilesConfig
): Promise<UniqueFilesReport> {
  const resolution = await resolveRoots(directories);
  assertEnoughRoots(resolution);

  const mode: CompareMode = config.compare.byContent ? 'by-content' : 'by-name';

  if (mode === 'by-content') {
    logger.info('Comparing files by content (this may take a while)...');
  } else {
    logger.info(`Comparing ${resolution.roots.length} directories by filename...`);
  }

  const { index, unreadable } = await buildIdentityIndex(resolution.roots, {
    mode,
    followSymlinks: config.compare.followSymlinks,
    algorithm: config.hashing.algorithm,
    chunkSize: config.hashing.chunkSize,
    concurrency: config.hashing.concurrency,
    onHashProgress: (completed, total, filePath) => {
      logger.debug(`Hashed ${completed}/${total}: ${filePath}`);
    }
  });

  if (unreadable.length > 0) {
    logger.warn(`${unreadable.length} file(s) could not be read and were left out of the comparison`);
  }

  const uniqueSets = resolveUnique(index);

  return buildReport(index, uniqueSets, {
    invalidRoots: resolution.invalid,
    unreadable
  });
}

function cliOverrides(options: FindUniqueFilesOptions): PartialUniqueFilesConfig {
  // Boolean flags always arrive with a default, so only a set flag overrides the file
  return {
    compare: {
      byContent: options.byContent ? true : undefined,
      followSymlinks: options.followSymlinks ? true : undefined
    },
    output: {
      format: options.formatOverride,
      layout: options.layoutOverride,
      outputFile: options.outputOverride
    }
  };
}

/**
 * Main entry point: loads configuration, compares the directories and
 * writes the formatted report to stdout or the configured output file
 */
export async function findUniqueFiles(options: FindUniqueFilesOptions): Promise<UniqueFilesReport> {
  if (options.debug) {
    logger.enableDebug();
  }

  const config = mergeConfig(await loadConfig(options.configPath), cliOverrides(options));
  validateConfig(config);

  // Keep stdout parseable when it carries JSON
  logger.setQuiet(config.output.format === 'json' && !config.output.outputFile);

  const report = await compareDirectories(options.directories, config);

  const output = formatReport(report, config.output.format, config.output.layout, {
    previewLimit: config.output.previewLimit
  });

  if (config.output.outputFile) {
    logger.info(`Writing results to: ${config.output.outputFile}`);
    await fs.writeFile(config.output.outputFile, output + '\n', 'utf-8');
  } else {
    console.log('\n' + output);
  }

  logger.success('Comparison complete!');
  return report;
}
