#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { findUniqueFiles } from './unique-files.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

interface UniqueFlags {
  'by-content': boolean;
  'follow-symlinks': boolean;
  config?: string;
  output?: string;
  format?: 'text' | 'json';
  layout?: 'list' | 'columns';
  debug: boolean;
}

const uniqueCommand = buildCommand({
  docs: {
    brief: 'List the files that exist in only one of several directories'
  },
  parameters: {
    positional: {
      kind: 'array',
      parameter: {
        brief: 'Directory to compare (give at least two)',
        parse: String,
        placeholder: 'dir'
      }
    },
    flags: {
      'by-content': {
        kind: 'boolean',
        brief: 'Compare by file content (hash) instead of filename; slower but catches renamed copies',
        default: false
      },
      'follow-symlinks': {
        kind: 'boolean',
        brief: 'Include symlinked files (symlinked directories are never followed)',
        default: false
      },
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'Write the report to this file instead of stdout',
        parse: String,
        optional: true
      },
      format: {
        kind: 'enum',
        brief: 'Override output format',
        values: ['text', 'json'] as const,
        optional: true
      },
      layout: {
        kind: 'enum',
        brief: 'Text layout: one section per directory, or side-by-side columns',
        values: ['list', 'columns'] as const,
        optional: true
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      o: 'output',
      f: 'format',
      l: 'layout',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: UniqueFlags, ...directories: string[]): Promise<void> {
    try {
      await findUniqueFiles({
        directories,
        configPath: flags.config,
        byContent: flags['by-content'],
        followSymlinks: flags['follow-symlinks'],
        outputOverride: flags.output,
        formatOverride: flags.format,
        layoutOverride: flags.layout,
        debug: flags.debug
      });
    } catch (error) {
      logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(uniqueCommand, {
  name: 'unique-files',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

await run(app, process.argv.slice(2), { process });
