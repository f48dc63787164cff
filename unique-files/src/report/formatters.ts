import chalk from 'chalk';
import { DEFAULT_PREVIEW_LIMIT } from '../config/defaults.js';
import type { OutputFormat, OutputLayout } from '../config/types.js';
import { getReportStats, previewEntries } from './report-model.js';
import type { ReportStats, RootReport, UniqueFilesReport } from './types.js';

export interface FormatOptions {
  /** Entries listed per directory before "... and N more" */
  previewLimit?: number;
  /** Cell width of the columns layout */
  columnWidth?: number;
}

export const DEFAULT_COLUMN_WIDTH = 32;
const COLUMN_GAP = '  ';
const RULE_WIDTH = 80;

function modeLabel(report: UniqueFilesReport): string {
  return report.mode === 'by-content' ? 'by content' : 'by filename';
}

function countLabel(root: RootReport, report: UniqueFilesReport): string {
  const suffix = report.mode === 'by-content' ? ' by content' : '';
  return root.uniqueCount === 0
    ? `(no unique files${suffix})`
    : `(${root.uniqueCount} unique files${suffix})`;
}

function formatSummary(stats: ReportStats): string[] {
  return [
    chalk.bold.cyan('SUMMARY'),
    chalk.cyan('-'.repeat(RULE_WIDTH)),
    `  Directories compared: ${stats.directories}`,
    `  Files compared:       ${stats.filesIndexed}`,
    `  Unique files:         ${chalk.yellow(stats.uniqueFiles.toString())}`,
    `  Invalid directories:  ${stats.invalidRoots}`,
    `  Unreadable files:     ${stats.unreadableFiles}`
  ];
}

/**
 * One section per directory:
 *
 *     /data/a/  (2 unique files)
 *        - notes.txt
 *        - todo.txt
 */
export function formatListOutput(report: UniqueFilesReport, options: FormatOptions = {}): string {
  const limit = options.previewLimit ?? DEFAULT_PREVIEW_LIMIT;
  const lines: string[] = [];

  lines.push(chalk.bold(`Files unique to each directory (${modeLabel(report)}):`));
  lines.push('');

  for (const root of report.roots) {
    lines.push(`${chalk.bold(`${root.root}/`)}  ${countLabel(root, report)}`);

    const { shown, remaining } = previewEntries(root.uniqueFiles, limit);
    for (const entry of shown) {
      lines.push(`   - ${entry}`);
    }
    if (remaining > 0) {
      lines.push(chalk.gray(`   ... and ${remaining} more`));
    }
    lines.push('');
  }

  lines.push(...formatSummary(getReportStats(report)));

  return lines.join('\n');
}

/**
 * Fits text into a fixed-width cell, cutting it with an ellipsis when too long
 */
export function fitCell(text: string, width: number): string {
  if (text.length > width) {
    return `${text.slice(0, Math.max(0, width - 1))}…`;
  }
  return text.padEnd(width);
}

function formatRow(cells: string[], width: number): string {
  return cells.map(cell => fitCell(cell, width)).join(COLUMN_GAP).trimEnd();
}

/**
 * Directories side by side, one column each, headed by the directory name
 */
export function formatColumnsOutput(report: UniqueFilesReport, options: FormatOptions = {}): string {
  const limit = options.previewLimit ?? DEFAULT_PREVIEW_LIMIT;
  const width = options.columnWidth ?? DEFAULT_COLUMN_WIDTH;
  const lines: string[] = [];

  lines.push(chalk.bold(`Files unique to each directory (${modeLabel(report)}):`));
  lines.push('');

  const previews = report.roots.map(root => {
    const preview = previewEntries(root.uniqueFiles, limit);
    return root.uniqueCount === 0 ? { shown: ['(none)'], remaining: 0 } : preview;
  });

  lines.push(formatRow(report.roots.map(root => root.name), width));
  lines.push(formatRow(report.roots.map(root => `(${root.uniqueCount} unique)`), width));
  lines.push(formatRow(report.roots.map(() => '-'.repeat(width)), width));

  const rowCount = Math.max(0, ...previews.map(preview => preview.shown.length));
  for (let i = 0; i < rowCount; i++) {
    lines.push(formatRow(previews.map(preview => preview.shown[i] ?? ''), width));
  }

  if (previews.some(preview => preview.remaining > 0)) {
    lines.push(
      formatRow(
        previews.map(preview => (preview.remaining > 0 ? `... and ${preview.remaining} more` : '')),
        width
      )
    );
  }

  lines.push('');
  lines.push(...formatSummary(getReportStats(report)));

  return lines.join('\n');
}

/**
 * Formats the report as JSON, with complete (uncapped) lists
 */
export function formatJsonOutput(report: UniqueFilesReport): string {
  const output = {
    timestamp: new Date().toISOString(),
    mode: report.mode,
    directories: report.roots.map(root => ({
      root: root.root,
      filesIndexed: root.filesIndexed,
      uniqueCount: root.uniqueCount,
      uniqueFiles: root.uniqueFiles
    })),
    invalidRoots: report.invalidRoots,
    unreadable: report.unreadable,
    summary: getReportStats(report)
  };

  return JSON.stringify(output, null, 2);
}

export function formatReport(
  report: UniqueFilesReport,
  format: OutputFormat,
  layout: OutputLayout,
  options: FormatOptions = {}
): string {
  if (format === 'json') {
    return formatJsonOutput(report);
  }
  return layout === 'columns'
    ? formatColumnsOutput(report, options)
    : formatListOutput(report, options);
}
