/**
 * Plain-text rendering of scan results for the CLI and its log file
 */

import type { RunSummary } from './dedupe-engine.js';
import type { DirectoryEntity, DuplicateGroup, ExecutionResult, FileEntity, ResolutionResult, ScanError } from './types.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable size with one decimal: 1536 -> "1.5 KB"
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

type Align = 'left' | 'right';

interface Column {
  header: string;
  align: Align;
}

export function renderTable(columns: Column[], rows: string[][]): string[] {
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map(row => row[index].length))
  );
  const format = (cells: string[]): string =>
    cells
      .map((cell, index) => (columns[index].align === 'right' ? cell.padStart(widths[index]) : cell.padEnd(widths[index])))
      .join('  ')
      .trimEnd();

  return [
    format(columns.map(column => column.header)),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...rows.map(format),
  ];
}

export interface ReportHeader {
  root: string;
  apply: boolean;
  mode: RunSummary['mode'];
  extensions: string[];
  minFileSize: number;
  minFiles: number;
  minDirSize: number;
}

const MODE_LABELS: Record<RunSummary['mode'], string> = {
  files: 'files',
  directories: 'directories',
  both: 'files & directories',
};

export function renderHeader(header: ReportHeader): string[] {
  const lines = [
    `=== Dedupe Tree: ${header.apply ? 'APPLY' : 'DRY RUN'} MODE (${MODE_LABELS[header.mode]}) ===`,
    `Directory: ${header.root}`,
  ];
  if (header.mode !== 'directories') {
    lines.push(`Extensions: ${header.extensions.length > 0 ? header.extensions.join(',') : 'All files'}`);
    lines.push(`Min file size: ${formatSize(header.minFileSize)}`);
  }
  if (header.mode !== 'files') {
    lines.push(`Min files per directory: ${header.minFiles}`);
    lines.push(`Min directory size: ${formatSize(header.minDirSize)}`);
  }
  return lines;
}

export function renderSummary(result: ResolutionResult): string[] {
  const lines = ['', 'Summary:'];
  if (result.fileGroups.length > 0) {
    lines.push(`• Duplicate file groups: ${formatCount(result.fileGroups.length)}`);
    lines.push(`• Files to replace: ${formatCount(result.totalFilesToRemove)}`);
  }
  if (result.directoryGroups.length > 0) {
    lines.push(`• Duplicate directory groups: ${formatCount(result.directoryGroups.length)}`);
    lines.push(`• Directories to replace: ${formatCount(result.totalDirectoriesToRemove)}`);
  }
  lines.push(`• Space to free: ${formatSize(result.totalSpaceToFree)}`);
  if (result.errors.length > 0) {
    lines.push(`• Errors encountered: ${formatCount(result.errors.length)}`);
  }
  return lines;
}

function renderFileGroup(group: DuplicateGroup<FileEntity>, index: number): string[] {
  const row = (status: string, file: FileEntity): string[] => [status, String(file.depth), formatSize(file.size), file.path];
  return [
    `File Group ${index}: ${group.fingerprint.slice(0, 16)}... (${formatSize(group.totalSize)} total)`,
    ...renderTable(
      [
        { header: 'Status', align: 'left' },
        { header: 'Depth', align: 'right' },
        { header: 'Size', align: 'right' },
        { header: 'Path', align: 'left' },
      ],
      [row('KEEP', group.keepItem), ...group.removeItems.map(file => row('REMOVE', file))]
    ),
    '',
  ];
}

function renderDirectoryGroup(group: DuplicateGroup<DirectoryEntity>, index: number): string[] {
  const row = (status: string, directory: DirectoryEntity): string[] => [
    status,
    String(directory.depth),
    formatSize(directory.aggregateSize),
    String(directory.aggregateFileCount),
    directory.path,
  ];
  return [
    `Directory Group ${index}: ${group.fingerprint.slice(0, 16)}... ` +
      `(${formatSize(group.totalSize)} total, ${group.keepItem.aggregateFileCount} files)`,
    ...renderTable(
      [
        { header: 'Status', align: 'left' },
        { header: 'Depth', align: 'right' },
        { header: 'Size', align: 'right' },
        { header: 'Files', align: 'right' },
        { header: 'Path', align: 'left' },
      ],
      [row('KEEP', group.keepItem), ...group.removeItems.map(directory => row('REMOVE', directory))]
    ),
    '',
  ];
}

/**
 * One table per group, largest reclaimable space first
 */
export function renderDetailedReport(result: ResolutionResult): string[] {
  return [
    '',
    'Detailed Report:',
    ...result.fileGroups.flatMap((group, i) => renderFileGroup(group, i + 1)),
    ...result.directoryGroups.flatMap((group, i) => renderDirectoryGroup(group, i + 1)),
  ];
}

export function renderErrors(errors: ScanError[]): string[] {
  if (errors.length === 0) return [];
  return ['', 'Errors:', ...errors.map(error => `  [${error.kind}] ${error.path}: ${error.message}`)];
}

/**
 * Closing statistics for a run that modified nothing
 */
export function renderDryRunSummary(summary: RunSummary): string[] {
  const { result, files, directories } = summary;
  const fileSpace = files.reduce((sum, file) => sum + file.size, 0);
  const directorySpace = directories.reduce((sum, directory) => sum + directory.aggregateSize, 0);
  const spaceScanned = fileSpace + directorySpace;
  const savingsPercent = spaceScanned > 0 ? (result.totalSpaceToFree / spaceScanned) * 100 : 0;

  const lines = ['', '='.repeat(60), 'DRY RUN COMPLETE', ''];

  if (files.length > 0) {
    lines.push(
      'File Analysis:',
      `• Total files scanned: ${formatCount(files.length)}`,
      `• Unique files after cleanup: ${formatCount(files.length - result.totalFilesToRemove)}`,
      `• Duplicate file groups: ${formatCount(result.fileGroups.length)}`,
      `• Duplicate files to replace: ${formatCount(result.totalFilesToRemove)}`,
      ''
    );
  }

  if (directories.length > 0) {
    lines.push(
      'Directory Analysis:',
      `• Total directories considered: ${formatCount(directories.length)}`,
      `• Unique directories after cleanup: ${formatCount(directories.length - result.totalDirectoriesToRemove)}`,
      `• Duplicate directory groups: ${formatCount(result.directoryGroups.length)}`,
      `• Duplicate directories to replace: ${formatCount(result.totalDirectoriesToRemove)}`,
      ''
    );
  }

  lines.push(
    'Space Analysis:',
    `• Total space scanned: ${formatSize(spaceScanned)}`,
    `• Space to be freed: ${formatSize(result.totalSpaceToFree)}`,
    `• Space after cleanup: ${formatSize(spaceScanned - result.totalSpaceToFree)}`,
    `• Space savings: ${savingsPercent.toFixed(1)}%`,
    '',
    'No files or directories were modified. Use --delete to replace duplicates with links.'
  );
  return lines;
}

export function renderExecution(execution: ExecutionResult): string[] {
  const done: string[] = [];
  if (execution.linkedFiles.length > 0) {
    done.push(`${execution.linkedFiles.length} duplicate files`);
  }
  if (execution.linkedDirectories.length > 0) {
    done.push(`${execution.linkedDirectories.length} duplicate directories`);
  }

  const lines: string[] = [];
  if (done.length > 0) {
    lines.push('', `✓ Replaced ${done.join(' and ')} with links`);
  }
  if (execution.errors.length > 0) {
    lines.push(`Failed to replace ${execution.errors.length} items`);
    lines.push(...execution.errors.map(error => `  ${error.path}: ${error.message}`));
  }
  return lines;
}
