/**
 * Recursive file discovery and fingerprinting
 */

import fg from 'fast-glob';
import pLimit from 'p-limit';
import { stat } from 'fs/promises';
import { join, relative, resolve } from 'path';
import { FileFingerprinter } from './file-fingerprinter.js';
import { AppError, Logger, toError } from './logger.js';
import { assertScanRoot, segmentsBelow, throwIfCancelled } from './scan-guards.js';
import type { FileEntity, ProgressCallback, ScanError, ScanErrorKind } from './types.js';

const logger = new Logger({ context: 'FileScanner' });

export const DEFAULT_CONCURRENCY = 8;

export interface FileScanOptions {
  /** Allow-list of extensions, matched case-insensitively; empty means every file. */
  extensions?: string[];
  /** Files smaller than this many bytes are left out. */
  minSize?: number;
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

/**
 * Lower-case each extension and give it a leading dot: `TXT` and `.txt` both become `.txt`.
 */
export function normalizeExtensions(extensions: string[] | string | undefined): string[] {
  if (!extensions) return [];
  const list = Array.isArray(extensions) ? extensions : extensions.split(',');
  const normalized = list
    .map(ext => ext.trim().toLowerCase())
    .filter(Boolean)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
  return [...new Set(normalized)];
}

function matchesExtension(name: string, extensions: string[]): boolean {
  if (extensions.length === 0) return true;
  const lower = name.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext));
}

export function recordFailure(errors: ScanError[], path: string, error: unknown, fallback: ScanErrorKind): void {
  const kind = error instanceof AppError && isScanErrorKind(error.code) ? error.code : fallback;
  errors.push({ path, kind, message: toError(error).message });
}

function isScanErrorKind(code: string): code is ScanErrorKind {
  return ['STAT_FAILURE', 'LIST_FAILURE', 'HASH_FAILURE', 'CACHE_UNAVAILABLE', 'MUTATION_FAILURE'].includes(code);
}

export class FileScanner {
  readonly errors: ScanError[] = [];

  constructor(private fingerprinter: FileFingerprinter) {}

  /**
   * List every regular file under `root` that passes the filters, then fingerprint them.
   *
   * Symbolic links are not followed. Files that fail stat are recorded and left
   * out; files that fail hashing are returned without a fingerprint.
   */
  async scanFiles(root: string, options: FileScanOptions = {}): Promise<FileEntity[]> {
    const rootPath = await assertScanRoot(root);
    const extensions = normalizeExtensions(options.extensions);
    const minSize = options.minSize ?? 0;
    const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));

    const relativePaths = await this.listFiles(rootPath, extensions, options.signal);

    const discovered = await Promise.all(
      relativePaths.map(relativePath =>
        limit(() => this.statFile(rootPath, resolve(rootPath, relativePath), options.signal))
      )
    );

    const files = discovered.filter((file): file is FileEntity => file !== null);
    const candidates = files.filter(file => file.size >= minSize);
    if (candidates.length < files.length) {
      logger.info(`Filtered out ${files.length - candidates.length} files smaller than ${minSize} bytes`);
    }

    let completed = 0;
    await Promise.all(
      candidates.map(file =>
        limit(async () => {
          throwIfCancelled(options.signal);
          try {
            await this.fingerprinter.ensureFingerprint(file);
          } catch (error) {
            recordFailure(this.errors, file.path, error, 'HASH_FAILURE');
          }
          completed++;
          options.onProgress?.({ phase: 'files', completed, total: candidates.length, path: file.path });
        })
      )
    );

    logger.info(`Scanned ${candidates.length} files`, { root: rootPath, errors: this.errors.length });
    return candidates;
  }

  /**
   * Walk the tree one directory at a time so an unreadable directory is recorded
   * as LIST_FAILURE and its siblings are still listed.
   */
  private async listFiles(rootPath: string, extensions: string[], signal?: AbortSignal): Promise<string[]> {
    const files: string[] = [];
    const stack: string[] = [rootPath];

    for (let directory = stack.pop(); directory !== undefined; directory = stack.pop()) {
      throwIfCancelled(signal);

      let entries: fg.Entry[];
      try {
        entries = await fg('*', {
          cwd: directory,
          dot: true,
          onlyFiles: false,
          objectMode: true,
          followSymbolicLinks: false,
          suppressErrors: false,
        });
      } catch (error) {
        recordFailure(this.errors, directory, error, 'LIST_FAILURE');
        logger.warn('Cannot list directory', { path: directory, reason: toError(error).message });
        continue;
      }

      for (const entry of entries) {
        const path = join(directory, entry.name);
        if (entry.dirent.isDirectory()) {
          stack.push(path);
        } else if (entry.dirent.isFile() && matchesExtension(entry.name, extensions)) {
          files.push(relative(rootPath, path));
        }
      }
    }

    return files.sort();
  }

  private async statFile(rootPath: string, path: string, signal?: AbortSignal): Promise<FileEntity | null> {
    throwIfCancelled(signal);
    try {
      const stats = await stat(path);
      if (!stats.isFile()) return null;
      return {
        path,
        size: stats.size,
        modificationTimestamp: stats.mtimeMs,
        depth: segmentsBelow(rootPath, path) - 1,
      };
    } catch (error) {
      recordFailure(this.errors, path, error, 'STAT_FAILURE');
      return null;
    }
  }
}
