/**
 * One deduplication session: scan, group, resolve and optionally execute.
 *
 * A cache handed in through `options.cache` stays the caller's to close. A
 * session created with `DeduplicationEngine.fromConfig` opens its own cache and
 * closes it in `close()`.
 */

import { ChecksumCache, type ChecksumStore } from './checksum-cache.js';
import type { AppConfig } from './config.js';
import { DirectoryTreeFingerprinter } from './directory-fingerprinter.js';
import { groupDuplicates } from './duplicate-grouper.js';
import { FileFingerprinter } from './file-fingerprinter.js';
import { FileScanner } from './file-scanner.js';
import { Logger } from './logger.js';
import { MutationExecutor, type FileSystemOps } from './mutation-executor.js';
import { resolveDuplicates } from './resolution.js';
import { assertScanRoot } from './scan-guards.js';
import type {
  DirectoryEntity,
  ExecutionResult,
  FileEntity,
  ProgressCallback,
  ResolutionResult,
  ScanError,
} from './types.js';

const logger = new Logger({ context: 'DeduplicationEngine' });

export type ScanMode = 'files' | 'directories' | 'both';

export interface EngineOptions {
  cache?: ChecksumStore | null;
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  ops?: FileSystemOps;
}

export interface RunOptions {
  mode?: ScanMode;
  extensions?: string[];
  minFileSize?: number;
  minFiles?: number;
  minDirSize?: number;
}

export interface RunSummary {
  root: string;
  mode: ScanMode;
  files: FileEntity[];
  directories: DirectoryEntity[];
  /** Directories left out by the minimum directory size. */
  directoriesBelowMinSize: number;
  result: ResolutionResult;
}

export class DeduplicationEngine {
  private fingerprinter: FileFingerprinter;
  private fileScanner: FileScanner;
  private directoryFingerprinter: DirectoryTreeFingerprinter;
  private executor: MutationExecutor;
  private sessionErrors: ScanError[] = [];
  private ownedCache: ChecksumCache | null = null;

  /**
   * Open a session whose cache location and pool size come from configuration
   */
  static fromConfig(config: AppConfig, options: Omit<EngineOptions, 'cache' | 'concurrency'> = {}): DeduplicationEngine {
    const cache = config.cache.enabled ? new ChecksumCache(config.cache.path) : null;
    const engine = new DeduplicationEngine({ ...options, cache, concurrency: config.scan.concurrency });
    engine.ownedCache = cache;
    return engine;
  }

  constructor(private options: EngineOptions = {}) {
    const cache = options.cache ?? null;
    if (cache instanceof ChecksumCache && !cache.isAvailable()) {
      this.sessionErrors.push({
        path: cache.cachePath,
        kind: 'CACHE_UNAVAILABLE',
        message: cache.getUnavailableReason() ?? 'Checksum cache could not be opened',
      });
    }

    this.fingerprinter = new FileFingerprinter(cache);
    this.fileScanner = new FileScanner(this.fingerprinter);
    this.directoryFingerprinter = new DirectoryTreeFingerprinter(this.fingerprinter, {
      concurrency: options.concurrency,
      signal: options.signal,
      onProgress: options.onProgress,
    });
    this.executor = new MutationExecutor(options.ops);
  }

  /**
   * Every recorded failure of this session, in the order the phases ran. A path
   * both scans failed on is listed once per kind.
   */
  get errors(): ScanError[] {
    const seen = new Set<string>();
    return [...this.sessionErrors, ...this.fileScanner.errors, ...this.directoryFingerprinter.errors].filter(error => {
      const key = `${error.kind}\0${error.path}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  getCacheStats(): { cacheHits: number; cacheMisses: number } {
    return this.fingerprinter.getStats();
  }

  scanFiles(root: string, filter: { extensions?: string[]; minSize?: number } = {}): Promise<FileEntity[]> {
    return this.fileScanner.scanFiles(root, {
      ...filter,
      concurrency: this.options.concurrency,
      signal: this.options.signal,
      onProgress: this.options.onProgress,
    });
  }

  scanDirectoryTree(root: string, minFiles: number = 2): Promise<DirectoryEntity[]> {
    return this.directoryFingerprinter.scanDirectoryTree(root, minFiles);
  }

  resolve(
    fileBuckets: Map<string, FileEntity[]>,
    directoryBuckets: Map<string, DirectoryEntity[]> = new Map()
  ): ResolutionResult {
    return resolveDuplicates(fileBuckets, directoryBuckets, this.errors);
  }

  execute(result: ResolutionResult, dryRun: boolean = true): Promise<ExecutionResult> {
    return this.executor.execute(result, dryRun);
  }

  /**
   * Full pass over `root`: scan what the mode asks for, apply the size filters,
   * then group and resolve. Nothing is modified.
   */
  async run(root: string, options: RunOptions = {}): Promise<RunSummary> {
    const rootPath = await assertScanRoot(root);
    const mode = options.mode ?? 'files';

    let files: FileEntity[] = [];
    if (mode !== 'directories') {
      files = await this.scanFiles(rootPath, {
        extensions: options.extensions,
        minSize: options.minFileSize,
      });
    }

    let directories: DirectoryEntity[] = [];
    let directoriesBelowMinSize = 0;
    if (mode !== 'files') {
      const scanned = await this.scanDirectoryTree(rootPath, options.minFiles ?? 2);
      const minDirSize = options.minDirSize ?? 0;
      directories = scanned.filter(directory => directory.aggregateSize >= minDirSize);
      directoriesBelowMinSize = scanned.length - directories.length;
    }

    const result = this.resolve(groupDuplicates(files), groupDuplicates(directories));
    logger.info('Scan complete', {
      root: rootPath,
      mode,
      files: files.length,
      directories: directories.length,
      fileGroups: result.fileGroups.length,
      directoryGroups: result.directoryGroups.length,
      errors: result.errors.length,
    });

    return { root: rootPath, mode, files, directories, directoriesBelowMinSize, result };
  }

  close(): void {
    this.ownedCache?.close();
    this.ownedCache = null;
  }
}

/**
 * List and fingerprint the files under `root`
 */
export function scanFiles(
  root: string,
  filter: { extensions?: string[]; minSize?: number } = {},
  options: EngineOptions = {}
): Promise<FileEntity[]> {
  return new DeduplicationEngine(options).scanFiles(root, filter);
}

/**
 * Fingerprint the directory tree under `root`
 */
export function scanDirectoryTree(
  root: string,
  minFiles: number = 2,
  options: EngineOptions = {}
): Promise<DirectoryEntity[]> {
  return new DeduplicationEngine(options).scanDirectoryTree(root, minFiles);
}
