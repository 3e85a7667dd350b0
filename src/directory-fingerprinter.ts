/**
 * Bottom-up content fingerprints for whole directory trees.
 *
 * A directory's fingerprint is the SHA-256 of its immediate entries'
 * descriptors, sorted by case-insensitive name and joined by newlines:
 *
 *   F:<name>:<size>:<file sha256>
 *   D:<name>:<subdirectory fingerprint>
 *   ERROR:<name>                      (entry that could not be read)
 *
 * so a parent can only be computed once every child has been. The scan runs in
 * three phases: an explicit-stack listing walk, leaf hashing on a bounded pool,
 * then a reduction over the directories in reverse discovery order (every
 * descendant before its ancestor).
 */

import pLimit from 'p-limit';
import { readdir } from 'fs/promises';
import { join, resolve } from 'path';
import { FileFingerprinter, hashText, type LeafFingerprint } from './file-fingerprinter.js';
import { DEFAULT_CONCURRENCY, recordFailure } from './file-scanner.js';
import { Logger, toError } from './logger.js';
import { assertScanRoot, segmentsBelow, throwIfCancelled } from './scan-guards.js';
import type { DirectoryEntity, ProgressCallback, ScanError } from './types.js';

const logger = new Logger({ context: 'DirectoryFingerprinter' });

type EntryKind = 'file' | 'directory';

interface TreeEntry {
  name: string;
  kind: EntryKind;
  path: string;
}

interface DirectoryNode {
  path: string;
  entries: TreeEntry[];
  listFailed: boolean;
  fingerprint?: string;
  descriptor?: string;
  aggregateSize: number;
  aggregateFileCount: number;
}

export interface DirectoryScanOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface DirectorySummary {
  fingerprint: string;
  aggregateSize: number;
  aggregateFileCount: number;
}

/**
 * Case-insensitive name order, ties broken by the exact name
 */
export function compareEntryNames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Placeholder fingerprint for a directory that could not be listed
 */
export function sentinelFingerprint(path: string): string {
  return hashText(`ERROR:${path}`);
}

export class DirectoryTreeFingerprinter {
  readonly errors: ScanError[] = [];
  private arena = new Map<string, DirectoryNode>();
  /** null marks a file that could not be stat'ed or read. */
  private leafResults = new Map<string, LeafFingerprint | null>();

  constructor(
    private fingerprinter: FileFingerprinter,
    private options: DirectoryScanOptions = {}
  ) {}

  /**
   * Fingerprint every directory under `root` and return those holding at least
   * `minFiles` files in their subtree, in post-order.
   */
  async scanDirectoryTree(root: string, minFiles: number = 2): Promise<DirectoryEntity[]> {
    const rootPath = await assertScanRoot(root);
    const { signal } = this.options;

    const order = await this.listTree(rootPath);
    await this.hashLeaves(order);

    const postOrder = [...order].reverse();
    let completed = 0;
    for (const node of postOrder) {
      throwIfCancelled(signal);
      if (node.fingerprint === undefined) {
        this.reduce(node);
      }
      completed++;
      this.options.onProgress?.({ phase: 'directories', completed, total: postOrder.length, path: node.path });
    }

    const candidates: DirectoryEntity[] = [];
    for (const node of postOrder) {
      if (node.fingerprint === undefined || node.aggregateFileCount < minFiles) continue;
      candidates.push({
        path: node.path,
        fingerprint: node.fingerprint,
        aggregateSize: node.aggregateSize,
        aggregateFileCount: node.aggregateFileCount,
        depth: segmentsBelow(rootPath, node.path),
      });
    }

    logger.info(`Fingerprinted ${postOrder.length} directories`, {
      root: rootPath,
      candidates: candidates.length,
      errors: this.errors.length,
    });
    return candidates;
  }

  /**
   * Memoized result for a directory fingerprinted earlier in this session
   */
  getFingerprint(path: string): DirectorySummary | undefined {
    const node = this.arena.get(resolve(path));
    if (!node || node.fingerprint === undefined) return undefined;
    return {
      fingerprint: node.fingerprint,
      aggregateSize: node.aggregateSize,
      aggregateFileCount: node.aggregateFileCount,
    };
  }

  /**
   * The newline-joined descriptor text the fingerprint was computed from, for diagnostics
   */
  describeDirectory(path: string): string | null {
    return this.arena.get(resolve(path))?.descriptor ?? null;
  }

  private async listTree(rootPath: string): Promise<DirectoryNode[]> {
    const order: DirectoryNode[] = [];
    const stack: string[] = [rootPath];

    for (let path = stack.pop(); path !== undefined; path = stack.pop()) {
      throwIfCancelled(this.options.signal);

      let node = this.arena.get(path);
      if (!node) {
        node = await this.listDirectory(path);
        this.arena.set(path, node);
      }
      order.push(node);

      // Reverse so the first entry in name order is popped first.
      for (let i = node.entries.length - 1; i >= 0; i--) {
        const entry = node.entries[i];
        if (entry.kind === 'directory') {
          stack.push(entry.path);
        }
      }
    }

    return order;
  }

  private async listDirectory(path: string): Promise<DirectoryNode> {
    const node: DirectoryNode = {
      path,
      entries: [],
      listFailed: false,
      aggregateSize: 0,
      aggregateFileCount: 0,
    };

    try {
      const dirents = await readdir(path, { withFileTypes: true });
      for (const dirent of dirents) {
        // Links and special files neither contribute nor get followed.
        const kind: EntryKind | null = dirent.isFile() ? 'file' : dirent.isDirectory() ? 'directory' : null;
        if (kind) {
          node.entries.push({ name: dirent.name, kind, path: join(path, dirent.name) });
        }
      }
      node.entries.sort((a, b) => compareEntryNames(a.name, b.name));
    } catch (error) {
      node.listFailed = true;
      this.errors.push({ path, kind: 'LIST_FAILURE', message: toError(error).message });
      logger.warn('Cannot list directory', { path, reason: toError(error).message });
    }

    return node;
  }

  private async hashLeaves(order: DirectoryNode[]): Promise<void> {
    const pending = order
      .filter(node => node.fingerprint === undefined)
      .flatMap(node => node.entries.filter(entry => entry.kind === 'file' && !this.leafResults.has(entry.path)));

    const limit = pLimit(Math.max(1, this.options.concurrency ?? DEFAULT_CONCURRENCY));
    let completed = 0;
    await Promise.all(
      pending.map(entry =>
        limit(async () => {
          throwIfCancelled(this.options.signal);
          try {
            this.leafResults.set(entry.path, await this.fingerprinter.fingerprint(entry.path));
          } catch (error) {
            this.leafResults.set(entry.path, null);
            recordFailure(this.errors, entry.path, error, 'HASH_FAILURE');
          }
          completed++;
          this.options.onProgress?.({ phase: 'files', completed, total: pending.length, path: entry.path });
        })
      )
    );
  }

  private reduce(node: DirectoryNode): void {
    if (node.listFailed) {
      node.fingerprint = sentinelFingerprint(node.path);
      node.aggregateSize = 0;
      node.aggregateFileCount = 0;
      return;
    }

    const lines: string[] = [];
    let aggregateSize = 0;
    let aggregateFileCount = 0;

    for (const entry of node.entries) {
      if (entry.kind === 'file') {
        const leaf = this.leafResults.get(entry.path);
        if (!leaf) {
          lines.push(`ERROR:${entry.name}`);
          continue;
        }
        lines.push(`F:${entry.name}:${leaf.size}:${leaf.fingerprint}`);
        aggregateSize += leaf.size;
        aggregateFileCount += 1;
        continue;
      }

      const child = this.arena.get(entry.path);
      if (!child || child.fingerprint === undefined) {
        // Post-order guarantees children first; reaching this means the walk is broken.
        throw new Error(`Subdirectory ${entry.path} was not fingerprinted before ${node.path}`);
      }
      lines.push(`D:${entry.name}:${child.fingerprint}`);
      aggregateSize += child.aggregateSize;
      aggregateFileCount += child.aggregateFileCount;
    }

    node.descriptor = lines.join('\n');
    node.fingerprint = hashText(node.descriptor);
    node.aggregateSize = aggregateSize;
    node.aggregateFileCount = aggregateFileCount;
  }
}
