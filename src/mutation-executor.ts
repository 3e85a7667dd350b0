/**
 * Replaces duplicates with symbolic links to their keep item
 */

import { rm, symlink, unlink } from 'fs/promises';
import { resolve } from 'path';
import { Logger, toError } from './logger.js';
import type { DuplicateGroup, ExecutionResult, Fingerprinted, ResolutionResult, ScanError } from './types.js';

const logger = new Logger({ context: 'MutationExecutor' });

export type EntryType = 'file' | 'directory';

/**
 * Filesystem operations the executor performs, injectable for tests.
 */
export interface FileSystemOps {
  remove(path: string, type: EntryType): Promise<void>;
  link(target: string, path: string, type: EntryType): Promise<void>;
}

export const nodeFileSystemOps: FileSystemOps = {
  async remove(path, type) {
    if (type === 'directory') {
      await rm(path, { recursive: true });
    } else {
      await unlink(path);
    }
  },
  async link(target, path, type) {
    await symlink(target, path, type === 'directory' ? 'dir' : 'file');
  },
};

export interface ExecuteOptions {
  ops?: FileSystemOps;
}

export class MutationExecutor {
  private ops: FileSystemOps;

  constructor(ops: FileSystemOps = nodeFileSystemOps) {
    this.ops = ops;
  }

  /**
   * Apply every group's keep/remove decision.
   *
   * Each remove item is deleted and replaced by a link to the keep item. A
   * failure on one item is recorded and the batch continues; an item whose
   * delete succeeded but whose link failed stays deleted. Dry runs touch
   * nothing and report the same paths.
   */
  async execute(result: ResolutionResult, dryRun: boolean = true): Promise<ExecutionResult> {
    const errors: ScanError[] = [];
    const linkedFiles = await this.processGroups(result.fileGroups, 'file', dryRun, errors);
    const linkedDirectories = await this.processGroups(result.directoryGroups, 'directory', dryRun, errors);

    if (!dryRun) {
      logger.info('Duplicates replaced with links', {
        files: linkedFiles.length,
        directories: linkedDirectories.length,
        failures: errors.length,
      });
    }

    return { dryRun, linkedFiles, linkedDirectories, errors };
  }

  private async processGroups<T extends Fingerprinted>(
    groups: DuplicateGroup<T>[],
    type: EntryType,
    dryRun: boolean,
    errors: ScanError[]
  ): Promise<string[]> {
    const processed: string[] = [];

    for (const group of groups) {
      const target = resolve(group.keepItem.path);
      for (const item of group.removeItems) {
        if (dryRun) {
          processed.push(item.path);
          continue;
        }

        try {
          await this.ops.remove(item.path, type);
        } catch (error) {
          this.fail(errors, item.path, `Failed to remove ${type}`, error);
          continue;
        }

        try {
          await this.ops.link(target, item.path, type);
        } catch (error) {
          this.fail(errors, item.path, `Removed ${type} but failed to link it to ${target}`, error);
          continue;
        }

        processed.push(item.path);
      }
    }

    return processed;
  }

  private fail(errors: ScanError[], path: string, what: string, error: unknown): void {
    const message = `${what}: ${toError(error).message}`;
    errors.push({ path, kind: 'MUTATION_FAILURE', message });
    logger.warn(message, { path });
  }
}

/**
 * Convenience wrapper returning the linked file and directory paths
 */
export async function execute(
  result: ResolutionResult,
  dryRun: boolean = true,
  options: ExecuteOptions = {}
): Promise<ExecutionResult> {
  return new MutationExecutor(options.ops).execute(result, dryRun);
}
