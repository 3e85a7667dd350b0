import { stat } from 'fs/promises';
import { relative, resolve, sep } from 'path';
import { AppError, errnoCode } from './logger.js';

/**
 * Resolve the scan root and fail fast when it is missing or not a directory.
 */
export async function assertScanRoot(root: string): Promise<string> {
  const rootPath = resolve(root);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(rootPath)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new AppError(`Directory not found: ${rootPath}`, 'SCAN_ROOT_NOT_FOUND', 1, { path: rootPath });
    }
    throw new AppError(`Scan root not accessible: ${rootPath}`, 'SCAN_ROOT_NOT_FOUND', 1, {
      path: rootPath,
      errno: errnoCode(error)
    });
  }

  if (!isDirectory) {
    throw new AppError(`Path is not a directory: ${rootPath}`, 'SCAN_ROOT_NOT_DIRECTORY', 1, { path: rootPath });
  }
  return rootPath;
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AppError('Scan cancelled', 'SCAN_CANCELLED', 130);
  }
}

/**
 * Number of path segments of `path` below `root` ('' counts as 0).
 */
export function segmentsBelow(root: string, path: string): number {
  const rel = relative(root, path);
  return rel === '' ? 0 : rel.split(sep).length;
}
