/**
 * Content fingerprints for individual files
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { AppError, Logger, errnoCode, toError } from './logger.js';
import type { ChecksumStore } from './checksum-cache.js';
import type { FileEntity } from './types.js';

const logger = new Logger({ context: 'FileFingerprinter' });

export interface LeafFingerprint {
  fingerprint: string;
  size: number;
  modificationTimestamp: number;
}

/**
 * SHA-256 hex digest of a UTF-8 string
 */
export function hashText(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Stream a file through SHA-256 without buffering it whole
 */
export async function hashFileContent(path: string): Promise<string> {
  const hash = createHash('sha256');
  await pipeline(createReadStream(path), hash);
  return hash.digest('hex');
}

/**
 * Computes file fingerprints through the checksum cache.
 *
 * Results are memoized by path for the lifetime of the instance, so one scan
 * session never reads the same file twice. Failures are rethrown as AppError
 * with code STAT_FAILURE or HASH_FAILURE; recording them is the caller's job.
 */
export class FileFingerprinter {
  private inFlight = new Map<string, Promise<LeafFingerprint>>();
  private hits = 0;
  private misses = 0;

  constructor(private cache: ChecksumStore | null = null) {}

  fingerprint(path: string): Promise<LeafFingerprint> {
    let pending = this.inFlight.get(path);
    if (!pending) {
      pending = this.compute(path);
      this.inFlight.set(path, pending);
    }
    return pending;
  }

  /**
   * Populate `file.fingerprint` if it is not set yet
   */
  async ensureFingerprint(file: FileEntity): Promise<string> {
    if (file.fingerprint !== undefined) {
      return file.fingerprint;
    }
    const { fingerprint } = await this.fingerprint(file.path);
    file.fingerprint = fingerprint;
    return fingerprint;
  }

  getStats(): { cacheHits: number; cacheMisses: number } {
    return { cacheHits: this.hits, cacheMisses: this.misses };
  }

  private async compute(path: string): Promise<LeafFingerprint> {
    let size: number;
    let modificationTimestamp: number;
    try {
      const stats = await stat(path);
      size = stats.size;
      modificationTimestamp = stats.mtimeMs;
    } catch (error) {
      throw new AppError(`Cannot stat ${path}: ${toError(error).message}`, 'STAT_FAILURE', 1, {
        path,
        errno: errnoCode(error)
      });
    }

    const cached = this.cache?.get(path, size, modificationTimestamp) ?? null;
    if (cached) {
      this.hits++;
      return { fingerprint: cached, size, modificationTimestamp };
    }

    this.misses++;
    let fingerprint: string;
    try {
      fingerprint = await hashFileContent(path);
    } catch (error) {
      throw new AppError(`Cannot read ${path}: ${toError(error).message}`, 'HASH_FAILURE', 1, {
        path,
        errno: errnoCode(error)
      });
    }

    this.cache?.put(path, size, modificationTimestamp, fingerprint);
    logger.debug('File fingerprinted', { path, size });
    return { fingerprint, size, modificationTimestamp };
  }
}
