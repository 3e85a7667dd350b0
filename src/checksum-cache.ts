/**
 * Persistent checksum cache backed by SQLite.
 *
 * A record is keyed by file path and is only valid while both the size and the
 * modification time stored with it equal the file's current values.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { Logger, toError } from './logger.js';
import type { CacheStats } from './types.js';

const logger = new Logger({ context: 'ChecksumCache' });

const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Minimal lookup surface the fingerprinters depend on.
 */
export interface ChecksumStore {
  get(path: string, size: number, modificationTime: number): string | null;
  put(path: string, size: number, modificationTime: number, fingerprint: string): void;
}

export function defaultCachePath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DEDUPE_TREE_CACHE_PATH) {
    return env.DEDUPE_TREE_CACHE_PATH;
  }
  const base = env.XDG_CACHE_HOME || join(homedir(), '.cache');
  return join(base, 'dedupe-tree', 'checksums.db');
}

export class ChecksumCache implements ChecksumStore {
  private db: Database.Database | null = null;
  private unavailableReason: string | null = null;
  readonly cachePath: string;

  constructor(cachePath: string = defaultCachePath()) {
    this.cachePath = cachePath;
    this.open();
  }

  private open(): void {
    try {
      if (this.cachePath !== ':memory:') {
        mkdirSync(dirname(this.cachePath), { recursive: true });
      }
      const db = new Database(this.cachePath);
      db.pragma('journal_mode = WAL');
      db.exec(`
        CREATE TABLE IF NOT EXISTS file_cache (
          file_path TEXT PRIMARY KEY,
          file_size INTEGER NOT NULL,
          modification_time REAL NOT NULL,
          checksum TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_modification_time
          ON file_cache(modification_time);
      `);
      this.db = db;
      logger.debug('Checksum cache opened', { path: this.cachePath });
    } catch (error) {
      this.unavailableReason = toError(error).message;
      logger.warn('Checksum cache unavailable, fingerprints will be computed without caching', {
        path: this.cachePath,
        reason: this.unavailableReason
      });
    }
  }

  isAvailable(): boolean {
    return this.db !== null;
  }

  /**
   * Why the store could not be opened, or null when it is usable
   */
  getUnavailableReason(): string | null {
    return this.unavailableReason;
  }

  get(path: string, size: number, modificationTime: number): string | null {
    if (!this.db) return null;

    try {
      const row = this.db
        .prepare(`
          SELECT checksum FROM file_cache
          WHERE file_path = ? AND file_size = ? AND modification_time = ?
        `)
        .get(path, size, modificationTime) as { checksum: string } | undefined;
      return row?.checksum ?? null;
    } catch (error) {
      logger.warn('Cache lookup failed, treating as miss', { path, reason: toError(error).message });
      return null;
    }
  }

  put(path: string, size: number, modificationTime: number, fingerprint: string): void {
    if (!this.db) return;

    try {
      this.db
        .prepare(`
          INSERT OR REPLACE INTO file_cache
            (file_path, file_size, modification_time, checksum)
          VALUES (?, ?, ?, ?)
        `)
        .run(path, size, modificationTime, fingerprint);
    } catch (error) {
      logger.warn('Cache write failed, continuing without it', { path, reason: toError(error).message });
    }
  }

  /**
   * Delete records whose stored modification time is older than `maxAgeDays`.
   *
   * The cutoff applies to the cached file's own mtime, not to when the record
   * was written.
   */
  cleanup(maxAgeDays: number = 30, now: number = Date.now()): number {
    if (!this.db) return 0;

    const cutoff = now - maxAgeDays * SECONDS_PER_DAY * 1000;
    try {
      const result = this.db
        .prepare('DELETE FROM file_cache WHERE modification_time < ?')
        .run(cutoff);

      if (result.changes > 0) {
        logger.info(`Pruned ${result.changes} stale cache entries`, { maxAgeDays });
      }
      return result.changes;
    } catch (error) {
      logger.warn('Cache cleanup failed, nothing removed', { path: this.cachePath, reason: toError(error).message });
      return 0;
    }
  }

  stats(): CacheStats {
    if (!this.db) {
      return { totalEntries: 0, uniqueFingerprints: 0 };
    }

    try {
      const row = this.db
        .prepare(`
          SELECT COUNT(*) AS totalEntries, COUNT(DISTINCT checksum) AS uniqueFingerprints
          FROM file_cache
        `)
        .get() as CacheStats;
      return { totalEntries: row.totalEntries, uniqueFingerprints: row.uniqueFingerprints };
    } catch (error) {
      logger.warn('Cache statistics unavailable', { path: this.cachePath, reason: toError(error).message });
      return { totalEntries: 0, uniqueFingerprints: 0 };
    }
  }

  clear(): void {
    if (!this.db) return;
    try {
      this.db.prepare('DELETE FROM file_cache').run();
      logger.info('Checksum cache cleared', { path: this.cachePath });
    } catch (error) {
      logger.warn('Cache clear failed', { path: this.cachePath, reason: toError(error).message });
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
