import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ChecksumCache, defaultCachePath } from './checksum-cache.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = 1_700_000_000_000;

describe('ChecksumCache', () => {
  const cacheDir = join(process.cwd(), '.test-tmp', 'checksum-cache');
  const cachePath = join(cacheDir, 'nested', 'checksums.db');
  let cache: ChecksumCache;

  beforeEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
    cache = new ChecksumCache(cachePath);
  });

  afterEach(() => {
    cache.close();
    rmSync(cacheDir, { recursive: true, force: true });
  });

  describe('Lookups', () => {
    it('should create the database and its parent directories', () => {
      expect(cache.isAvailable()).toBe(true);
      expect(cache.getUnavailableReason()).toBeNull();
    });

    it('should return null for unknown paths', () => {
      expect(cache.get('/data/missing.txt', 10, NOW)).toBeNull();
    });

    it('should hit only when size and modification time both match', () => {
      cache.put('/data/a.txt', 100, NOW, 'fingerprint-a');

      expect(cache.get('/data/a.txt', 100, NOW)).toBe('fingerprint-a');
      expect(cache.get('/data/a.txt', 200, NOW)).toBeNull();
      expect(cache.get('/data/a.txt', 100, NOW + 1)).toBeNull();
      expect(cache.get('/data/a.txt', 100, NOW + 0.5)).toBeNull();
    });

    it('should replace the record of a path on put', () => {
      cache.put('/data/a.txt', 100, NOW, 'old');
      cache.put('/data/a.txt', 120, NOW + 5, 'new');

      expect(cache.get('/data/a.txt', 100, NOW)).toBeNull();
      expect(cache.get('/data/a.txt', 120, NOW + 5)).toBe('new');
      expect(cache.stats().totalEntries).toBe(1);
    });

    it('should persist records across handles', () => {
      cache.put('/data/a.txt', 100, NOW, 'fingerprint-a');
      cache.close();

      cache = new ChecksumCache(cachePath);
      expect(cache.get('/data/a.txt', 100, NOW)).toBe('fingerprint-a');
    });
  });

  describe('Maintenance', () => {
    it('should count entries and distinct fingerprints', () => {
      cache.put('/data/a.txt', 1, NOW, 'same');
      cache.put('/data/b.txt', 1, NOW, 'same');
      cache.put('/data/c.txt', 2, NOW, 'other');

      expect(cache.stats()).toEqual({ totalEntries: 3, uniqueFingerprints: 2 });
    });

    it('should prune records whose file modification time is older than the cutoff', () => {
      cache.put('/data/old.txt', 1, NOW - 40 * DAY_MS, 'old');
      cache.put('/data/recent.txt', 1, NOW - 5 * DAY_MS, 'recent');

      expect(cache.cleanup(30, NOW)).toBe(1);
      expect(cache.get('/data/old.txt', 1, NOW - 40 * DAY_MS)).toBeNull();
      expect(cache.get('/data/recent.txt', 1, NOW - 5 * DAY_MS)).toBe('recent');
    });

    it('should report zero when nothing is stale', () => {
      cache.put('/data/recent.txt', 1, NOW, 'recent');
      expect(cache.cleanup(30, NOW)).toBe(0);
    });

    it('should clear every record', () => {
      cache.put('/data/a.txt', 1, NOW, 'a');
      cache.put('/data/b.txt', 1, NOW, 'b');
      cache.clear();

      expect(cache.stats()).toEqual({ totalEntries: 0, uniqueFingerprints: 0 });
    });
  });

  describe('Unavailable store', () => {
    it('should behave as an always-miss store when the database cannot be opened', () => {
      mkdirSync(cacheDir, { recursive: true });
      const blocker = join(cacheDir, 'blocker');
      writeFileSync(blocker, 'not a directory');

      const broken = new ChecksumCache(join(blocker, 'checksums.db'));

      expect(broken.isAvailable()).toBe(false);
      expect(broken.getUnavailableReason()).toEqual(expect.any(String));
      expect(() => broken.put('/data/a.txt', 1, NOW, 'a')).not.toThrow();
      expect(broken.get('/data/a.txt', 1, NOW)).toBeNull();
      expect(broken.cleanup(30, NOW)).toBe(0);
      expect(broken.stats()).toEqual({ totalEntries: 0, uniqueFingerprints: 0 });
      broken.close();
    });

    it('should fail open when a maintenance statement fails', () => {
      cache.put('/data/a.txt', 1, NOW, 'a');
      const other = new Database(cachePath);
      other.exec('DROP TABLE file_cache');
      other.close();

      expect(cache.cleanup(30, NOW)).toBe(0);
      expect(cache.stats()).toEqual({ totalEntries: 0, uniqueFingerprints: 0 });
      expect(() => cache.clear()).not.toThrow();
      expect(cache.get('/data/a.txt', 1, NOW)).toBeNull();
    });
  });

  describe('Location', () => {
    it('should prefer the explicit environment override', () => {
      expect(defaultCachePath({ DEDUPE_TREE_CACHE_PATH: '/srv/cache/dedupe.db' })).toBe('/srv/cache/dedupe.db');
    });

    it('should live under XDG_CACHE_HOME when it is set', () => {
      expect(defaultCachePath({ XDG_CACHE_HOME: '/var/cache/user' })).toBe(
        join('/var/cache/user', 'dedupe-tree', 'checksums.db')
      );
    });

    it('should support an in-memory store', () => {
      const memory = new ChecksumCache(':memory:');
      memory.put('/data/a.txt', 1, NOW, 'a');
      expect(memory.get('/data/a.txt', 1, NOW)).toBe('a');
      memory.close();
    });
  });
});
