import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ChecksumCache, type ChecksumStore } from './checksum-cache.js';
import { FileFingerprinter, hashFileContent, hashText } from './file-fingerprinter.js';
import type { FileEntity } from './types.js';

const SHA256_ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const SHA256_EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('FileFingerprinter', () => {
  const tempDir = join(process.cwd(), '.test-tmp', 'file-fingerprinter');
  const filePath = join(tempDir, 'abc.txt');

  beforeEach(() => {
    mkdirSync(tempDir, { recursive: true });
    writeFileSync(filePath, 'abc');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('Hashing', () => {
    it('should hash text as SHA-256 hex', () => {
      expect(hashText('abc')).toBe(SHA256_ABC);
      expect(hashText('')).toBe(SHA256_EMPTY);
    });

    it('should hash file content the same way', async () => {
      expect(await hashFileContent(filePath)).toBe(SHA256_ABC);
    });

    it('should return the fingerprint with the observed size', async () => {
      const result = await new FileFingerprinter().fingerprint(filePath);

      expect(result.fingerprint).toBe(SHA256_ABC);
      expect(result.size).toBe(3);
      expect(result.modificationTimestamp).toBeGreaterThan(0);
    });

    it('should reject with STAT_FAILURE for a missing file', async () => {
      await expect(new FileFingerprinter().fingerprint(join(tempDir, 'missing.txt'))).rejects.toMatchObject({
        code: 'STAT_FAILURE',
      });
    });
  });

  describe('Cache', () => {
    it('should not read the file when the cache hits', async () => {
      const store: ChecksumStore = {
        get: vi.fn(() => 'cached-fingerprint'),
        put: vi.fn(),
      };

      const result = await new FileFingerprinter(store).fingerprint(filePath);

      expect(result.fingerprint).toBe('cached-fingerprint');
      expect(store.put).not.toHaveBeenCalled();
    });

    it('should store fresh fingerprints and reuse them in a later session', async () => {
      const cache = new ChecksumCache(':memory:');

      const first = new FileFingerprinter(cache);
      await first.fingerprint(filePath);
      expect(first.getStats()).toEqual({ cacheHits: 0, cacheMisses: 1 });

      const second = new FileFingerprinter(cache);
      const result = await second.fingerprint(filePath);
      expect(result.fingerprint).toBe(SHA256_ABC);
      expect(second.getStats()).toEqual({ cacheHits: 1, cacheMisses: 0 });

      cache.close();
    });

    it('should recompute after the file changes size', async () => {
      const cache = new ChecksumCache(':memory:');
      await new FileFingerprinter(cache).fingerprint(filePath);

      writeFileSync(filePath, 'abcd');
      const result = await new FileFingerprinter(cache).fingerprint(filePath);

      expect(result.fingerprint).toBe(hashText('abcd'));
      cache.close();
    });
  });

  describe('Memoization', () => {
    it('should compute each path once per session', async () => {
      const store: ChecksumStore = {
        get: vi.fn(() => null),
        put: vi.fn(),
      };
      const fingerprinter = new FileFingerprinter(store);

      const [a, b] = await Promise.all([fingerprinter.fingerprint(filePath), fingerprinter.fingerprint(filePath)]);
      await fingerprinter.fingerprint(filePath);

      expect(a).toBe(b);
      expect(store.get).toHaveBeenCalledTimes(1);
      expect(store.put).toHaveBeenCalledTimes(1);
    });

    it('should populate an entity fingerprint exactly once', async () => {
      const fingerprinter = new FileFingerprinter();
      const file: FileEntity = { path: filePath, size: 3, modificationTimestamp: 0, depth: 0 };

      expect(await fingerprinter.ensureFingerprint(file)).toBe(SHA256_ABC);
      expect(file.fingerprint).toBe(SHA256_ABC);

      const preset: FileEntity = { ...file, fingerprint: 'preset' };
      expect(await fingerprinter.ensureFingerprint(preset)).toBe('preset');
    });
  });
});
