import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ChecksumCache } from './checksum-cache.js';
import { defaultConfig } from './config.js';
import { DeduplicationEngine, scanDirectoryTree, scanFiles } from './dedupe-engine.js';
import { hashText } from './file-fingerprinter.js';

const { deniedStats } = vi.hoisted(() => ({ deniedStats: new Set<string>() }));

vi.mock('fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    stat: async (path: string) => {
      if (deniedStats.has(path)) {
        throw Object.assign(new Error(`EACCES: permission denied, stat '${path}'`), { code: 'EACCES' });
      }
      return actual.stat(path);
    },
  };
});

describe('DeduplicationEngine', () => {
  const root = join(process.cwd(), '.test-tmp', 'dedupe-engine');
  const tree = join(root, 'tree');

  beforeEach(() => {
    rmSync(root, { recursive: true, force: true });
    for (const name of ['photos', 'photos-copy']) {
      mkdirSync(join(tree, name), { recursive: true });
      writeFileSync(join(tree, name, 'one.jpg'), 'image one');
      writeFileSync(join(tree, name, 'two.jpg'), 'image two');
    }
    writeFileSync(join(tree, 'readme.txt'), 'image one');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    deniedStats.clear();
  });

  describe('run', () => {
    it('should group duplicate files by default', async () => {
      const engine = new DeduplicationEngine();
      const summary = await engine.run(tree);

      expect(summary.mode).toBe('files');
      expect(summary.files).toHaveLength(5);
      expect(summary.directories).toEqual([]);
      expect(summary.result.fileGroups).toHaveLength(2);

      const imageOne = summary.result.fileGroups.find(group => group.fingerprint === hashText('image one'));
      expect(imageOne?.keepItem.path).toBe(join(tree, 'readme.txt'));
      // '-' sorts before '/', so photos-copy/ precedes photos/
      expect(imageOne?.removeItems.map(item => item.path)).toEqual([
        join(tree, 'photos-copy', 'one.jpg'),
        join(tree, 'photos', 'one.jpg'),
      ]);
    });

    it('should group duplicate directory trees in directory mode', async () => {
      const summary = await new DeduplicationEngine().run(tree, { mode: 'directories' });

      expect(summary.files).toEqual([]);
      expect(summary.result.directoryGroups).toHaveLength(1);
      expect(summary.result.directoryGroups[0].keepItem.path).toBe(join(tree, 'photos'));
      expect(summary.result.directoryGroups[0].removeItems.map(item => item.path)).toEqual([join(tree, 'photos-copy')]);
      expect(summary.result.totalSpaceToFree).toBe(18);
    });

    it('should leave out directories below the minimum size', async () => {
      const summary = await new DeduplicationEngine().run(tree, { mode: 'directories', minDirSize: 19 });

      expect(summary.directories.map(dir => dir.path)).toEqual([tree]);
      expect(summary.directoriesBelowMinSize).toBe(2);
      expect(summary.result.directoryGroups).toEqual([]);
    });

    it('should not replace files that a removed directory already covers', async () => {
      const summary = await new DeduplicationEngine().run(tree, { mode: 'both' });

      const removedFiles = summary.result.fileGroups.flatMap(group => group.removeItems.map(item => item.path));
      expect(removedFiles).toEqual([join(tree, 'photos', 'one.jpg')]);
      expect(summary.result.totalDirectoriesToRemove).toBe(1);
    });

    it('should list a file both scans failed on once', async () => {
      const readme = join(tree, 'readme.txt');
      deniedStats.add(readme);

      const summary = await new DeduplicationEngine().run(tree, { mode: 'both' });

      expect(summary.result.errors).toEqual([
        { path: readme, kind: 'STAT_FAILURE', message: `EACCES: permission denied, stat '${readme}'` },
      ]);
    });

    it('should reject a missing root', async () => {
      await expect(new DeduplicationEngine().run(join(root, 'missing'))).rejects.toMatchObject({
        code: 'SCAN_ROOT_NOT_FOUND',
        exitCode: 1,
      });
    });

    it('should stop when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(new DeduplicationEngine({ signal: controller.signal }).run(tree)).rejects.toMatchObject({
        code: 'SCAN_CANCELLED',
      });
    });
  });

  describe('Cache', () => {
    it('should reuse fingerprints from an earlier session', async () => {
      const cache = new ChecksumCache(':memory:');

      await new DeduplicationEngine({ cache }).run(tree);
      const second = new DeduplicationEngine({ cache });
      await second.run(tree);

      expect(second.getCacheStats()).toEqual({ cacheHits: 5, cacheMisses: 0 });
      cache.close();
    });

    it('should record an unavailable cache and keep scanning', async () => {
      mkdirSync(root, { recursive: true });
      writeFileSync(join(root, 'blocker'), 'not a directory');
      const cache = new ChecksumCache(join(root, 'blocker', 'checksums.db'));

      const summary = await new DeduplicationEngine({ cache }).run(tree);

      expect(summary.result.errors).toEqual([
        expect.objectContaining({ path: join(root, 'blocker', 'checksums.db'), kind: 'CACHE_UNAVAILABLE' }),
      ]);
      expect(summary.result.fileGroups).toHaveLength(2);
    });

    it('should open and close its own cache from configuration', async () => {
      const config = defaultConfig({ DEDUPE_TREE_CACHE_PATH: join(root, 'cache', 'checksums.db') });

      const engine = DeduplicationEngine.fromConfig(config);
      await engine.run(tree);
      engine.close();

      const reopened = new ChecksumCache(config.cache.path);
      expect(reopened.stats().totalEntries).toBe(5);
      reopened.close();
    });
  });

  describe('Entry points', () => {
    it('should scan files with filters', async () => {
      const files = await scanFiles(tree, { extensions: ['.txt'] });

      expect(files.map(file => file.path)).toEqual([join(tree, 'readme.txt')]);
    });

    it('should scan directory trees', async () => {
      const directories = await scanDirectoryTree(tree, 2);

      expect(directories.map(dir => dir.path)).toEqual([join(tree, 'photos-copy'), join(tree, 'photos'), tree]);
    });

    it('should execute a resolution as a dry run by default', async () => {
      const engine = new DeduplicationEngine();
      const { result } = await engine.run(tree);

      const execution = await engine.execute(result);

      expect(execution.dryRun).toBe(true);
      expect(execution.linkedFiles).toHaveLength(3);
    });
  });
});
