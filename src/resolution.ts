/**
 * Keep/remove selection and ranking of duplicate groups
 */

import { dirname } from 'path';
import { Logger } from './logger.js';
import type {
  DirectoryEntity,
  DuplicateGroup,
  FileEntity,
  Fingerprinted,
  ResolutionResult,
  ScanError,
} from './types.js';

const logger = new Logger({ context: 'Resolution' });

/**
 * Path fragments that mark auto-generated or trash locations, matched case-insensitively.
 */
export const UNDESIRABLE_PATH_MARKERS = ['new folder', 'recycle'] as const;

export function undesirabilityFlag(path: string): 0 | 1 {
  const lower = path.toLowerCase();
  return UNDESIRABLE_PATH_MARKERS.some(marker => lower.includes(marker)) ? 1 : 0;
}

/**
 * Total order used to pick the keep item: clean paths first, then shallower,
 * then by path (case-sensitive).
 */
export function compareCandidates(a: Fingerprinted, b: Fingerprinted): number {
  const flagDelta = undesirabilityFlag(a.path) - undesirabilityFlag(b.path);
  if (flagDelta !== 0) return flagDelta;
  if (a.depth !== b.depth) return a.depth - b.depth;
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

export const fileSize = (file: FileEntity): number => file.size;
export const directorySize = (directory: DirectoryEntity): number => directory.aggregateSize;

export function selectKeep<T extends Fingerprinted>(
  fingerprint: string,
  members: T[],
  sizeOf: (item: T) => number
): DuplicateGroup<T> {
  if (members.length < 2) {
    throw new Error(`Duplicate group ${fingerprint} needs at least two members, got ${members.length}`);
  }

  const [keepItem, ...removeItems] = [...members].sort(compareCandidates);
  return {
    fingerprint,
    keepItem,
    removeItems,
    totalSize: members.reduce((sum, item) => sum + sizeOf(item), 0),
    reclaimableSize: removeItems.reduce((sum, item) => sum + sizeOf(item), 0),
  };
}

/**
 * Largest reclaimable space first; equal groups keep discovery order.
 */
export function rankGroups<T extends Fingerprinted>(groups: DuplicateGroup<T>[]): DuplicateGroup<T>[] {
  return [...groups].sort((a, b) => b.reclaimableSize - a.reclaimableSize);
}

export function resolveGroups<T extends Fingerprinted>(
  buckets: Map<string, T[]>,
  sizeOf: (item: T) => number
): DuplicateGroup<T>[] {
  const groups: DuplicateGroup<T>[] = [];
  for (const [fingerprint, members] of buckets) {
    if (members.length < 2) continue;
    groups.push(selectKeep(fingerprint, members, sizeOf));
  }
  return rankGroups(groups);
}

function membersOf<T extends Fingerprinted>(group: DuplicateGroup<T>): T[] {
  return [group.keepItem, ...group.removeItems];
}

function hasRemovedAncestor(path: string, removed: Set<string>): boolean {
  let current = path;
  let parent = dirname(current);
  while (parent !== current) {
    if (removed.has(parent)) return true;
    current = parent;
    parent = dirname(current);
  }
  return false;
}

function removedPathsOf<T extends Fingerprinted>(groups: DuplicateGroup<T>[]): Set<string> {
  return new Set(groups.flatMap(group => group.removeItems.map(item => item.path)));
}

/**
 * Drop members lying inside a directory another group removes, re-selecting the
 * affected groups, until nothing changes.
 *
 * Afterwards no remove item has a removed ancestor and no keep item sits under
 * a path that will become a link, so the executor never deletes through a link
 * it created earlier in the same run.
 */
function pruneUnderRemovedDirectories<T extends Fingerprinted>(
  groups: DuplicateGroup<T>[],
  removedPaths: Set<string>,
  sizeOf: (item: T) => number
): { groups: DuplicateGroup<T>[]; changed: boolean } {
  let changed = false;
  const next: DuplicateGroup<T>[] = [];

  for (const group of groups) {
    const members = membersOf(group);
    const survivors = members.filter(member => !hasRemovedAncestor(member.path, removedPaths));
    if (survivors.length === members.length) {
      next.push(group);
      continue;
    }
    changed = true;
    if (survivors.length >= 2) {
      next.push(selectKeep(group.fingerprint, survivors, sizeOf));
    }
  }

  return { groups: rankGroups(next), changed };
}

/**
 * Turn fingerprint buckets into ranked keep/remove decisions.
 *
 * When directory groups are present, file and directory members covered by a
 * removed directory are pruned first.
 */
export function resolveDuplicates(
  fileBuckets: Map<string, FileEntity[]>,
  directoryBuckets: Map<string, DirectoryEntity[]> = new Map(),
  errors: ScanError[] = []
): ResolutionResult {
  let directoryGroups = resolveGroups(directoryBuckets, directorySize);
  let fileGroups = resolveGroups(fileBuckets, fileSize);

  if (directoryGroups.length > 0) {
    let changed = true;
    while (changed) {
      ({ groups: directoryGroups, changed } = pruneUnderRemovedDirectories(
        directoryGroups,
        removedPathsOf(directoryGroups),
        directorySize
      ));
    }

    fileGroups = pruneUnderRemovedDirectories(fileGroups, removedPathsOf(directoryGroups), fileSize).groups;
  }

  const totalFilesToRemove = fileGroups.reduce((sum, group) => sum + group.removeItems.length, 0);
  const totalDirectoriesToRemove = directoryGroups.reduce((sum, group) => sum + group.removeItems.length, 0);
  const totalSpaceToFree =
    fileGroups.reduce((sum, group) => sum + group.reclaimableSize, 0) +
    directoryGroups.reduce((sum, group) => sum + group.reclaimableSize, 0);

  logger.debug('Duplicates resolved', {
    fileGroups: fileGroups.length,
    directoryGroups: directoryGroups.length,
    totalSpaceToFree,
  });

  return {
    fileGroups,
    directoryGroups,
    totalFilesToRemove,
    totalDirectoriesToRemove,
    totalSpaceToFree,
    errors: [...errors],
  };
}
