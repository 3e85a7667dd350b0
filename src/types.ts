/**
 * Shared data model for scanning, grouping and resolving duplicates
 */

/**
 * Per-item failure kinds that are recorded instead of aborting a run.
 */
export type ScanErrorKind =
  | 'STAT_FAILURE'
  | 'LIST_FAILURE'
  | 'HASH_FAILURE'
  | 'CACHE_UNAVAILABLE'
  | 'MUTATION_FAILURE';

export interface ScanError {
  path: string;
  kind: ScanErrorKind;
  message: string;
}

export interface FileEntity {
  path: string;
  size: number;
  /** Milliseconds since the epoch, as reported by `stat.mtimeMs`. */
  modificationTimestamp: number;
  /** Set once by `FileFingerprinter.ensureFingerprint`. */
  fingerprint?: string;
  /** Directory segments between the scan root and the file (0 for files in the root). */
  depth: number;
}

export interface DirectoryEntity {
  path: string;
  fingerprint: string;
  aggregateSize: number;
  aggregateFileCount: number;
  /** Path segments relative to the scan root (0 for the root itself). */
  depth: number;
}

/**
 * Anything the grouper and selection policy can work with.
 */
export interface Fingerprinted {
  path: string;
  depth: number;
  fingerprint?: string;
}

export interface CacheRecord {
  pathKey: string;
  size: number;
  modificationTimestamp: number;
  fingerprint: string;
}

export interface CacheStats {
  totalEntries: number;
  uniqueFingerprints: number;
}

export interface DuplicateGroup<T extends Fingerprinted> {
  fingerprint: string;
  keepItem: T;
  removeItems: T[];
  /** Sum of every member's size; directories count their whole subtree. */
  totalSize: number;
  /** Sum of the remove items' sizes. */
  reclaimableSize: number;
}

export interface ResolutionResult {
  fileGroups: DuplicateGroup<FileEntity>[];
  directoryGroups: DuplicateGroup<DirectoryEntity>[];
  totalFilesToRemove: number;
  totalDirectoriesToRemove: number;
  totalSpaceToFree: number;
  errors: ScanError[];
}

export interface ExecutionResult {
  dryRun: boolean;
  linkedFiles: string[];
  linkedDirectories: string[];
  errors: ScanError[];
}

export interface ProgressEvent {
  phase: 'files' | 'directories';
  completed: number;
  total: number;
  path?: string;
}

export type ProgressCallback = (event: ProgressEvent) => void;
