/**
 * Library entry point
 */

export * from './types.js';
export { ChecksumCache, defaultCachePath, type ChecksumStore } from './checksum-cache.js';
export { FileFingerprinter, hashFileContent, hashText, type LeafFingerprint } from './file-fingerprinter.js';
export { FileScanner, normalizeExtensions, type FileScanOptions } from './file-scanner.js';
export {
  DirectoryTreeFingerprinter,
  compareEntryNames,
  sentinelFingerprint,
  type DirectoryScanOptions,
  type DirectorySummary,
} from './directory-fingerprinter.js';
export { groupDuplicates } from './duplicate-grouper.js';
export {
  compareCandidates,
  rankGroups,
  resolveDuplicates,
  resolveDuplicates as resolve,
  selectKeep,
  undesirabilityFlag,
} from './resolution.js';
export {
  MutationExecutor,
  execute,
  nodeFileSystemOps,
  type EntryType,
  type ExecuteOptions,
  type FileSystemOps,
} from './mutation-executor.js';
export {
  DeduplicationEngine,
  scanDirectoryTree,
  scanFiles,
  type EngineOptions,
  type RunOptions,
  type RunSummary,
  type ScanMode,
} from './dedupe-engine.js';
export { ConfigManager, defaultConfig, type AppConfig } from './config.js';
export { AppError, Logger, logger } from './logger.js';
export { formatSize } from './report.js';
