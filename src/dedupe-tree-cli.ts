#!/usr/bin/env node
/**
 * dedupe-tree: find duplicate files or directory trees and replace the extra
 * copies with symbolic links.
 */

import { config as loadEnv } from 'dotenv';
import { appendFileSync, realpathSync, writeFileSync } from 'fs';
import { createInterface } from 'readline/promises';
import { fileURLToPath } from 'url';
import { ChecksumCache } from './checksum-cache.js';
import { ConfigManager, DEFAULT_CONFIG_PATH, type AppConfig } from './config.js';
import { DeduplicationEngine, type ScanMode } from './dedupe-engine.js';
import { normalizeExtensions } from './file-scanner.js';
import { AppError, errnoCode, handleError } from './logger.js';
import { createProgressReporter } from './progress.js';
import {
  formatSize,
  renderDetailedReport,
  renderDryRunSummary,
  renderErrors,
  renderExecution,
  renderHeader,
  renderSummary,
} from './report.js';

export interface CliOptions {
  directory?: string;
  apply: boolean;
  yes: boolean;
  mode: ScanMode;
  extensions?: string[];
  minSize?: number;
  minFiles?: number;
  minDirSize?: number;
  concurrency?: number;
  cachePath?: string;
  noCache: boolean;
  configPath: string;
  logFile?: string;
  cacheStats: boolean;
  cacheCleanup: boolean;
  /** Defaults to `cache.cleanupAfterDays` from the config file. */
  cacheCleanupDays?: number;
  cacheClear: boolean;
  json: boolean;
  help: boolean;
}

export interface CliIO {
  print(line: string): void;
  confirm(question: string): Promise<boolean>;
  /** Draw progress bars on stderr. */
  progress: boolean;
}

const USAGE = `
Usage:
  dedupe-tree <directory> [options]
  dedupe-tree --cache-stats | --cache-cleanup [DAYS] | --cache-clear

Dry run by default: duplicates are reported and nothing is modified.
Files and directory trees are both compared unless --files or --directories
narrows the scan.

Options:
  --delete             Replace duplicates with symbolic links to the kept copy
  --yes                Skip the confirmation prompt of --delete
  --files              Compare single files only
  --directories        Compare whole directory trees only
  --extensions LIST    Comma-separated extensions to include (e.g. .txt,.md)
  --min-size N         Minimum file size in bytes (default: 0)
  --min-files N        Minimum files per directory tree (default: 2)
  --min-dir-size N     Minimum directory tree size in bytes (default: 0)
  --concurrency N      Files hashed in parallel (default: 8)
  --cache PATH         Checksum cache location
  --no-cache           Hash every file without the checksum cache
  --config PATH        Config file (default: ${DEFAULT_CONFIG_PATH})
  --log-file PATH      Also write the report to PATH
  --json               Print the result as JSON
  --cache-stats        Show checksum cache statistics
  --cache-cleanup [DAYS]
                       Drop cache entries for files not modified in DAYS days
                       (default: cache.cleanupAfterDays, 30)
  --cache-clear        Remove every cache entry
  -h, --help           Show this help
`;

function invalid(message: string): AppError {
  return new AppError(message, 'INVALID_ARGUMENT', 1);
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || value.startsWith('--')) {
    throw invalid(`${flag} requires a value`);
  }
  return value;
}

function takeNumber(args: string[], flag: string, { integer = true, positive = false } = {}): number {
  const raw = takeValue(args, flag);
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < 0 || (positive && value === 0)) {
    throw invalid(`${flag} expects a ${positive ? 'positive' : 'non-negative'} ${integer ? 'integer' : 'number'}, got "${raw}"`);
  }
  return value;
}

const NUMERIC = /^\d+(\.\d+)?$/;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    apply: false,
    yes: false,
    mode: 'both',
    noCache: false,
    configPath: DEFAULT_CONFIG_PATH,
    cacheStats: false,
    cacheCleanup: false,
    cacheClear: false,
    json: false,
    help: false,
  };

  const args = [...argv];
  for (let arg = args.shift(); arg !== undefined; arg = args.shift()) {
    switch (arg) {
      case '--delete':
        options.apply = true;
        break;
      case '--yes':
      case '-y':
        options.yes = true;
        break;
      case '--files':
        options.mode = 'files';
        break;
      case '--directories':
        options.mode = 'directories';
        break;
      case '--extensions':
        options.extensions = normalizeExtensions(takeValue(args, arg));
        break;
      case '--min-size':
        options.minSize = takeNumber(args, arg);
        break;
      case '--min-files':
        options.minFiles = takeNumber(args, arg);
        break;
      case '--min-dir-size':
        options.minDirSize = takeNumber(args, arg);
        break;
      case '--concurrency':
        options.concurrency = takeNumber(args, arg, { positive: true });
        break;
      case '--cache':
        options.cachePath = takeValue(args, arg);
        break;
      case '--no-cache':
        options.noCache = true;
        break;
      case '--config':
        options.configPath = takeValue(args, arg);
        break;
      case '--log-file':
        options.logFile = takeValue(args, arg);
        break;
      case '--json':
        options.json = true;
        break;
      case '--cache-stats':
        options.cacheStats = true;
        break;
      case '--cache-cleanup':
        options.cacheCleanup = true;
        if (args[0] !== undefined && NUMERIC.test(args[0])) {
          options.cacheCleanupDays = takeNumber(args, arg, { integer: false, positive: true });
        }
        break;
      case '--cache-clear':
        options.cacheClear = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw invalid(`Unknown option: ${arg}`);
        }
        if (options.directory !== undefined) {
          throw invalid(`Unexpected argument: ${arg}`);
        }
        options.directory = arg;
        break;
    }
  }

  return options;
}

/**
 * Command-line flags take precedence over the config file
 */
export function applyCliOverrides(config: AppConfig, options: CliOptions): AppConfig {
  return {
    logLevel: config.logLevel,
    cache: {
      ...config.cache,
      path: options.cachePath ?? config.cache.path,
      enabled: config.cache.enabled && !options.noCache,
    },
    scan: {
      extensions: options.extensions ?? normalizeExtensions(config.scan.extensions),
      minFileSize: options.minSize ?? config.scan.minFileSize,
      minFiles: options.minFiles ?? config.scan.minFiles,
      minDirSize: options.minDirSize ?? config.scan.minDirSize,
      concurrency: options.concurrency ?? config.scan.concurrency,
    },
  };
}

async function promptYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

function runCacheMaintenance(config: AppConfig, options: CliOptions, print: (line: string) => void): number {
  const cache = new ChecksumCache(config.cache.path);
  try {
    if (!cache.isAvailable()) {
      print(`Checksum cache unavailable at ${config.cache.path}: ${cache.getUnavailableReason() ?? 'unknown error'}`);
      return 1;
    }
    if (options.cacheCleanup) {
      const days = options.cacheCleanupDays ?? config.cache.cleanupAfterDays;
      const removed = cache.cleanup(days);
      print(`Removed ${removed} cache entries for files not modified in ${days} days`);
    }
    if (options.cacheClear) {
      cache.clear();
      print('Checksum cache cleared');
    }
    if (options.cacheStats) {
      const stats = cache.stats();
      print(`Cache: ${config.cache.path}`);
      print(`Entries: ${stats.totalEntries}`);
      print(`Unique fingerprints: ${stats.uniqueFingerprints}`);
    }
    return 0;
  } finally {
    cache.close();
  }
}

/**
 * Run the command and resolve to its exit code
 */
export async function run(argv: string[], io: Partial<CliIO> = {}): Promise<number> {
  const startTime = Date.now();
  const out = io.print ?? ((line: string) => console.log(line));
  let print = out;

  try {
    const options = parseArgs(argv);
    if (options.help) {
      out(USAGE);
      return 0;
    }

    const manager = new ConfigManager(options.configPath);
    const validation = manager.validate();
    if (!validation.valid) {
      throw invalid(`Invalid configuration in ${manager.getPath()}: ${validation.errors.join('; ')}`);
    }
    const config = applyCliOverrides(manager.getAll(), options);
    // Info logs go to stdout; keep it parseable in JSON mode.
    process.env.LOG_LEVEL = options.json && config.logLevel !== 'error' ? 'warn' : config.logLevel;

    if (options.cacheStats || options.cacheClear || options.cacheCleanup) {
      return runCacheMaintenance(config, options, out);
    }

    if (options.directory === undefined) {
      throw invalid('Missing <directory> argument (see --help)');
    }
    if (options.apply && options.json && !options.yes) {
      throw invalid('--json with --delete requires --yes');
    }

    const logFile = options.logFile;
    if (logFile) {
      writeFileSync(logFile, '');
      print = line => {
        out(line);
        appendFileSync(logFile, line + '\n');
      };
    }

    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once('SIGINT', onSigint);

    const showProgress = (io.progress ?? Boolean(process.stderr.isTTY)) && !options.json;
    const engine = DeduplicationEngine.fromConfig(config, {
      signal: controller.signal,
      onProgress: showProgress ? createProgressReporter() : undefined,
    });

    try {
      const summary = await engine.run(options.directory, {
        mode: options.mode,
        extensions: config.scan.extensions,
        minFileSize: config.scan.minFileSize,
        minFiles: config.scan.minFiles,
        minDirSize: config.scan.minDirSize,
      });
      const { result } = summary;

      if (options.json) {
        const execution = options.apply ? await engine.execute(result, false) : null;
        print(JSON.stringify({ root: summary.root, mode: summary.mode, result, execution }, null, 2));
        return 0;
      }

      for (const line of renderHeader({
        root: summary.root,
        apply: options.apply,
        mode: summary.mode,
        extensions: config.scan.extensions,
        minFileSize: config.scan.minFileSize,
        minFiles: config.scan.minFiles,
        minDirSize: config.scan.minDirSize,
      })) {
        print(line);
      }
      if (summary.directoriesBelowMinSize > 0) {
        print(`Filtered out ${summary.directoriesBelowMinSize} directories smaller than ${formatSize(config.scan.minDirSize)}`);
      }

      if (summary.files.length === 0 && summary.directories.length === 0) {
        print('No files or directories found to process.');
        renderErrors(result.errors).forEach(line => print(line));
        return 0;
      }
      if (result.fileGroups.length === 0 && result.directoryGroups.length === 0) {
        print('✓ No duplicate files or directories found!');
        renderErrors(result.errors).forEach(line => print(line));
        return 0;
      }

      [...renderSummary(result), ...renderDetailedReport(result), ...renderErrors(result.errors)].forEach(line =>
        print(line)
      );

      if (options.apply) {
        const described: string[] = [];
        if (result.totalFilesToRemove > 0) described.push(`${result.totalFilesToRemove} files`);
        if (result.totalDirectoriesToRemove > 0) described.push(`${result.totalDirectoriesToRemove} directories`);

        if (described.length === 0) {
          print('Nothing to replace.');
          return 0;
        }

        const confirm = io.confirm ?? promptYesNo;
        const approved = options.yes || (await confirm(`\nReally replace ${described.join(' and ')} with links? [y/N] `));
        if (!approved) {
          print('Aborted.');
          return 0;
        }

        const execution = await engine.execute(result, false);
        renderExecution(execution).forEach(line => print(line));
      } else {
        renderDryRunSummary(summary).forEach(line => print(line));
      }

      print(`\nTotal time: ${((Date.now() - startTime) / 1000).toFixed(2)} seconds`);
      return 0;
    } finally {
      engine.close();
      process.removeListener('SIGINT', onSigint);
    }
  } catch (error) {
    const appError = handleError(error);
    print(`Error: ${appError.message}`);
    return appError.exitCode;
  }
}

export async function main(): Promise<void> {
  loadEnv();
  process.exitCode = await run(process.argv.slice(2));
}

/**
 * True when `entry` resolves to this module, including through the `bin` link
 */
export function isDirectRun(entry: string | undefined = process.argv[1]): boolean {
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch (error) {
    // A missing entry path cannot be this module.
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

if (isDirectRun()) {
  main().catch(error => {
    handleError(error);
    process.exitCode = 1;
  });
}
