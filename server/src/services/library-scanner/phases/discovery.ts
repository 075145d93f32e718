/**
 * Discovery Phase
 *
 * Walks a scan root and finds every supported file, honouring per-folder
 * ignore files. Also groups a root into folder batches and runs a bounded
 * worker pool over the files of a root.
 */

import { basename } from 'path';
import { DEFAULT_EXCLUDED_DIRECTORIES, DEFAULT_IGNORE_FILE_NAME } from '../../config.service.js';
import { nodeFileSystem, type FileSystem } from '../../filesystem.service.js';
import { discoveryLogger, errorMessage, type ScanLogger } from '../../logger.service.js';
import { getOptimalConcurrency, parallelMap } from '../../parallel.service.js';
import { DirectoryNotFoundError } from '../errors.js';
import { IgnoreMatcher, loadIgnoreMatcher } from '../ignore-matcher.js';
import { isSupportedFile } from '../parser-rules.js';
import type { FolderBatch } from '../types.js';

export interface DiscoveryOptions {
  fileSystem?: FileSystem;
  /** Rules inherited from a parent folder; when unset each folder may load its own */
  matcher?: IgnoreMatcher | null;
  ignoreFileName?: string;
  excludedDirectories?: readonly string[];
  /** File filter (default: supported scan extensions) */
  isEligible?: (path: string) => boolean;
  logger?: ScanLogger;
}

export interface TraverseOptions extends Omit<DiscoveryOptions, 'matcher'> {
  concurrency?: number;
}

interface ResolvedOptions {
  fs: FileSystem;
  ignoreFileName: string;
  excluded: ReadonlySet<string>;
  isEligible: (path: string) => boolean;
  logger: ScanLogger;
}

function resolveOptions(options: DiscoveryOptions): ResolvedOptions {
  return {
    fs: options.fileSystem ?? nodeFileSystem,
    ignoreFileName: options.ignoreFileName ?? DEFAULT_IGNORE_FILE_NAME,
    excluded: new Set(options.excludedDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES),
    isEligible: options.isEligible ?? isSupportedFile,
    logger: options.logger ?? discoveryLogger,
  };
}

function isSkippedName(name: string, excluded: ReadonlySet<string>): boolean {
  return name.startsWith('.') || excluded.has(name);
}

/**
 * Immediate subdirectories of `folderPath` that are neither hidden, excluded
 * by name, nor matched by `matcher`.
 */
export async function getDirectories(
  folderPath: string,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const { fs, excluded } = resolveOptions(options);
  const matcher = options.matcher ?? null;

  const directories = await fs.listDirectories(folderPath);
  return directories.filter(
    (directory) =>
      !isSkippedName(basename(directory), excluded) &&
      !(matcher && matcher.matches(directory))
  );
}

async function walk(
  folderPath: string,
  inherited: IgnoreMatcher | null,
  resolved: ResolvedOptions,
  files: string[]
): Promise<void> {
  const { fs, logger } = resolved;

  let matcher: IgnoreMatcher | null;
  let directories: string[];
  let entries: string[];
  try {
    matcher = inherited ?? (await loadIgnoreMatcher(fs, folderPath, resolved.ignoreFileName, logger));
    directories = await fs.listDirectories(folderPath);
    entries = await fs.listFiles(folderPath);
  } catch (err) {
    logger.warn({ path: folderPath, error: errorMessage(err) }, 'Failed to read directory');
    return;
  }

  for (const directory of directories) {
    if (isSkippedName(basename(directory), resolved.excluded)) continue;
    if (matcher && matcher.matches(directory)) {
      logger.debug({ path: directory }, 'Skipping ignored directory');
      continue;
    }
    await walk(directory, matcher, resolved, files);
  }

  for (const file of entries) {
    if (basename(file).startsWith('.')) continue;
    if (!resolved.isEligible(file)) continue;
    if (matcher && matcher.matches(file)) continue;
    files.push(file);
  }
}

/**
 * Every eligible file under `folderPath`, each exactly once. A folder that
 * does not exist yields an empty list.
 */
export async function scanFiles(
  folderPath: string,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const resolved = resolveOptions(options);
  if (!(await resolved.fs.exists(folderPath))) {
    return [];
  }

  const files: string[] = [];
  await walk(folderPath, options.matcher ?? null, resolved, files);
  return files;
}

/**
 * Group a root into batches of files that are parsed together.
 *
 * A library folder yields one batch per top-level subfolder and one for the
 * files sitting directly in the root. A series folder is a single batch.
 */
export async function collectFolderBatches(
  rootPath: string,
  isLibraryFolder: boolean,
  options: DiscoveryOptions = {}
): Promise<FolderBatch[]> {
  const resolved = resolveOptions(options);
  if (!(await resolved.fs.exists(rootPath))) {
    throw new DirectoryNotFoundError(rootPath);
  }

  if (!isLibraryFolder) {
    return [{ folderPath: rootPath, files: await scanFiles(rootPath, options) }];
  }

  const matcher = options.matcher
    ?? (await loadIgnoreMatcher(resolved.fs, rootPath, resolved.ignoreFileName, resolved.logger));

  const batches: FolderBatch[] = [];
  for (const directory of await getDirectories(rootPath, { ...options, matcher })) {
    batches.push({
      folderPath: directory,
      files: await scanFiles(directory, { ...options, matcher }),
    });
  }

  const rootFiles = (await resolved.fs.listFiles(rootPath)).filter(
    (file) =>
      !basename(file).startsWith('.') &&
      resolved.isEligible(file) &&
      !(matcher && matcher.matches(file))
  );
  if (rootFiles.length > 0) {
    batches.push({ folderPath: rootPath, files: rootFiles });
  }

  return batches;
}

/**
 * Invoke `onFile` for every eligible file under `rootPath` through a bounded
 * worker pool. A failing callback is logged; its siblings keep running.
 *
 * @returns number of files visited
 * @throws DirectoryNotFoundError when `rootPath` does not exist
 */
export async function traverseTreeParallel(
  rootPath: string,
  onFile: (path: string) => Promise<void>,
  options: TraverseOptions = {}
): Promise<number> {
  const resolved = resolveOptions(options);
  if (!(await resolved.fs.exists(rootPath))) {
    throw new DirectoryNotFoundError(rootPath);
  }

  const files = await scanFiles(rootPath, options);
  const concurrency = options.concurrency ?? getOptimalConcurrency();

  const result = await parallelMap(files, (file) => onFile(file), {
    concurrency,
    onError: (error, index) => {
      resolved.logger.error(
        { path: files[index], error: errorMessage(error) },
        'Failed to process file, continuing with remaining files'
      );
    },
  });

  resolved.logger.debug({
    rootPath,
    files: result.total,
    failed: result.failed,
    duration: result.duration,
  }, 'Traversal complete');

  return result.total;
}
