/**
 * Ignore Matcher
 *
 * Per-folder exclusion rules. A folder may hold an ignore file (one glob per
 * line); its patterns apply to everything below that folder.
 */

import { minimatch, type MinimatchOptions } from 'minimatch';
import { join, posix } from 'path';
import type { FileSystem } from '../filesystem.service.js';
import { discoveryLogger, type ScanLogger } from '../logger.service.js';
import { normalizePath, trimTrailingSlash } from './parser-rules.js';

const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  nocase: true,
  matchBase: true,
};

export class IgnoreMatcher {
  private readonly root: string;

  constructor(
    root: string,
    readonly patterns: readonly string[]
  ) {
    this.root = trimTrailingSlash(normalizePath(root));
  }

  /**
   * True when `path` (a file or directory under the matcher's root) is
   * excluded by any pattern.
   */
  matches(path: string): boolean {
    const normalized = normalizePath(path);
    const prefix = this.root === '/' ? '/' : `${this.root}/`;
    const relative = normalized.startsWith(prefix)
      ? posix.relative(this.root, normalized)
      : normalized;

    return this.patterns.some((pattern) => minimatch(relative, pattern, MATCH_OPTIONS));
  }
}

/**
 * Split an ignore file into patterns. Blank lines and `#` comments are dropped.
 */
export function parseIgnorePatterns(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Load the ignore rules of `folder`. Returns null when the folder has no
 * ignore file, or when the file holds no patterns.
 */
export async function loadIgnoreMatcher(
  fs: FileSystem,
  folder: string,
  ignoreFileName: string,
  logger: ScanLogger = discoveryLogger
): Promise<IgnoreMatcher | null> {
  const ignoreFile = join(folder, ignoreFileName);
  if (!(await fs.exists(ignoreFile))) {
    return null;
  }

  const patterns = parseIgnorePatterns(await fs.readTextFile(ignoreFile));
  if (patterns.length === 0) {
    logger.warn({ ignoreFile }, 'Ignore file found but empty, ignoring');
    return null;
  }

  logger.debug({ ignoreFile, patterns: patterns.length }, 'Loaded ignore rules');
  return new IgnoreMatcher(folder, patterns);
}
