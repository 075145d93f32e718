/**
 * Filesystem Service
 *
 * The filesystem boundary used by the scanner. Everything the scan reads from
 * disk goes through a `FileSystem`, so scans can run against an in-memory
 * tree in tests.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';

export interface FileSystem {
  /** True when a file or directory exists at `path` */
  exists(path: string): Promise<boolean>;
  /** Full paths of the immediate subdirectories of `path` */
  listDirectories(path: string): Promise<string[]>;
  /** Full paths of the immediate files of `path` */
  listFiles(path: string): Promise<string[]>;
  readTextFile(path: string): Promise<string>;
  readFile(path: string): Promise<Buffer>;
}

/**
 * True when the thrown value is a "no such file or directory" error.
 */
export function isFileNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * ENOENT error for a path that disappeared after it was listed.
 */
export function fileNotFoundError(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

async function listEntries(path: string, kind: 'file' | 'directory'): Promise<string[]> {
  const entries = await readdir(path, { withFileTypes: true });
  return entries
    .filter((entry) => (kind === 'file' ? entry.isFile() : entry.isDirectory()))
    .map((entry) => join(path, entry.name))
    .sort();
}

export const nodeFileSystem: FileSystem = {
  async exists(path) {
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (isFileNotFoundError(error)) return false;
      throw error;
    }
  },
  listDirectories: (path) => listEntries(path, 'directory'),
  listFiles: (path) => listEntries(path, 'file'),
  readTextFile: (path) => readFile(path, 'utf-8'),
  readFile: (path) => readFile(path),
};
