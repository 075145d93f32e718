/**
 * Filesystem Mock Utilities
 *
 * In-memory FileSystem for scanner tests. Paths are absolute POSIX paths.
 */

import { posix } from 'path';
import type { FileSystem } from '../../filesystem.service.js';

/**
 * Virtual file entry.
 */
export interface VirtualFile {
  content: Buffer;
  isDirectory: boolean;
}

export function enoent(path: string, syscall = 'open'): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, ${syscall} '${path}'`), {
    code: 'ENOENT',
  });
}

export class VirtualFileSystem implements FileSystem {
  readonly files = new Map<string, VirtualFile>();

  /**
   * Add a directory and its missing parents.
   */
  addDirectory(path: string): this {
    let current = '';
    for (const part of path.split('/').filter(Boolean)) {
      current += `/${part}`;
      if (!this.files.has(current)) {
        this.files.set(current, { content: Buffer.alloc(0), isDirectory: true });
      }
    }
    return this;
  }

  /**
   * Add a file, creating parent directories.
   */
  addFile(path: string, content: Buffer | string = ''): this {
    this.addDirectory(posix.dirname(path));
    this.files.set(path, {
      content: typeof content === 'string' ? Buffer.from(content) : content,
      isDirectory: false,
    });
    return this;
  }

  /**
   * Add empty files under `root`, given their relative paths.
   */
  addFiles(root: string, relativePaths: string[]): this {
    this.addDirectory(root);
    for (const relativePath of relativePaths) {
      this.addFile(posix.join(root, relativePath));
    }
    return this;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(trimSlash(path));
  }

  async listDirectories(path: string): Promise<string[]> {
    return this.children(path, true);
  }

  async listFiles(path: string): Promise<string[]> {
    return this.children(path, false);
  }

  async readTextFile(path: string): Promise<string> {
    return (await this.readFile(path)).toString('utf-8');
  }

  async readFile(path: string): Promise<Buffer> {
    const file = this.files.get(path);
    if (!file || file.isDirectory) {
      throw enoent(path);
    }
    return file.content;
  }

  private children(path: string, directories: boolean): string[] {
    const parent = trimSlash(path);
    const entry = this.files.get(parent);
    if (!entry || !entry.isDirectory) {
      throw enoent(path, 'scandir');
    }

    const result: string[] = [];
    for (const [filePath, file] of this.files) {
      if (posix.dirname(filePath) === parent && filePath !== parent && file.isDirectory === directories) {
        result.push(filePath);
      }
    }
    return result.sort();
  }
}

function trimSlash(path: string): string {
  return path.length > 1 ? path.replace(/\/$/, '') : path;
}
