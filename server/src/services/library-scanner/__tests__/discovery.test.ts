/**
 * Discovery Phase Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DirectoryNotFoundError } from '../errors.js';
import { IgnoreMatcher } from '../ignore-matcher.js';
import {
  collectFolderBatches,
  getDirectories,
  scanFiles,
  traverseTreeParallel,
} from '../phases/discovery.js';
import { VirtualFileSystem } from '../../__tests__/__mocks__/fs.mock.js';
import { LEVELS, createCapturingLogger } from '../../__tests__/__mocks__/logger.mock.js';

function createLibrary(): VirtualFileSystem {
  return new VirtualFileSystem()
    .addFile('/lib/.scanignore', 'Extras\n')
    .addFiles('/lib/Accel World', [
      'Accel World v01.cbz',
      'Accel World v02.cbz',
      'cover.jpg',
      'notes.txt',
      'Extras/bonus.cbz',
    ])
    .addFiles('/lib/Batman', ['Batman 001.cbz', '.hidden.cbz'])
    .addFile('/lib/@eaDir/thumb.jpg')
    .addFile('/lib/.git/objects.cbz')
    .addFile('/lib/Loose v01.cbz');
}

describe('Discovery Phase', () => {
  describe('scanFiles', () => {
    it('should find every eligible file exactly once', async () => {
      const fs = createLibrary();

      const files = await scanFiles('/lib', { fileSystem: fs });

      expect(files).toEqual([
        '/lib/Accel World/Accel World v01.cbz',
        '/lib/Accel World/Accel World v02.cbz',
        '/lib/Accel World/cover.jpg',
        '/lib/Batman/Batman 001.cbz',
        '/lib/Loose v01.cbz',
      ]);
      expect(new Set(files).size).toBe(files.length);
    });

    it('should return an empty list for a missing folder', async () => {
      const fs = new VirtualFileSystem();

      expect(await scanFiles('/missing', { fileSystem: fs })).toEqual([]);
    });

    it('should apply ignore rules only below the folder that holds them', async () => {
      const fs = new VirtualFileSystem()
        .addFile('/lib/Naruto/.scanignore', '*.epub\n')
        .addFiles('/lib/Naruto', ['Naruto v01.cbz', 'Naruto v01.epub'])
        .addFile('/lib/Bleach/Bleach v01.epub');

      const files = await scanFiles('/lib', { fileSystem: fs });

      expect(files).toEqual(['/lib/Bleach/Bleach v01.epub', '/lib/Naruto/Naruto v01.cbz']);
    });

    it('should honour a custom ignore file name and excluded directories', async () => {
      const fs = new VirtualFileSystem()
        .addFile('/lib/.myignore', '*.pdf\n')
        .addFiles('/lib/Series', ['Series v01.cbz', 'Series v01.pdf'])
        .addFile('/lib/Scans/Series v02.cbz');

      const files = await scanFiles('/lib', {
        fileSystem: fs,
        ignoreFileName: '.myignore',
        excludedDirectories: ['Scans'],
      });

      expect(files).toEqual(['/lib/Series/Series v01.cbz']);
    });

    it('should skip unreadable folders and keep walking', async () => {
      class FlakyFileSystem extends VirtualFileSystem {
        override async listFiles(path: string): Promise<string[]> {
          if (path === '/lib/Broken') {
            throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
          }
          return super.listFiles(path);
        }
      }
      const fs = new FlakyFileSystem()
        .addFile('/lib/Broken/Broken v01.cbz')
        .addFile('/lib/Fine/Fine v01.cbz');
      const capture = createCapturingLogger();

      const files = await scanFiles('/lib', { fileSystem: fs, logger: capture.logger });

      expect(files).toEqual(['/lib/Fine/Fine v01.cbz']);
      expect(capture.at(LEVELS.warn)).toEqual([
        expect.objectContaining({ msg: 'Failed to read directory', path: '/lib/Broken' }),
      ]);
    });
  });

  describe('getDirectories', () => {
    it('should drop hidden, excluded and ignored folders', async () => {
      const fs = createLibrary();
      const matcher = new IgnoreMatcher('/lib', ['Batman']);

      const directories = await getDirectories('/lib', { fileSystem: fs, matcher });

      expect(directories).toEqual(['/lib/Accel World']);
    });
  });

  describe('collectFolderBatches', () => {
    it('should batch a library folder per subfolder plus its loose files', async () => {
      const fs = createLibrary();

      const batches = await collectFolderBatches('/lib', true, { fileSystem: fs });

      expect(batches).toEqual([
        {
          folderPath: '/lib/Accel World',
          files: [
            '/lib/Accel World/Accel World v01.cbz',
            '/lib/Accel World/Accel World v02.cbz',
            '/lib/Accel World/cover.jpg',
          ],
        },
        { folderPath: '/lib/Batman', files: ['/lib/Batman/Batman 001.cbz'] },
        { folderPath: '/lib', files: ['/lib/Loose v01.cbz'] },
      ]);
    });

    it('should treat a series folder as a single batch', async () => {
      const fs = new VirtualFileSystem().addFiles('/lib/Naruto', ['Naruto v01.cbz', 'Arc/Naruto v02.cbz']);

      const batches = await collectFolderBatches('/lib/Naruto', false, { fileSystem: fs });

      expect(batches).toEqual([
        {
          folderPath: '/lib/Naruto',
          files: ['/lib/Naruto/Arc/Naruto v02.cbz', '/lib/Naruto/Naruto v01.cbz'],
        },
      ]);
    });

    it('should reject a missing root', async () => {
      const fs = new VirtualFileSystem();

      await expect(collectFolderBatches('/missing', true, { fileSystem: fs })).rejects.toThrow(
        DirectoryNotFoundError
      );
    });
  });

  describe('traverseTreeParallel', () => {
    it('should visit every file and return the count', async () => {
      const fs = createLibrary();
      const visited: string[] = [];

      const count = await traverseTreeParallel(
        '/lib',
        async (file) => {
          visited.push(file);
        },
        { fileSystem: fs, concurrency: 2 }
      );

      expect(count).toBe(5);
      expect([...visited].sort()).toEqual(await scanFiles('/lib', { fileSystem: fs }));
    });

    it('should keep going when one file fails', async () => {
      const fs = createLibrary();
      const capture = createCapturingLogger();
      const onFile = vi.fn(async (file: string) => {
        if (file.endsWith('Batman 001.cbz')) {
          throw new Error('corrupt archive');
        }
      });

      const count = await traverseTreeParallel('/lib', onFile, {
        fileSystem: fs,
        concurrency: 3,
        logger: capture.logger,
      });

      expect(count).toBe(5);
      expect(onFile).toHaveBeenCalledTimes(5);
      expect(capture.at(LEVELS.error)).toEqual([
        expect.objectContaining({
          msg: 'Failed to process file, continuing with remaining files',
          path: '/lib/Batman/Batman 001.cbz',
          error: 'corrupt archive',
        }),
      ]);
    });

    it('should reject a missing root', async () => {
      const fs = new VirtualFileSystem();

      await expect(traverseTreeParallel('/missing', async () => undefined, { fileSystem: fs })).rejects.toThrow(
        "The directory '/missing' does not exist"
      );
    });
  });
});
