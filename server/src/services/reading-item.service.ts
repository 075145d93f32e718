/**
 * Reading Item Service
 *
 * Default File Parser Adapter: filenames through the filename parser,
 * embedded metadata through the ComicInfo reader.
 */

import { readComicInfo, type ComicInfo } from './comicinfo.service.js';
import { createFilenameParser, type FilenameParser } from './filename-parser.service.js';
import { fileNotFoundError, isFileNotFoundError, nodeFileSystem, type FileSystem } from './filesystem.service.js';
import { comicInfoLogger, errorMessage, type ScanLogger } from './logger.service.js';
import type { FileParserAdapter, LibraryType, ParsedRecord } from './library-scanner/types.js';

export interface ReadingItemServiceOptions {
  fileSystem?: FileSystem;
  filenameParser?: FilenameParser;
  logger?: ScanLogger;
}

export class ReadingItemService implements FileParserAdapter {
  private readonly fs: FileSystem;
  private readonly filenameParser: FilenameParser;
  private readonly logger: ScanLogger;

  constructor(options: ReadingItemServiceOptions = {}) {
    this.fs = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger ?? comicInfoLogger;
    this.filenameParser = options.filenameParser ?? createFilenameParser(this.logger);
  }

  /**
   * Parse the file's name. Rejects with an ENOENT error when the file is no
   * longer on disk.
   */
  async parse(path: string, rootPath: string, libraryType: LibraryType): Promise<ParsedRecord | null> {
    if (!(await this.fs.exists(path))) {
      throw fileNotFoundError(path);
    }
    return this.filenameParser.parseFilename(path, rootPath, libraryType);
  }

  /**
   * Embedded metadata of the file. A missing file is rethrown so the scan can
   * report it; an unreadable archive only loses its metadata.
   */
  async getComicInfo(path: string): Promise<ComicInfo | null> {
    try {
      return await readComicInfo(path, this.fs);
    } catch (err) {
      if (isFileNotFoundError(err)) throw err;
      this.logger.warn({ path, error: errorMessage(err) }, 'Could not read embedded metadata');
      return null;
    }
  }
}
