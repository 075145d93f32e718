/**
 * File Processing Phase
 *
 * Turns one file into an enriched record: adapter parse, the EPUB
 * format-correction retry, then embedded-metadata overrides. Tracking the
 * record is left to the caller.
 */

import { posix } from 'path';
import type { ComicInfo } from '../../comicinfo.service.js';
import { fileProcessingLogger, type ScanLogger } from '../../logger.service.js';
import {
  DEFAULT_CHAPTER,
  DEFAULT_VOLUME,
  hasComicInfoSpecial,
  isCoverImage,
  isEpub,
  normalizePath,
  parseVolume,
  trimTrailingSlash,
} from '../parser-rules.js';
import type { FileParserAdapter, LibraryType, ParsedRecord } from '../types.js';

export interface FileProcessingDeps {
  parser: FileParserAdapter;
  /** Parses with book rules for the EPUB retry */
  bookParser: FileParserAdapter;
  logger?: ScanLogger;
}

/**
 * Fill the gaps of `primary` from `secondary`. Designators at their
 * sentinel count as gaps; `isSpecial` is sticky.
 */
export function mergeRecords(primary: ParsedRecord, secondary: ParsedRecord | null): ParsedRecord {
  if (!secondary) return primary;

  return {
    ...primary,
    chapters: !primary.chapters || primary.chapters === DEFAULT_CHAPTER ? secondary.chapters : primary.chapters,
    volumes: !primary.volumes || primary.volumes === DEFAULT_VOLUME ? secondary.volumes : primary.volumes,
    edition: primary.edition || secondary.edition,
    title: primary.title || secondary.title,
    series: primary.series || secondary.series,
    isSpecial: primary.isSpecial || secondary.isSpecial,
  };
}

/**
 * Apply embedded metadata over filename-derived fields. Only non-empty
 * values override, in this order: volume, series, number, title sort,
 * special format, series sort, localized series.
 */
export function applyComicInfo(record: ParsedRecord, comicInfo: ComicInfo | null): ParsedRecord {
  record.comicInfo = comicInfo;
  if (!comicInfo) return record;

  if (comicInfo.Volume) {
    record.volumes = comicInfo.Volume;
  }
  if (comicInfo.Series) {
    record.series = comicInfo.Series.trim();
  }
  if (comicInfo.Number) {
    record.chapters = comicInfo.Number;
  }
  if (comicInfo.TitleSort) {
    record.seriesSort = comicInfo.TitleSort.trim();
  }
  if (comicInfo.Format && hasComicInfoSpecial(comicInfo.Format)) {
    record.isSpecial = true;
    record.chapters = DEFAULT_CHAPTER;
    record.volumes = DEFAULT_VOLUME;
  }
  if (comicInfo.SeriesSort) {
    record.seriesSort = comicInfo.SeriesSort.trim();
  }
  if (comicInfo.LocalizedSeries) {
    record.localizedSeries = comicInfo.LocalizedSeries.trim();
  }

  return record;
}

/**
 * Highest folder below `rootPath` that contains `filePath`; the root itself
 * for files sitting directly in it.
 */
export function topLevelFolder(filePath: string, rootPath: string): string {
  const root = trimTrailingSlash(normalizePath(rootPath));
  const relative = posix.relative(root, normalizePath(filePath));
  const [topLevel, ...rest] = relative.split('/');
  if (!topLevel || rest.length === 0 || relative.startsWith('..')) {
    return root;
  }
  return posix.join(root, topLevel);
}

/**
 * Parse and enrich one file.
 *
 * @returns null when the adapter cannot parse the file (cover images are
 *          skipped silently, anything else is logged)
 * @throws whatever the adapter throws, including ENOENT for vanished files
 */
export async function processFile(
  path: string,
  rootPath: string,
  libraryType: LibraryType,
  deps: FileProcessingDeps
): Promise<ParsedRecord | null> {
  const logger = deps.logger ?? fileProcessingLogger;

  let record = await deps.parser.parse(path, rootPath, libraryType);
  if (!record) {
    if (!isCoverImage(path)) {
      logger.warn({ path }, `Could not parse series from ${path}`);
    }
    return null;
  }

  // Library-level classification can disagree with EPUB rules. The trigger
  // looks at the series name, not the parsed volume; kept as-is until real
  // libraries show it misfires.
  if (isEpub(path) && parseVolume(record.series) !== DEFAULT_VOLUME) {
    const bookRecord = await deps.bookParser.parse(path, rootPath, 'book');
    const reparsed = await deps.parser.parse(path, rootPath, libraryType);
    if (bookRecord) {
      record = mergeRecords(bookRecord, reparsed);
    }
    logger.debug({ path, series: record.series }, 'Re-parsed EPUB with book rules');
  }

  applyComicInfo(record, await deps.parser.getComicInfo(path));
  record.folderPath = topLevelFolder(path, rootPath);

  return record;
}
