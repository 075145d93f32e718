/**
 * Filename Parser Service
 *
 * Regex-based parsing of book, comic and manga filenames into records:
 * series, volume, chapter, special marker, edition and format.
 */

import { basename, dirname } from 'path';
import { getParserSettings } from './config.service.js';
import { createServiceLogger, errorMessage, type ScanLogger } from './logger.service.js';
import type { ComicInfo } from './comicinfo.service.js';
import {
  DEFAULT_CHAPTER,
  DEFAULT_VOLUME,
  SPECIAL_MARKER,
  VOLUME_PATTERNS,
  cleanDesignator,
  getFormat,
  isCoverImage,
  isSupportedFile,
  normalizePath,
  parseVolume,
  trimTrailingSlash,
} from './library-scanner/parser-rules.js';
import type { FileParserAdapter, LibraryType, ParsedRecord } from './library-scanner/types.js';

const defaultLogger = createServiceLogger('filename-parser');

// =============================================================================
// Types
// =============================================================================

export interface FilenameParserOptions {
  /** Extra volume patterns tried before the built-in ones */
  volumePatterns?: readonly string[];
  /** Extra series patterns tried before the built-in rules */
  seriesPatterns?: readonly string[];
  logger?: ScanLogger;
}

// =============================================================================
// Patterns
// =============================================================================

const EXTENSION = /\.(?:tar\.gz|[^.]+)$/i;

const CHAPTER_PATTERNS: readonly RegExp[] = [
  /\b(?:chapter|ch|c)\.?\s?(\d+(?:\.\d+)?(?:-\d+(?:\.\d+)?)?)(?!\d)/i,
  /#(\d+(?:\.\d+)?)/,
  /\b(?:issue|no)\.?\s?#?(\d+(?:\.\d+)?)/i,
];

/** Bare number closing the name, e.g. "Batman 001" */
const TRAILING_NUMBER = /(?:^|\s)(\d{1,4}(?:\.\d+)?)$/;

const BRACKETED = /\[[^\]]*\]|\([^)]*\)|\{[^}]*\}/g;

const EDITION = /[([]([^)\]]*\b(?:omnibus|deluxe|digital|colou?red|edition)\b[^)\]]*)[)\]]/i;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalize delimiters in filename to use consistent spacing.
 * Underscores and dots (except before digits, as in "v2.5") become spaces,
 * long dashes become " - ".
 *
 * Examples:
 *   - Tom_Strong_023 -> Tom Strong 023
 *   - Vol.1.Ch.5 -> Vol.1 Ch.5
 */
export function normalizeDelimiters(str: string): string {
  return str
    .replace(/_/g, ' ')
    .replace(/\.(?!\d)/g, ' ')
    .replace(/\s*[–—]\s*/g, ' - ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Trim separators and collapse whitespace around a title.
 */
export function cleanTitle(str: string): string {
  return str
    .replace(/\s+/g, ' ')
    .replace(/^[\s\-_.,:;]+|[\s\-_.,:;]+$/g, '')
    .trim();
}

function isYear(value: string): boolean {
  if (!/^\d{4}$/.test(value)) return false;
  const year = parseInt(value, 10);
  return year >= 1900 && year <= 2099;
}

function compilePatterns(sources: readonly string[], logger: ScanLogger): RegExp[] {
  const compiled: RegExp[] = [];
  for (const source of sources) {
    try {
      compiled.push(new RegExp(source, 'i'));
    } catch (err) {
      logger.warn({ pattern: source, error: errorMessage(err) }, 'Ignoring invalid parser pattern');
    }
  }
  return compiled;
}

function capture(match: RegExpExecArray, group: string): string | undefined {
  return match.groups?.[group] ?? match[1];
}

// =============================================================================
// Parser
// =============================================================================

export class FilenameParser implements FileParserAdapter {
  private readonly volumePatterns: readonly RegExp[];
  private readonly seriesPatterns: readonly RegExp[];

  constructor(options: FilenameParserOptions = {}) {
    const logger = options.logger ?? defaultLogger;
    this.volumePatterns = compilePatterns(options.volumePatterns ?? [], logger);
    this.seriesPatterns = compilePatterns(options.seriesPatterns ?? [], logger);
  }

  async parse(path: string, rootPath: string, libraryType: LibraryType): Promise<ParsedRecord | null> {
    return this.parseFilename(path, rootPath, libraryType);
  }

  /** Filenames carry no embedded metadata. */
  async getComicInfo(): Promise<ComicInfo | null> {
    return null;
  }

  /**
   * Parse a path into a record. Returns null for unsupported files, cover
   * images, and names from which no series can be derived.
   */
  parseFilename(path: string, rootPath: string, libraryType: LibraryType): ParsedRecord | null {
    if (!isSupportedFile(path) || isCoverImage(path)) {
      return null;
    }

    const filename = basename(path);
    const name = normalizeDelimiters(filename.replace(EXTENSION, ''));
    const format = getFormat(path);
    const parentDir = trimTrailingSlash(normalizePath(dirname(path)));
    const inRoot = parentDir === trimTrailingSlash(normalizePath(rootPath));
    const folderName = inRoot ? '' : cleanTitle(normalizeDelimiters(basename(parentDir)).replace(BRACKETED, ' '));

    const isSpecial = SPECIAL_MARKER.test(name);
    const isBookLibrary = libraryType === 'book';

    let series = format === 'image' ? folderName : this.parseSeries(name, isBookLibrary);
    if (!series) series = folderName;
    if (!series) return null;

    return {
      series,
      localizedSeries: '',
      seriesSort: '',
      volumes: isSpecial ? DEFAULT_VOLUME : this.parseVolume(name),
      chapters: isSpecial || isBookLibrary ? DEFAULT_CHAPTER : parseChapter(name),
      title: name,
      edition: EDITION.exec(name)?.[1]?.trim() ?? '',
      format,
      isSpecial,
      fullFilePath: path,
      filename,
      folderPath: '',
      comicInfo: null,
    };
  }

  /**
   * Volume designator, trying configured patterns before the built-in ones.
   */
  parseVolume(name: string): string {
    for (const pattern of this.volumePatterns) {
      const match = pattern.exec(name);
      const volume = match ? capture(match, 'volume') : undefined;
      if (volume) return cleanDesignator(volume);
    }
    return parseVolume(name);
  }

  /**
   * Series name: everything before the first volume, chapter or special
   * token, with bracketed tags removed.
   */
  parseSeries(name: string, isBookLibrary = false): string {
    for (const pattern of this.seriesPatterns) {
      const match = pattern.exec(name);
      const series = match ? capture(match, 'series') : undefined;
      if (series) return cleanTitle(series);
    }

    const stripped = name.replace(BRACKETED, ' ').replace(/\s+/g, ' ').trim();
    const tokens: RegExp[] = [...this.volumePatterns, ...VOLUME_PATTERNS, SPECIAL_MARKER];
    if (!isBookLibrary) {
      tokens.push(...CHAPTER_PATTERNS);
    }

    let cut = stripped.length;
    for (const pattern of tokens) {
      const match = pattern.exec(stripped);
      if (match && match.index < cut) cut = match.index;
    }

    if (!isBookLibrary) {
      const trailing = TRAILING_NUMBER.exec(stripped);
      if (trailing?.[1] && !isYear(trailing[1]) && trailing.index < cut) {
        cut = trailing.index;
      }
    }

    return cleanTitle(stripped.slice(0, cut));
  }
}

/**
 * Chapter or issue designator in a normalized name, or `DEFAULT_CHAPTER`.
 */
export function parseChapter(name: string): string {
  for (const pattern of CHAPTER_PATTERNS) {
    const match = pattern.exec(name);
    if (match?.[1]) return cleanDesignator(match[1]);
  }

  const stripped = name.replace(BRACKETED, ' ').replace(/\s+/g, ' ').trim();
  const trailing = TRAILING_NUMBER.exec(stripped);
  if (trailing?.[1] && !isYear(trailing[1])) {
    return cleanDesignator(trailing[1]);
  }

  return DEFAULT_CHAPTER;
}

/**
 * Parser configured from the `parser` section of the app config.
 */
export function createFilenameParser(logger?: ScanLogger): FilenameParser {
  const settings = getParserSettings();
  return new FilenameParser({
    volumePatterns: settings.volumePatterns,
    seriesPatterns: settings.seriesPatterns,
    logger,
  });
}
