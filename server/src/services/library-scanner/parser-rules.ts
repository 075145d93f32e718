/**
 * Parser Rules
 *
 * Stateless predicates shared by the scanner and the filename parser:
 * supported extensions, cover images, special markers, volume detection and
 * name normalization. Nothing here reads configuration.
 */

import type { SeriesFormat } from './types.js';

export const DEFAULT_VOLUME = '0';
export const DEFAULT_CHAPTER = '0';

const ARCHIVE_EXTENSIONS = /\.(?:cbz|zip|rar|cbr|tar\.gz|7zip|7z|cb7|cbt)$/i;
const BOOK_EXTENSIONS = /\.(?:epub|pdf)$/i;
const IMAGE_EXTENSIONS = /\.(?:png|jpeg|jpg|webp|gif)$/i;
const EPUB_EXTENSION = /\.epub$/i;
const PDF_EXTENSION = /\.pdf$/i;

const COVER_IMAGE = /(?<![a-z\d])(?<!back[_-]?)(?:cover|folder)(?![\w\d])/i;

const COMIC_INFO_SPECIAL = /\b(?:special|one-?shot|one shot|annual|tpb|gn|graphic novel)\b/i;

/** Marker tokens that make a file a special rather than a numbered release */
export const SPECIAL_MARKER = /\b(?:specials?|one-?shot|omake|extra(?: chapter)?|side stories|bonus|sp\d+)\b/i;

/** Volume tokens; group 1 is the designator */
export const VOLUME_PATTERNS: readonly RegExp[] = [
  /\b(?:volume|vol|v)\.?\s?(\d+(?:\.\d+)?(?:-\d+(?:\.\d+)?)?)(?!\d)/i,
  /第?(\d+(?:-\d+)?)巻/,
];

const NORMALIZE_STRIP = /[^\p{L}0-9+!]/gu;

// =============================================================================
// Extensions
// =============================================================================

export function isArchive(path: string): boolean {
  return ARCHIVE_EXTENSIONS.test(path);
}

export function isBook(path: string): boolean {
  return BOOK_EXTENSIONS.test(path);
}

export function isImage(path: string): boolean {
  return IMAGE_EXTENSIONS.test(path);
}

export function isEpub(path: string): boolean {
  return EPUB_EXTENSION.test(path);
}

export function isPdf(path: string): boolean {
  return PDF_EXTENSION.test(path);
}

/**
 * True for every extension a scan picks up.
 */
export function isSupportedFile(path: string): boolean {
  return isArchive(path) || isBook(path) || isImage(path);
}

export function getFormat(path: string): SeriesFormat {
  if (isArchive(path)) return 'archive';
  if (isEpub(path)) return 'epub';
  if (isPdf(path)) return 'pdf';
  if (isImage(path)) return 'image';
  return 'unknown';
}

// =============================================================================
// Markers
// =============================================================================

/**
 * True when the file name marks a cover (`cover.jpg`, `folder.png`), but not
 * a back cover.
 */
export function isCoverImage(path: string): boolean {
  return isImage(path) && COVER_IMAGE.test(baseName(path));
}

/**
 * True when an embedded-metadata Format value describes a special release.
 */
export function hasComicInfoSpecial(format: string | null | undefined): boolean {
  return !!format && COMIC_INFO_SPECIAL.test(format);
}

export function hasSpecialMarker(text: string): boolean {
  return SPECIAL_MARKER.test(text);
}

// =============================================================================
// Numbers
// =============================================================================

/**
 * Drop leading zeros from each side of a designator: `001` → `1`,
 * `01-03` → `1-3`.
 */
export function cleanDesignator(value: string): string {
  return value
    .split('-')
    .map((part) => part.replace(/^0+(?=\d)/, ''))
    .join('-');
}

/**
 * Volume designator found in `text`, or `DEFAULT_VOLUME`.
 */
export function parseVolume(text: string | null | undefined): string {
  if (!text) return DEFAULT_VOLUME;
  for (const pattern of VOLUME_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      return cleanDesignator(match[1]);
    }
  }
  return DEFAULT_VOLUME;
}

// =============================================================================
// Names & Paths
// =============================================================================

/**
 * Canonical comparison key for a title: lower-cased, keeping only letters,
 * ASCII digits, `+` and `!`. Titles made only of stripped characters keep
 * their trimmed lower-cased form.
 */
export function normalize(text: string | null | undefined): string {
  if (!text) return '';
  const lowered = text.toLowerCase();
  const stripped = lowered.replace(NORMALIZE_STRIP, '');
  return stripped || lowered.trim();
}

/**
 * Forward slashes, no doubled separators.
 */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
}

/**
 * Path without trailing separators; the filesystem root stays `/`.
 */
export function trimTrailingSlash(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' && path.startsWith('/') ? '/' : trimmed;
}

function baseName(path: string): string {
  const normalized = normalizePath(path);
  return normalized.slice(normalized.lastIndexOf('/') + 1);
}
