/**
 * ComicInfo Service
 *
 * Reads ComicInfo.xml embedded in zip-based comic archives. The values
 * override what the filename parser derived.
 */

import JSZip from 'jszip';
import { basename } from 'path';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { nodeFileSystem, type FileSystem } from './filesystem.service.js';
import { comicInfoLogger as logger, errorMessage } from './logger.service.js';

// =============================================================================
// Types
// =============================================================================

/**
 * ComicInfo.xml fields the scanner reads. Values are kept as the raw text;
 * volume and number designators can be ranges.
 */
export interface ComicInfo {
  Series?: string;
  Number?: string;
  Volume?: string;
  TitleSort?: string;
  SeriesSort?: string;
  LocalizedSeries?: string;
  Format?: string;
}

const FIELDS = [
  'Series',
  'Number',
  'Volume',
  'TitleSort',
  'SeriesSort',
  'LocalizedSeries',
  'Format',
] as const;

const ComicInfoDocumentSchema = z.object({
  ComicInfo: z.record(z.unknown()),
});

const ZIP_ARCHIVE = /\.(?:cbz|zip)$/i;

// =============================================================================
// XML Parsing
// =============================================================================

/**
 * Text content of an xml2js node. Elements carrying attributes come back as
 * `{ _: text, $: attrs }`.
 */
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && '_' in value && typeof value._ === 'string') {
    return value._;
  }
  return undefined;
}

/**
 * Parse ComicInfo.xml string into ComicInfo object.
 */
export async function parseComicInfoXml(xmlString: string): Promise<ComicInfo> {
  const parsed: unknown = await parseStringPromise(xmlString, {
    explicitArray: false,
    ignoreAttrs: false,
    mergeAttrs: false,
  });

  const document = ComicInfoDocumentSchema.safeParse(parsed);
  if (!document.success) {
    throw new Error('Invalid ComicInfo.xml: missing ComicInfo root element');
  }

  const ci = document.data.ComicInfo;
  const comicInfo: ComicInfo = {};

  for (const field of FIELDS) {
    const text = textOf(ci[field]);
    if (text) comicInfo[field] = text;
  }

  return comicInfo;
}

// =============================================================================
// Archive Reading
// =============================================================================

/**
 * Read ComicInfo.xml from a zip-based archive (cbz, zip).
 *
 * @returns null when the file is not a zip archive or holds no ComicInfo.xml
 */
export async function readComicInfo(
  archivePath: string,
  fs: FileSystem = nodeFileSystem
): Promise<ComicInfo | null> {
  if (!ZIP_ARCHIVE.test(archivePath)) {
    return null;
  }

  const zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  const entry = Object.values(zip.files).find(
    (file) => !file.dir && basename(file.name).toLowerCase() === 'comicinfo.xml'
  );

  if (!entry) {
    logger.debug({ archivePath }, 'Archive does not contain ComicInfo.xml');
    return null;
  }

  const rawXml = await entry.async('string');
  try {
    return await parseComicInfoXml(rawXml);
  } catch (err) {
    logger.warn({ archivePath, error: errorMessage(err) }, 'Failed to parse ComicInfo.xml');
    return null;
  }
}
