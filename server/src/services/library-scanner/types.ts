/**
 * Library Scanner Types
 *
 * Records produced by parsing files, the series identities they are grouped
 * under, and the options and collaborators of a scan.
 */

import type { FileSystem } from '../filesystem.service.js';
import type { ScanLogger } from '../logger.service.js';
import type { ComicInfo } from '../comicinfo.service.js';

export type LibraryType = 'manga' | 'comic' | 'book' | 'image';

export type SeriesFormat = 'archive' | 'epub' | 'pdf' | 'image' | 'unknown';

/**
 * Result of parsing one file. Fields are rewritten while the record is
 * enriched and reconciled; after that only the tracker touches `series`.
 */
export interface ParsedRecord {
  series: string;
  localizedSeries: string;
  seriesSort: string;
  /** Volume designator, `DEFAULT_VOLUME` when absent */
  volumes: string;
  /** Chapter or issue designator, `DEFAULT_CHAPTER` when absent */
  chapters: string;
  title: string;
  edition: string;
  format: SeriesFormat;
  isSpecial: boolean;
  fullFilePath: string;
  filename: string;
  /** Highest folder below the scan root containing the file */
  folderPath: string;
  comicInfo: ComicInfo | null;
}

/**
 * Aggregation key for a series.
 */
export interface SeriesIdentity {
  /** Name as first seen; later records are renamed to it */
  name: string;
  normalizedName: string;
  format: SeriesFormat;
  folderPath: string;
}

export type ParsedSeriesMap = Map<SeriesIdentity, ParsedRecord[]>;

/**
 * A persisted series, as the persistence layer knows it.
 */
export interface KnownSeries {
  name: string;
  localizedName?: string | null;
  originalName?: string | null;
  format: SeriesFormat;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Per-format parsing, provided by the host application.
 */
export interface FileParserAdapter {
  parse(path: string, rootPath: string, libraryType: LibraryType): Promise<ParsedRecord | null>;
  getComicInfo(path: string): Promise<ComicInfo | null>;
}

export type ProgressEventType = 'started' | 'updated' | 'ended';

export interface FileScanProgressEvent {
  name: 'FileScanProgress';
  path: string;
  libraryName: string;
  progressEventType: ProgressEventType;
  /** Files finished so far in this scan; never decreases */
  filesProcessed: number;
  timestamp: string;
}

/**
 * Fire-and-forget publish target for progress notifications.
 */
export interface ProgressEventSink {
  publish(eventName: string, payload: FileScanProgressEvent): void | Promise<void>;
}

// =============================================================================
// Scan Options
// =============================================================================

export type ScanMode = 'folder-batch' | 'parallel';

export interface ScanOptions {
  /**
   * 'folder-batch' parses each folder, reconciles localized names, then
   * tracks. 'parallel' tracks each file as soon as it is parsed.
   */
  mode?: ScanMode;
  /**
   * Folder-batch mode only. True when each root is a library folder whose
   * subfolders are separate series; false when the root is one series folder.
   */
  isLibraryScan?: boolean;
  /** Folder-batch mode only. Receives every non-empty batch after tracking. */
  onSeriesRecords?: (records: readonly ParsedRecord[]) => void | Promise<void>;
  /** Worker pool size (default: config, then auto-detected) */
  concurrency?: number;
  fileSystem?: FileSystem;
  parser?: FileParserAdapter;
  /** Parser used for the EPUB format-correction retry */
  bookParser?: FileParserAdapter;
  eventSink?: ProgressEventSink;
  logger?: ScanLogger;
  ignoreFileName?: string;
  excludedDirectories?: readonly string[];
}

export interface FolderBatch {
  folderPath: string;
  files: string[];
}
