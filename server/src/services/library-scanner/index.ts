/**
 * Library Scanner
 *
 * Scans library folders for series. Walks each root, parses every file into
 * a record, reconciles localized titles per folder and groups the records
 * under series identities. One tracker per call; nothing is shared between
 * concurrent scans.
 */

import { getScannerSettings } from '../config.service.js';
import { isFileNotFoundError, nodeFileSystem } from '../filesystem.service.js';
import { FilenameParser, createFilenameParser } from '../filename-parser.service.js';
import { errorMessage, scannerLogger } from '../logger.service.js';
import { getOptimalConcurrency, parallelMap } from '../parallel.service.js';
import { ReadingItemService } from '../reading-item.service.js';
import { DirectoryNotFoundError } from './errors.js';
import { collectFolderBatches, traverseTreeParallel, type DiscoveryOptions } from './phases/discovery.js';
import { processFile } from './phases/file-processing.js';
import { mergeLocalizedSeriesWithSeries } from './phases/localized-merge.js';
import { fileScanProgressEvent, nullEventSink, publishProgress } from './progress-events.js';
import { SeriesTracker } from './series-tracker.js';
import type {
  FileParserAdapter,
  FolderBatch,
  LibraryType,
  ParsedRecord,
  ParsedSeriesMap,
  ProgressEventType,
  ScanOptions,
} from './types.js';

// Re-export the public surface
export * from './types.js';
export * from './errors.js';
export * from './parser-rules.js';
export * from './ignore-matcher.js';
export * from './series-tracker.js';
export * from './progress-events.js';
export * from './phases/discovery.js';
export * from './phases/file-processing.js';
export * from './phases/localized-merge.js';

/**
 * Scan `folders` and return every series found with its records, in the
 * order the records were tracked. Series without records are omitted.
 *
 * Missing roots, vanished files and unparseable files are logged and skipped;
 * the scan always runs to the end.
 */
export async function scanLibrariesForSeries(
  libraryType: LibraryType,
  folders: readonly string[],
  libraryName: string,
  options: ScanOptions = {}
): Promise<ParsedSeriesMap> {
  const startTime = Date.now();
  const logger = options.logger ?? scannerLogger;
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const eventSink = options.eventSink ?? nullEventSink;
  const mode = options.mode ?? 'folder-batch';
  const concurrency = options.concurrency ?? getScannerSettings().concurrency ?? getOptimalConcurrency();
  const parser: FileParserAdapter = options.parser ?? new ReadingItemService({ fileSystem, logger });
  const bookParser: FileParserAdapter = options.bookParser ?? createFilenameParser(logger);
  const tracker = new SeriesTracker(logger);

  const discoveryOptions: DiscoveryOptions = {
    fileSystem,
    logger,
    ignoreFileName: options.ignoreFileName ?? getScannerSettings().ignoreFileName,
    excludedDirectories: options.excludedDirectories ?? getScannerSettings().excludedDirectories,
  };

  let filesProcessed = 0;
  const publish = (path: string, type: ProgressEventType): void => {
    publishProgress(eventSink, fileScanProgressEvent(path, libraryName, type, filesProcessed), logger);
  };

  const parseFile = async (file: string, rootPath: string): Promise<ParsedRecord | null> => {
    try {
      return await processFile(file, rootPath, libraryType, { parser, bookParser, logger });
    } catch (err) {
      if (isFileNotFoundError(err)) {
        logger.error({ path: file, error: errorMessage(err) }, `The file ${file} could not be found`);
      } else {
        logger.error({ path: file, error: errorMessage(err) }, `Failed to process ${file}. Skipping this file`);
      }
      return null;
    } finally {
      filesProcessed++;
      publish(file, 'updated');
    }
  };

  const trackRecord = (record: ParsedRecord): void => {
    try {
      tracker.track(record);
    } catch (err) {
      logger.error(
        { path: record.fullFilePath, error: errorMessage(err) },
        'There was an exception during tracking. Skipping this file'
      );
    }
  };

  const processBatch = async (batch: FolderBatch, rootPath: string): Promise<void> => {
    const parsed = await parallelMap(batch.files, (file) => parseFile(file, rootPath), { concurrency });

    const records: ParsedRecord[] = [];
    for (const entry of parsed.results) {
      if (entry.success && entry.result) records.push(entry.result);
    }

    const rewritten = mergeLocalizedSeriesWithSeries(records);
    if (rewritten > 0) {
      logger.debug({ folderPath: batch.folderPath, rewritten }, 'Merged localized series names');
    }

    for (const record of records) {
      trackRecord(record);
    }

    if (records.length > 0 && options.onSeriesRecords) {
      try {
        await options.onSeriesRecords(records);
      } catch (err) {
        logger.error({ folderPath: batch.folderPath, error: errorMessage(err) }, 'Series records callback failed');
      }
    }
  };

  logger.info({ libraryName, libraryType, folders, mode }, 'Starting scan for series');
  publish('', 'started');

  for (const folderPath of folders) {
    try {
      if (mode === 'parallel') {
        await traverseTreeParallel(
          folderPath,
          async (file) => {
            const record = await parseFile(file, folderPath);
            if (record) trackRecord(record);
          },
          { ...discoveryOptions, concurrency }
        );
      } else {
        const batches = await collectFolderBatches(folderPath, options.isLibraryScan ?? true, discoveryOptions);
        for (const batch of batches) {
          await processBatch(batch, folderPath);
        }
      }
    } catch (err) {
      if (err instanceof DirectoryNotFoundError) {
        logger.error({ folderPath }, `The directory '${folderPath}' does not exist`);
      } else {
        logger.error({ folderPath, error: errorMessage(err) }, `Failed to scan '${folderPath}'`);
      }
    }
  }

  publish('', 'ended');

  const series = tracker.getSeriesWithRecords();

  logger.info({
    libraryName,
    series: series.size,
    files: filesProcessed,
    duration: Date.now() - startTime,
  }, 'Scan for series complete');

  return series;
}

export { FilenameParser, ReadingItemService };
