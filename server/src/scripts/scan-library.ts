/**
 * Scan Library Script
 *
 * Scans one or more library folders and prints the series found.
 *
 * Usage: npx tsx server/src/scripts/scan-library.ts <type> <library-name> <folder...> [--parallel] [--series-folder]
 *   type: manga | comic | book | image
 */

import { loadedFrom } from '../env.js';
import { z } from 'zod';
import {
  ScanEventHub,
  NOTIFICATION_PROGRESS,
  scanLibrariesForSeries,
  type FileScanProgressEvent,
} from '../services/library-scanner/index.js';
import { logError, logger } from '../services/logger.service.js';

const ArgsSchema = z.object({
  libraryType: z.enum(['manga', 'comic', 'book', 'image']),
  libraryName: z.string().min(1, 'Library name is required'),
  folders: z.array(z.string().min(1)).min(1, 'At least one folder is required'),
  parallel: z.boolean(),
  seriesFolder: z.boolean(),
});

function parseArgs(argv: string[]) {
  const flags = new Set(argv.filter((arg) => arg.startsWith('--')));
  const [libraryType, libraryName, ...folders] = argv.filter((arg) => !arg.startsWith('--'));

  return ArgsSchema.safeParse({
    libraryType,
    libraryName,
    folders,
    parallel: flags.has('--parallel'),
    seriesFolder: flags.has('--series-folder'),
  });
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.success) {
    console.error('Usage: scan-library <manga|comic|book|image> <library-name> <folder...> [--parallel] [--series-folder]');
    for (const issue of args.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  const { libraryType, libraryName, folders, parallel, seriesFolder } = args.data;
  logger.debug({ envFile: loadedFrom }, 'Environment loaded');

  const hub = new ScanEventHub();
  hub.on(NOTIFICATION_PROGRESS, (event: FileScanProgressEvent) => {
    if (event.progressEventType === 'updated' && event.filesProcessed % 100 === 0) {
      console.log(`Scanned ${event.filesProcessed} files...`);
    }
  });

  const series = await scanLibrariesForSeries(libraryType, folders, libraryName, {
    mode: parallel ? 'parallel' : 'folder-batch',
    isLibraryScan: !seriesFolder,
    eventSink: hub,
  });

  const sorted = [...series.entries()].sort(([a], [b]) => a.name.localeCompare(b.name));
  for (const [identity, records] of sorted) {
    console.log(`${identity.name} [${identity.format}] - ${records.length} file(s)`);
  }
  console.log(`\n${series.size} series found in ${libraryName}`);
}

main().catch((error: unknown) => {
  logError('scan-library', error);
  process.exit(1);
});
