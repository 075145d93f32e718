/**
 * Series Tracker
 *
 * Groups records under series identities for a single scan. A record joins
 * the identity whose normalized name equals the normalized series, localized
 * series or sort name of the record, under the same format. When more than
 * one identity qualifies the record is left out and the conflict is logged;
 * the tracker never picks a side.
 */

import { trackerLogger, type ScanLogger } from '../logger.service.js';
import { normalize } from './parser-rules.js';
import type { KnownSeries, ParsedRecord, ParsedSeriesMap, SeriesIdentity } from './types.js';

export type MergeNameResult =
  | { status: 'resolved'; name: string }
  | { status: 'conflict'; matches: SeriesIdentity[] };

export type TrackOutcome =
  | { status: 'skipped' }
  | { status: 'conflict'; matches: SeriesIdentity[] }
  | { status: 'created'; identity: SeriesIdentity }
  | { status: 'added'; identity: SeriesIdentity }
  | { status: 'duplicate'; identity: SeriesIdentity };

function nonEmpty(values: string[]): string[] {
  return values.filter((value) => value.length > 0);
}

export class SeriesTracker {
  private readonly scannedSeries: ParsedSeriesMap = new Map();

  constructor(private readonly logger: ScanLogger = trackerLogger) {}

  /**
   * Add a record to its series, creating the series when none matches.
   * Records whose series normalizes to nothing are skipped.
   *
   * Resolution and insertion happen without yielding to the event loop, so
   * concurrent file workers cannot both decide to create the same series.
   */
  track(record: ParsedRecord): TrackOutcome {
    if (!normalize(record.series)) return { status: 'skipped' };

    const merged = this.mergeName(record);
    if (merged.status === 'conflict') {
      return merged;
    }
    record.series = merged.name;

    const candidates = nonEmpty([
      normalize(record.series),
      normalize(record.localizedSeries),
      normalize(record.seriesSort),
    ]);
    const matches = this.findIdentities(record, candidates);

    if (matches.length > 1) {
      this.logger.critical({
        series: record.series,
        file: record.fullFilePath,
        conflictingSeries: matches.map((identity) => identity.name),
      }, `${record.series} matches against multiple series in the parsed series. Record will be skipped`);
      for (const identity of matches) {
        this.logger.critical({ series: record.series, match: identity.name }, `Matches: ${record.series} matches on ${identity.name}`);
      }
      return { status: 'conflict', matches };
    }

    const existing = matches[0];
    if (existing) {
      const records = this.scannedSeries.get(existing) ?? [];
      if (records.includes(record)) {
        return { status: 'duplicate', identity: existing };
      }
      records.push(record);
      this.scannedSeries.set(existing, records);
      return { status: 'added', identity: existing };
    }

    const identity: SeriesIdentity = {
      name: record.series,
      normalizedName: normalize(record.series),
      format: record.format,
      folderPath: record.folderPath,
    };
    this.scannedSeries.set(identity, [record]);
    return { status: 'created', identity };
  }

  /**
   * Name of the already-tracked series this record belongs to, matching on
   * series and localized series. Near-duplicate spellings resolve to the
   * first spelling seen.
   */
  mergeName(record: ParsedRecord): MergeNameResult {
    const candidates = nonEmpty([normalize(record.series), normalize(record.localizedSeries)]);
    const matches = this.findIdentities(record, candidates);

    if (matches.length > 1) {
      this.logger.critical({
        series: record.series,
        file: record.fullFilePath,
        conflictingSeries: matches.map((identity) => identity.name),
      }, `Multiple series detected for ${record.series} (${record.fullFilePath}). There should only be 1`);
      for (const identity of matches) {
        this.logger.critical({ series: record.series, duplicate: identity.name }, `Duplicate series matches with ${record.series}: ${identity.name}`);
      }
      return { status: 'conflict', matches };
    }

    const existing = matches[0];
    if (existing && existing.name) {
      return { status: 'resolved', name: existing.name };
    }
    return { status: 'resolved', name: record.series };
  }

  /**
   * Series that received at least one record.
   */
  getSeriesWithRecords(): ParsedSeriesMap {
    const snapshot: ParsedSeriesMap = new Map();
    for (const [identity, records] of this.scannedSeries) {
      if (records.length > 0) {
        snapshot.set(identity, [...records]);
      }
    }
    return snapshot;
  }

  get size(): number {
    return this.scannedSeries.size;
  }

  private findIdentities(record: ParsedRecord, candidates: string[]): SeriesIdentity[] {
    const matches: SeriesIdentity[] = [];
    for (const identity of this.scannedSeries.keys()) {
      if (identity.format !== record.format) continue;
      if (candidates.includes(normalize(identity.normalizedName))) {
        matches.push(identity);
      }
    }
    return matches;
  }
}

/**
 * Records of every scanned series that matches a known series by name,
 * localized name or original name under the same format.
 */
export function getRecordsBySeries(parsedSeries: ParsedSeriesMap, series: KnownSeries): ParsedRecord[] {
  const names = nonEmpty([
    normalize(series.name),
    normalize(series.localizedName),
    normalize(series.originalName),
  ]);

  const records: ParsedRecord[] = [];
  for (const [identity, infos] of parsedSeries) {
    if (identity.format === series.format && names.includes(identity.normalizedName)) {
      records.push(...infos);
    }
  }
  return records;
}
