/**
 * Localized Merge Phase
 *
 * Within one folder batch, folds records released under a localized title
 * into the series that carries the original title, so the tracker sees a
 * single series.
 *
 * Example: "Accel World v01.cbz" has series "Accel World" and localized
 * series "World of Acceleration"; "World of Acceleration v02.cbz" has series
 * "World of Acceleration". Afterwards the second record has series
 * "Accel World" and localized series "World of Acceleration".
 */

import { normalize } from '../parser-rules.js';
import type { ParsedRecord } from '../types.js';

/**
 * Rewrite `series`/`localizedSeries` in place. No-op when no record carries a
 * localized name, or when every series name equals the localized one.
 *
 * @returns number of records rewritten
 */
export function mergeLocalizedSeriesWithSeries(records: readonly ParsedRecord[]): number {
  const localizedSeries = records.find((record) => !!record.localizedSeries)?.localizedSeries;
  if (!localizedSeries) return 0;

  const canonicalSeries = records.find((record) => record.series !== localizedSeries)?.series;
  if (canonicalSeries === undefined) return 0;

  const normalizedCanonical = normalize(canonicalSeries);
  let rewritten = 0;

  for (const record of records) {
    if (normalize(record.series) !== normalizedCanonical) {
      record.series = canonicalSeries;
      record.localizedSeries = localizedSeries;
      rewritten++;
    }
  }

  return rewritten;
}
