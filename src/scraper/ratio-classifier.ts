/**
 * Forename/surname ratio and its color bucket
 */

import { NO_DATA_COLOR, RATIO_BUCKETS } from '../config/palette.js';
import type { CountryRecord, RatioColor, RawCountryRecord } from '../types/name-stats.js';

/**
 * forenames / surnames, or null unless both counts are present and positive
 */
export function computeRatio(surnameCount: number | null, forenameCount: number | null): number | null {
  if (surnameCount === null || forenameCount === null) return null;
  if (surnameCount <= 0 || forenameCount <= 0) return null;
  return forenameCount / surnameCount;
}

/**
 * Bucket color for a ratio
 *
 * Buckets are (lower, upper] except the first, which also takes 0.
 * Missing, NaN and negative ratios get the no-data color.
 *
 * @example
 * classifyRatio(0.5); // "#68999d"
 * classifyRatio(3); // "#db780b"
 * classifyRatio(null); // "#ffffff"
 */
export function classifyRatio(ratio: number | null): RatioColor {
  if (ratio === null || Number.isNaN(ratio) || ratio < 0) return NO_DATA_COLOR;

  const bucket = RATIO_BUCKETS.find((b) => ratio <= b.upper);
  return bucket ? bucket.color : NO_DATA_COLOR;
}

export function classifyRecord(record: RawCountryRecord): CountryRecord {
  const ratio = computeRatio(record.surnameCount, record.forenameCount);
  return { ...record, ratio, color: classifyRatio(ratio) };
}

export function classifyDataset(records: readonly RawCountryRecord[]): CountryRecord[] {
  return records.map(classifyRecord);
}
