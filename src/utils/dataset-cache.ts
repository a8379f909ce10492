/**
 * CSV cache of scraped name counts, keyed by alpha-3 code
 *
 * Only the raw counts are stored; ratio and color are derived again on
 * load so a palette change never needs a re-scrape.
 */

import fs from 'fs';
import path from 'path';
import dayjs, { type Dayjs } from 'dayjs';
import Papa from 'papaparse';
import type { RawCountryRecord } from '../types/name-stats.js';

export const CACHE_COLUMNS = ['alpha3', 'country', 'surname_count', 'forename_count'] as const;

type CacheColumn = (typeof CACHE_COLUMNS)[number];
type CacheRow = Record<CacheColumn, string>;

export class CacheFormatError extends Error {
  constructor(
    message: string,
    public readonly line: number | null = null
  ) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = 'CacheFormatError';
  }
}

/**
 * Every cell is quoted; a missing count is an empty cell
 */
export function datasetToCSV(records: readonly RawCountryRecord[]): string {
  const data = records.map((r) => [
    r.alpha3,
    r.countryKey,
    r.surnameCount?.toString() ?? '',
    r.forenameCount?.toString() ?? '',
  ]);

  return Papa.unparse({ fields: [...CACHE_COLUMNS], data }, { quotes: true, newline: '\n' }) + '\n';
}

function parseCount(value: string, column: CacheColumn, line: number): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  if (!/^\d+$/.test(trimmed)) {
    throw new CacheFormatError(`${column} "${value}" is not a non-negative integer`, line);
  }
  return parseInt(trimmed, 10);
}

function isCacheRow(row: Record<string, string | undefined>): row is CacheRow {
  return CACHE_COLUMNS.every((column) => typeof row[column] === 'string');
}

/**
 * Parse cache CSV text back into raw records, in file order
 *
 * @throws {CacheFormatError} on a missing column, a bad alpha-3 code,
 *   a duplicate alpha-3 code or a non-integer count
 */
export function parseDatasetCSV(text: string): RawCountryRecord[] {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  const fields = parsed.meta.fields ?? [];
  const missing = CACHE_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new CacheFormatError(`missing column(s): ${missing.join(', ')}`);
  }

  const seen = new Set<string>();
  const records: RawCountryRecord[] = [];

  parsed.data.forEach((row, index) => {
    const line = index + 2; // header is line 1
    if (!isCacheRow(row)) {
      throw new CacheFormatError('row has fewer cells than the header', line);
    }

    const alpha3 = row.alpha3.trim().toUpperCase();
    if (!/^[A-Z]{3}$/.test(alpha3)) {
      throw new CacheFormatError(`"${row.alpha3}" is not an alpha-3 code`, line);
    }
    if (seen.has(alpha3)) {
      throw new CacheFormatError(`duplicate alpha-3 code ${alpha3}`, line);
    }
    seen.add(alpha3);

    records.push({
      countryKey: row.country.trim(),
      alpha3,
      surnameCount: parseCount(row.surname_count, 'surname_count', line),
      forenameCount: parseCount(row.forename_count, 'forename_count', line),
    });
  });

  return records;
}

export function saveDatasetCache(records: readonly RawCountryRecord[], file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, datasetToCSV(records), 'utf8');
  console.error(`[cache] Saved ${records.length} countries to ${file}`);
}

/**
 * Read the cache, or null if the file does not exist
 */
export function loadDatasetCache(file: string): RawCountryRecord[] | null {
  if (!fs.existsSync(file)) return null;
  const records = parseDatasetCSV(fs.readFileSync(file, 'utf8'));
  console.error(`[cache] Loaded ${records.length} countries from ${file}`);
  return records;
}

/**
 * Whether the cache file exists and is younger than `maxAgeDays`
 *
 * @param maxAgeDays - null means the cache never expires
 */
export function isCacheFresh(file: string, maxAgeDays: number | null, now: Dayjs = dayjs()): boolean {
  if (!fs.existsSync(file)) return false;
  if (maxAgeDays === null) return true;

  const modified = dayjs(fs.statSync(file).mtime);
  return modified.isAfter(now.subtract(maxAgeDays, 'day'));
}
