/**
 * Dataset builder - one raw record per catalog entry
 *
 * Visits every country exactly once, surnames first, then forenames. A
 * country whose record cannot be assembled is kept with both counts null;
 * the run itself never fails.
 */

import type { CountryCatalog, RawCountryRecord } from '../types/name-stats.js';
import type { NameCountFetcher } from './name-count-fetcher.js';

export interface BuildOptions {
  /** Countries fetched in parallel (default: 1, fully sequential) */
  concurrency?: number;
  /** Called once per country as soon as its record is ready */
  onProgress?: (record: RawCountryRecord, completed: number, total: number) => void;
}

function assertCount(value: number | null, label: string): number | null {
  if (value === null) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${label} is not a non-negative integer: ${value}`);
  }
  return value;
}

async function buildRecord(
  countryKey: string,
  alpha3: string,
  fetcher: NameCountFetcher
): Promise<RawCountryRecord> {
  try {
    const surnameCount = assertCount(await fetcher(countryKey, 'surnames'), 'surname count');
    const forenameCount = assertCount(await fetcher(countryKey, 'forenames'), 'forename count');
    return { countryKey, alpha3, surnameCount, forenameCount };
  } catch (error) {
    console.error(`[dataset] Failed to build record for ${countryKey} (${alpha3}):`, (error as Error).message);
    return { countryKey, alpha3, surnameCount: null, forenameCount: null };
  }
}

/**
 * Fetch surname and forename counts for every country in the catalog
 *
 * @returns Records in catalog order, exactly one per entry
 */
export async function buildDataset(
  catalog: CountryCatalog,
  fetcher: NameCountFetcher,
  options: BuildOptions = {}
): Promise<RawCountryRecord[]> {
  const entries = Array.from(catalog.entries());
  const total = entries.length;
  const concurrency = Math.max(1, Math.min(Math.floor(options.concurrency ?? 1), total || 1));
  const records = new Array<RawCountryRecord | undefined>(total);

  console.error(`[dataset] Fetching name counts for ${total} countries (concurrency ${concurrency})`);

  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < total) {
      const index = next++;
      const [countryKey, alpha3] = entries[index];
      const record = await buildRecord(countryKey, alpha3, fetcher);
      records[index] = record;
      completed++;
      try {
        options.onProgress?.(record, completed, total);
      } catch (error) {
        console.error('[dataset] Progress callback failed:', (error as Error).message);
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  // Every slot is filled by exactly one worker
  const dataset = records.filter((record): record is RawCountryRecord => record !== undefined);
  const missing = dataset.filter((r) => r.surnameCount === null || r.forenameCount === null).length;
  console.error(`[dataset] Done: ${dataset.length} countries, ${missing} with missing counts`);

  return dataset;
}
