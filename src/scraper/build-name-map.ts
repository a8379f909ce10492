#!/usr/bin/env node

/**
 * Build the forename/surname ratio dataset and world map
 * Source: forebears.io (surnames and forenames per country)
 * Output: CSV cache + optional SVG choropleth
 *
 * Logs go to stderr; stdout carries a JSON summary for automation.
 */

import { pathToFileURL } from 'url';
import { program } from 'commander';
import { createCountryCatalog } from '../catalog/country-catalog.js';
import { loadCorrections, loadReferenceCountries } from '../catalog/reference-countries.js';
import { loadSettings, type Settings } from '../config/settings.js';
import { saveChoroplethSVG } from '../map/choropleth.js';
import type { CountryCorrections, CountryRecord, RawCountryRecord, ReferenceCountry } from '../types/name-stats.js';
import { CacheFormatError, isCacheFresh, loadDatasetCache, saveDatasetCache } from '../utils/dataset-cache.js';
import { buildDataset } from './dataset-builder.js';
import { createNameCountFetcher, type NameCountFetcher } from './name-count-fetcher.js';
import { classifyDataset } from './ratio-classifier.js';

export interface PipelineOptions {
  cacheFile: string;
  svgFile: string | null;
  geojsonFile: string | null;
  correctionsFile?: string;
  concurrency: number;
  /** null: never expire the cache */
  maxAgeDays: number | null;
  refresh: boolean;
  respectRobots: boolean;
}

/**
 * Replaceable inputs, mainly for tests
 */
export interface PipelineDependencies {
  settings?: Settings;
  reference?: ReferenceCountry[];
  corrections?: CountryCorrections;
  fetcher?: NameCountFetcher;
}

export interface PipelineSummary {
  countries: number;
  withRatio: number;
  missing: number;
  cache: 'hit' | 'refreshed';
  map: string | null;
}

export interface PipelineResult {
  records: CountryRecord[];
  summary: PipelineSummary;
}

export interface CliOptions {
  cache: string;
  svg: string;
  geojson?: string;
  corrections?: string;
  concurrency: string;
  maxAge?: string;
  refresh: boolean;
  robots: boolean;
}

function readCache(options: PipelineOptions): RawCountryRecord[] | null {
  if (options.refresh || !isCacheFresh(options.cacheFile, options.maxAgeDays)) return null;

  try {
    return loadDatasetCache(options.cacheFile);
  } catch (error) {
    if (error instanceof CacheFormatError) {
      console.error(`[cache] Ignoring ${options.cacheFile}:`, error.message);
      return null;
    }
    throw error;
  }
}

async function scrape(
  options: PipelineOptions,
  settings: Settings,
  deps: PipelineDependencies
): Promise<RawCountryRecord[]> {
  // Catalog problems are fatal and must surface before the first request
  const catalog = createCountryCatalog(
    deps.reference ?? loadReferenceCountries(),
    deps.corrections ?? loadCorrections(options.correctionsFile)
  );

  const fetcher =
    deps.fetcher ??
    createNameCountFetcher({
      baseUrl: settings.baseUrl,
      userAgent: settings.userAgent,
      timeoutMs: settings.timeoutMs,
      respectRobots: options.respectRobots,
    });

  const raw = await buildDataset(catalog, fetcher, {
    concurrency: options.concurrency,
    onProgress: (record, completed, total) => {
      console.error(
        `[${completed}/${total}] ${record.countryKey} (${record.alpha3}): ` +
          `surnames=${record.surnameCount ?? '-'}, forenames=${record.forenameCount ?? '-'}`
      );
    },
  });

  saveDatasetCache(raw, options.cacheFile);
  return raw;
}

/**
 * Load or scrape the dataset, classify it, and draw the map
 */
export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDependencies = {}
): Promise<PipelineResult> {
  const settings = deps.settings ?? loadSettings();

  const cached = readCache(options);
  const raw = cached ?? (await scrape(options, settings, deps));
  const records = classifyDataset(raw);

  let map: string | null = null;
  const geojsonFile = options.geojsonFile ?? settings.geojsonPath;
  if (options.svgFile && geojsonFile) {
    try {
      saveChoroplethSVG(geojsonFile, records, options.svgFile, { joinProperty: settings.joinProperty });
      map = options.svgFile;
    } catch (error) {
      console.error('[map] Skipping map:', (error as Error).message);
    }
  } else if (options.svgFile) {
    console.error('[map] No GeoJSON given (--geojson or NAME_ATLAS_GEOJSON), skipping map');
  }

  const withRatio = records.filter((r) => r.ratio !== null).length;
  return {
    records,
    summary: {
      countries: records.length,
      withRatio,
      missing: records.length - withRatio,
      cache: cached ? 'hit' : 'refreshed',
      map,
    },
  };
}

/**
 * Turn raw commander values into pipeline options.
 * Invalid numbers fall back to their defaults with a warning.
 */
export function parseCliOptions(opt: CliOptions): PipelineOptions {
  let concurrency = parseInt(opt.concurrency, 10);
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    console.error(`[build-name-map] Ignoring --concurrency ${opt.concurrency}, using 1`);
    concurrency = 1;
  }

  let maxAgeDays: number | null = null;
  if (opt.maxAge !== undefined) {
    const maxAge = parseFloat(opt.maxAge);
    if (Number.isFinite(maxAge) && maxAge > 0) {
      maxAgeDays = maxAge;
    } else {
      console.error(`[build-name-map] Ignoring --max-age ${opt.maxAge}, the cache never expires`);
    }
  }

  return {
    cacheFile: opt.cache,
    svgFile: opt.svg || null,
    geojsonFile: opt.geojson ?? null,
    correctionsFile: opt.corrections,
    concurrency,
    maxAgeDays,
    refresh: opt.refresh,
    respectRobots: opt.robots,
  };
}

// Main execution - only run if this file is executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  program
    .name('build-name-map')
    .description('Map the forename/surname ratio per country from forebears.io')
    .option('--cache <file>', 'CSV cache of name counts', 'output/name-counts.csv')
    .option('--svg <file>', 'SVG map output', 'output/world-map.svg')
    .option('--geojson <file>', 'GeoJSON country polygons (alpha-3 in ISO_A3_EH/ISO_A3/id)')
    .option('--corrections <file>', 'JSON table of country key corrections')
    .option('--concurrency <n>', 'countries fetched in parallel', '1')
    .option('--max-age <days>', 'rebuild the cache when older than this')
    .option('--refresh', 'ignore the cache and scrape again', false)
    .option('--no-robots', 'do not check robots.txt before fetching')
    .parse(process.argv);

  const options = parseCliOptions(program.opts<CliOptions>());

  runPipeline(options)
    .then(({ summary }) => {
      console.log(JSON.stringify(summary, null, 2));
    })
    .catch((error) => {
      console.error('[build-name-map] Fatal error:', error);
      process.exit(1);
    });
}
