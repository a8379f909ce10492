/**
 * Choropleth world map of the forename/surname ratio, rendered to SVG
 *
 * Country polygons come from a GeoJSON FeatureCollection such as Natural
 * Earth's admin-0 countries. Features are joined to records by alpha-3 code.
 */

import fs from 'fs';
import path from 'path';
import * as d3 from 'd3';
import { MAP_BACKGROUND, NO_DATA_COLOR, NO_DATA_LABEL, RATIO_BUCKETS } from '../config/palette.js';
import { DEFAULT_JOIN_PROPERTY } from '../config/settings.js';
import type { CountryRecord, RatioColor } from '../types/name-stats.js';

type CountryFeature = d3.ExtendedFeature;
type CountryCollection = d3.ExtendedFeatureCollection<CountryFeature>;

export interface ChoroplethOptions {
  width?: number;
  height?: number;
  /** Feature property holding the alpha-3 code (default: ISO_A3_EH) */
  joinProperty?: string;
  title?: string;
}

export interface JoinedFeature {
  feature: CountryFeature;
  alpha3: string | null;
  record: CountryRecord | null;
  fill: RatioColor;
}

export interface LegendEntry {
  color: RatioColor;
  label: string;
}

const ALPHA3 = /^[A-Z]{3}$/;
const DEFAULT_TITLE = 'Global Distribution of Names: Surnames vs Forenames';

function isFeatureCollection(value: unknown): value is CountryCollection {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || value.type !== 'FeatureCollection') return false;
  return 'features' in value && Array.isArray(value.features);
}

/**
 * Load a GeoJSON FeatureCollection from disk
 */
export function readFeatureCollection(file: string): CountryCollection {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (!isFeatureCollection(raw)) {
    throw new Error(`${path.basename(file)} is not a GeoJSON FeatureCollection`);
  }
  return raw;
}

/**
 * Alpha-3 code of a feature: the join property, then ISO_A3, then the id.
 * Placeholders such as Natural Earth's "-99" are skipped.
 */
export function featureAlpha3(feature: CountryFeature, joinProperty: string = DEFAULT_JOIN_PROPERTY): string | null {
  const candidates: unknown[] = [
    feature.properties?.[joinProperty],
    feature.properties?.ISO_A3,
    feature.id,
  ];

  for (const candidate of candidates) {
    if (typeof candidate === 'string' && ALPHA3.test(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function joinDatasetToFeatures(
  features: readonly CountryFeature[],
  records: readonly CountryRecord[],
  joinProperty: string = DEFAULT_JOIN_PROPERTY
): JoinedFeature[] {
  const byAlpha3 = new Map(records.map((r) => [r.alpha3, r]));

  return features.map((feature) => {
    const alpha3 = featureAlpha3(feature, joinProperty);
    const record = alpha3 ? byAlpha3.get(alpha3) ?? null : null;
    return { feature, alpha3, record, fill: record ? record.color : NO_DATA_COLOR };
  });
}

/**
 * Six ordered buckets followed by the no-data entry
 */
export function legendEntries(): LegendEntry[] {
  return [
    ...RATIO_BUCKETS.map((b) => ({ color: b.color, label: b.label })),
    { color: NO_DATA_COLOR, label: NO_DATA_LABEL },
  ];
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function tooltip(joined: JoinedFeature): string {
  const name = joined.record?.countryKey ?? joined.alpha3 ?? 'unknown';
  const ratio = joined.record?.ratio;
  return ratio === null || ratio === undefined ? `${name}: no data` : `${name}: ${ratio.toFixed(2)}`;
}

function renderLegend(width: number, height: number): string {
  const entries = legendEntries();
  const rowHeight = 20;
  const x = width - 230;
  const y = height - 30 - (entries.length + 1) * rowHeight;

  const rows = entries.map((entry, i) => {
    const rowY = y + (i + 1) * rowHeight;
    return (
      `<rect x="${x}" y="${rowY}" width="14" height="14" fill="${entry.color}" stroke="#999999" stroke-width="0.5"/>` +
      `<text x="${x + 22}" y="${rowY + 11}" font-size="11">${escapeXml(entry.label)}</text>`
    );
  });

  return [
    `<g class="legend" font-family="sans-serif">`,
    `<text x="${x}" y="${y + 12}" font-size="13" font-weight="bold">Color Legend</text>`,
    ...rows,
    `</g>`,
  ].join('\n');
}

/**
 * Render the map as a standalone SVG document
 */
export function renderChoroplethSVG(
  collection: CountryCollection,
  records: readonly CountryRecord[],
  options: ChoroplethOptions = {}
): string {
  const { width = 1200, height = 600, joinProperty = DEFAULT_JOIN_PROPERTY, title = DEFAULT_TITLE } = options;

  const sphere: d3.GeoSphere = { type: 'Sphere' };
  const projection = d3.geoNaturalEarth1().fitExtent(
    [
      [10, 50],
      [width - 10, height - 10],
    ],
    sphere
  );
  const geoPath = d3.geoPath(projection);

  const countries = joinDatasetToFeatures(collection.features, records, joinProperty)
    .map((joined) => {
      const d = geoPath(joined.feature);
      if (!d) return null;
      return (
        `<path d="${d}" fill="${joined.fill}" stroke="#ffffff" stroke-width="0.3" stroke-opacity="0.2">` +
        `<title>${escapeXml(tooltip(joined))}</title></path>`
      );
    })
    .filter((p): p is string => p !== null);

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="100%" height="100%" fill="${MAP_BACKGROUND}"/>`,
    `<text x="${width / 2}" y="32" text-anchor="middle" font-family="sans-serif" font-size="16" font-weight="bold">${escapeXml(title)}</text>`,
    `<g class="countries">`,
    ...countries,
    `</g>`,
    renderLegend(width, height),
    `<text x="10" y="${height - 22}" font-family="sans-serif" font-size="8" opacity="0.7">Data source: forebears.io</text>`,
    `<text x="10" y="${height - 10}" font-family="sans-serif" font-size="8" opacity="0.7">Color intensity indicates relative prevalence</text>`,
    `</svg>`,
  ].join('\n');
}

/**
 * Read the GeoJSON, render, and write the SVG file
 */
export function saveChoroplethSVG(
  geojsonFile: string,
  records: readonly CountryRecord[],
  svgFile: string,
  options: ChoroplethOptions = {}
): void {
  const collection = readFeatureCollection(geojsonFile);
  const svg = renderChoroplethSVG(collection, records, options);

  fs.mkdirSync(path.dirname(svgFile), { recursive: true });
  fs.writeFileSync(svgFile, svg, 'utf8');

  const joined = joinDatasetToFeatures(collection.features, records, options.joinProperty).filter((j) => j.record);
  console.error(`[map] ${joined.length}/${collection.features.length} countries joined, saved to ${svgFile}`);
}
