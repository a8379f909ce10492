/**
 * Reference data for the country catalog
 *
 * ISO 3166-1 countries come from the world-countries package; the slug
 * corrections live in data/country-corrections.json so they can be edited
 * without touching code.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import worldCountries from 'world-countries';
import type { CountryCorrections, ReferenceCountry } from '../types/name-stats.js';

export const DEFAULT_CORRECTIONS_FILE = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../data/country-corrections.json'
);

/**
 * All ISO 3166-1 countries, in the package's order
 */
export function loadReferenceCountries(): ReferenceCountry[] {
  return worldCountries.map((country) => ({
    alpha3: country.cca3,
    commonName: country.name.common,
    officialName: country.name.official,
  }));
}

/**
 * Validate a parsed corrections document: a flat object of string to string
 */
export function parseCorrections(raw: unknown, source: string): CountryCorrections {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`[catalog] ${source}: corrections must be a JSON object`);
  }

  const corrections: Record<string, string> = {};
  for (const [oldKey, newKey] of Object.entries(raw)) {
    if (typeof newKey !== 'string' || newKey.trim() === '') {
      throw new Error(`[catalog] ${source}: correction for "${oldKey}" must be a non-empty string`);
    }
    corrections[oldKey] = newKey;
  }

  return Object.freeze(corrections);
}

/**
 * Read the correction table from disk
 *
 * @param file - JSON file path (default: data/country-corrections.json)
 */
export function loadCorrections(file: string = DEFAULT_CORRECTIONS_FILE): CountryCorrections {
  const data = fs.readFileSync(file, 'utf8');
  return parseCorrections(JSON.parse(data), path.basename(file));
}
