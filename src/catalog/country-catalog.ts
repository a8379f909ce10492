/**
 * Country catalog - forebears.io URL segment to ISO 3166-1 alpha-3
 *
 * The catalog is derived from an ISO reference list, then patched with a
 * fixed correction table for countries whose forebears.io slug differs from
 * their reference name (e.g. "united-kingdom" is served as "england").
 *
 * Usage:
 * ```typescript
 * const catalog = createCountryCatalog(loadReferenceCountries(), loadCorrections());
 * for (const [countryKey, alpha3] of catalog) {
 *   // ...
 * }
 * ```
 */

import type { CountryCatalog, CountryCorrections, ReferenceCountry } from '../types/name-stats.js';

/**
 * Raised when the correction table and the reference data disagree.
 * Always fatal: it is thrown before any request is made.
 */
export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly countryKey: string
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * Normalize a country name to its URL segment: lowercase, spaces to hyphens
 *
 * @example
 * toCountryKey('South Korea'); // "south-korea"
 * toCountryKey("Côte d'Ivoire"); // "côte-d'ivoire"
 */
export function toCountryKey(name: string): string {
  return name.toLowerCase().replace(/ /g, '-');
}

/**
 * Derive the uncorrected catalog from the reference list
 *
 * The common name wins over the official one. When two countries map to the
 * same key the later one overwrites the earlier (keeping its position).
 */
export function buildCountryCatalog(reference: Iterable<ReferenceCountry>): Map<string, string> {
  const catalog = new Map<string, string>();

  for (const country of reference) {
    const name = country.commonName || country.officialName;
    catalog.set(toCountryKey(name), country.alpha3);
  }

  return catalog;
}

/**
 * Move each alpha-3 code from its derived key to the corrected key
 *
 * @throws {CatalogError} if an old key is absent, or a new key is already
 *   taken by another country (the rename would drop an alpha-3 code)
 */
export function applyCorrections(
  catalog: ReadonlyMap<string, string>,
  corrections: CountryCorrections
): Map<string, string> {
  const corrected = new Map(catalog);

  for (const [oldKey, newKey] of Object.entries(corrections)) {
    const alpha3 = corrected.get(oldKey);
    if (alpha3 === undefined) {
      throw new CatalogError(
        `Correction "${oldKey}" -> "${newKey}" refers to a country key missing from the catalog`,
        oldKey
      );
    }
    if (oldKey === newKey) continue;

    const occupant = corrected.get(newKey);
    if (occupant !== undefined) {
      throw new CatalogError(
        `Correction "${oldKey}" -> "${newKey}" would overwrite ${occupant}`,
        newKey
      );
    }

    corrected.delete(oldKey);
    corrected.set(newKey, alpha3);
  }

  return corrected;
}

/**
 * Frozen view over a Map: reads pass through, writes throw
 */
function freezeCatalog(entries: Map<string, string>): CountryCatalog {
  const frozen = new Map(entries);
  const reject = (): never => {
    throw new TypeError('Country catalog is read-only');
  };
  frozen.set = reject;
  frozen.delete = reject;
  frozen.clear = reject;
  return Object.freeze(frozen);
}

/**
 * Build, correct and freeze the catalog in one step
 */
export function createCountryCatalog(
  reference: Iterable<ReferenceCountry>,
  corrections: CountryCorrections
): CountryCatalog {
  const catalog = applyCorrections(buildCountryCatalog(reference), corrections);
  console.error(`[catalog] ${catalog.size} countries (${Object.keys(corrections).length} corrections)`);
  return freezeCatalog(catalog);
}
