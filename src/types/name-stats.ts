export type NameType = 'surnames' | 'forenames';

/**
 * Immutable mapping from forebears.io URL segment to ISO 3166-1 alpha-3 code.
 * Iteration order is the order countries are scraped in.
 */
export type CountryCatalog = ReadonlyMap<string, string>;

/**
 * One entry of the ISO reference list
 */
export interface ReferenceCountry {
  alpha3: string;
  commonName?: string | null;
  officialName: string;
}

/**
 * Fixed oldKey -> newKey renames applied on top of the derived catalog
 */
export type CountryCorrections = Readonly<Record<string, string>>;

export interface RawCountryRecord {
  countryKey: string; // URL segment, e.g. "south-korea"
  alpha3: string; // ISO 3166-1 alpha-3, e.g. "KOR"
  surnameCount: number | null;
  forenameCount: number | null;
}

export interface CountryRecord extends RawCountryRecord {
  ratio: number | null; // forenames / surnames
  color: RatioColor;
}

export type BucketColor =
  | '#3b7b80'
  | '#68999d'
  | '#89afb4'
  | '#f1a85f'
  | '#ee9133'
  | '#db780b';

export type NoDataColor = '#ffffff';

export type RatioColor = BucketColor | NoDataColor;
