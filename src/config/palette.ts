/**
 * Ratio color scale
 *
 * Six ordered buckets over forenames/surnames, teal for surname-heavy
 * countries and orange for forename-heavy ones, plus white for no data.
 */

import type { BucketColor, NoDataColor } from '../types/name-stats.js';

export interface RatioBucket {
  /** Exclusive lower bound (the first bucket also takes the bound itself) */
  lower: number;
  /** Inclusive upper bound */
  upper: number;
  color: BucketColor;
  label: string;
}

export const RATIO_BUCKETS: readonly RatioBucket[] = [
  { lower: 0, upper: 0.25, color: '#3b7b80', label: 'Many more surnames' },
  { lower: 0.25, upper: 0.5, color: '#68999d', label: 'More surnames' },
  { lower: 0.5, upper: 1, color: '#89afb4', label: 'Moderately more surnames' },
  { lower: 1, upper: 1.5, color: '#f1a85f', label: 'Moderately more forenames' },
  { lower: 1.5, upper: 2, color: '#ee9133', label: 'More forenames' },
  { lower: 2, upper: Infinity, color: '#db780b', label: 'Many more forenames' },
];

export const NO_DATA_COLOR: NoDataColor = '#ffffff';
export const NO_DATA_LABEL = 'No data';

export const MAP_BACKGROUND = '#F0F8FF';
