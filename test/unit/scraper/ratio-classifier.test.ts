import { describe, it, expect } from 'vitest';
import { RATIO_BUCKETS } from '@/config/palette.js';
import { classifyDataset, classifyRatio, classifyRecord, computeRatio } from '@/scraper/ratio-classifier.js';
import type { RawCountryRecord } from '@/types/name-stats.js';

function raw(surnameCount: number | null, forenameCount: number | null): RawCountryRecord {
  return { countryKey: 'testland', alpha3: 'TST', surnameCount, forenameCount };
}

describe('computeRatio', () => {
  it('should divide forenames by surnames', () => {
    expect(computeRatio(100, 50)).toBe(0.5);
    expect(computeRatio(100, 300)).toBe(3);
  });

  it('should return null when a count is missing', () => {
    expect(computeRatio(null, 50)).toBeNull();
    expect(computeRatio(100, null)).toBeNull();
    expect(computeRatio(null, null)).toBeNull();
  });

  it('should return null when a count is zero', () => {
    expect(computeRatio(0, 50)).toBeNull();
    expect(computeRatio(100, 0)).toBeNull();
  });
});

describe('classifyRatio', () => {
  it('should put each bucket upper bound in that bucket', () => {
    expect(classifyRatio(0.25)).toBe('#3b7b80');
    expect(classifyRatio(0.5)).toBe('#68999d');
    expect(classifyRatio(1)).toBe('#89afb4');
    expect(classifyRatio(1.5)).toBe('#f1a85f');
    expect(classifyRatio(2)).toBe('#ee9133');
  });

  it('should put values just above a bound in the next bucket', () => {
    expect(classifyRatio(0.2500001)).toBe('#68999d');
    expect(classifyRatio(0.51)).toBe('#89afb4');
    expect(classifyRatio(1.01)).toBe('#f1a85f');
    expect(classifyRatio(1.51)).toBe('#ee9133');
    expect(classifyRatio(2.01)).toBe('#db780b');
  });

  it('should classify 0 in the first bucket, not as missing', () => {
    expect(classifyRatio(0)).toBe('#3b7b80');
  });

  it('should put very large ratios in the last bucket', () => {
    expect(classifyRatio(3)).toBe('#db780b');
    expect(classifyRatio(1e9)).toBe('#db780b');
  });

  it('should use the no-data color for missing or invalid ratios', () => {
    expect(classifyRatio(null)).toBe('#ffffff');
    expect(classifyRatio(Number.NaN)).toBe('#ffffff');
    expect(classifyRatio(-0.5)).toBe('#ffffff');
  });

  it('should never move to a lower bucket as the ratio grows', () => {
    const order = RATIO_BUCKETS.map((b) => b.color);
    const ratios = [0, 0.1, 0.25, 0.3, 0.5, 0.75, 1, 1.2, 1.5, 1.8, 2, 2.5, 10, 1000];

    const indexes = ratios.map((ratio) => order.findIndex((color) => color === classifyRatio(ratio)));

    expect(indexes.every((index) => index >= 0)).toBe(true);
    for (let i = 1; i < indexes.length; i++) {
      expect(indexes[i]).toBeGreaterThanOrEqual(indexes[i - 1]);
    }
    expect(indexes[0]).toBe(0);
    expect(indexes[indexes.length - 1]).toBe(5);
  });
});

describe('classifyRecord', () => {
  it('should classify an even split as the second bucket', () => {
    expect(classifyRecord(raw(100, 50))).toMatchObject({ ratio: 0.5, color: '#68999d' });
  });

  it('should classify a forename-heavy country as the last bucket', () => {
    expect(classifyRecord(raw(100, 300))).toMatchObject({ ratio: 3, color: '#db780b' });
  });

  it('should mark a zero surname count as no data', () => {
    expect(classifyRecord(raw(0, 50))).toMatchObject({ ratio: null, color: '#ffffff' });
  });

  it('should keep the raw fields and leave the input untouched', () => {
    const input = raw(40, 10);
    const record = classifyRecord(input);

    expect(record).toEqual({
      countryKey: 'testland',
      alpha3: 'TST',
      surnameCount: 40,
      forenameCount: 10,
      ratio: 0.25,
      color: '#3b7b80',
    });
    expect(input).toEqual(raw(40, 10));
  });
});

describe('classifyDataset', () => {
  it('should classify every record in order', () => {
    const records = classifyDataset([raw(100, 50), raw(null, 10), raw(10, 25)]);

    expect(records.map((r) => r.color)).toEqual(['#68999d', '#ffffff', '#db780b']);
    expect(records.map((r) => r.ratio)).toEqual([0.5, null, 2.5]);
  });
});
