/**
 * Unit tests for derived population fields.
 */
import { describe, it, expect } from 'vitest';
import { MISSING_VALUE_SENTINEL } from '../lib/acs-parser.js';
import {
  toNumber,
  cleanRows,
  logPopulation,
  percentRank,
  populationColor,
  formatPopulation,
  roundTo,
  derivePopulationRecords,
  summarizePopulation,
} from '../lib/derive.js';
import type { CensusRow } from '../../../schemas/county.js';

function censusRow(state: string, county: string, value: string, name = 'Test County, Somewhere'): CensusRow {
  return { name, state, county, value };
}

// ============================================================================
// Cleaning
// ============================================================================

describe('Cleaning', () => {
  describe('toNumber', () => {
    it('parses integer strings', () => {
      expect(toNumber('10014009')).toBe(10014009);
    });

    it('returns NaN for blank and non-numeric cells', () => {
      expect(toNumber('')).toBeNaN();
      expect(toNumber('  ')).toBeNaN();
      expect(toNumber('N/A')).toBeNaN();
    });
  });

  describe('cleanRows', () => {
    it('builds the 5-character FIPS from state and county', () => {
      const [row] = cleanRows([censusRow('06', '037', '100')]);
      expect(row.fips).toBe('06037');
    });

    it('drops the missing-data sentinel', () => {
      const cleaned = cleanRows([
        censusRow('06', '037', '100'),
        censusRow('06', '073', MISSING_VALUE_SENTINEL),
      ]);

      expect(cleaned.map((r) => r.fips)).toEqual(['06037']);
    });

    it('drops zero, negative and non-numeric values', () => {
      const cleaned = cleanRows([
        censusRow('01', '001', '0'),
        censusRow('01', '003', '-5'),
        censusRow('01', '005', 'null'),
        censusRow('01', '007', ''),
        censusRow('01', '009', '42'),
      ]);

      expect(cleaned).toEqual([{ fips: '01009', name: 'Test County, Somewhere', population: 42 }]);
    });

    it('keeps input order', () => {
      const cleaned = cleanRows([
        censusRow('06', '073', '3'),
        censusRow('01', '001', '1'),
        censusRow('06', '037', '2'),
      ]);

      expect(cleaned.map((r) => r.fips)).toEqual(['06073', '01001', '06037']);
    });
  });
});

// ============================================================================
// Log scale
// ============================================================================

describe('logPopulation', () => {
  it('is log10(p + 1)', () => {
    expect(logPopulation(9)).toBe(1);
    expect(logPopulation(99)).toBe(2);
    expect(logPopulation(999999)).toBeCloseTo(6, 12);
  });

  it('is increasing in population', () => {
    const populations = [1, 2, 10, 500, 82_000, 3_000_000, 10_000_000];
    const logs = populations.map(logPopulation);

    for (let i = 1; i < logs.length; i++) {
      expect(logs[i]).toBeGreaterThan(logs[i - 1]);
    }
  });
});

// ============================================================================
// Rank
// ============================================================================

describe('percentRank', () => {
  it('ranks distinct values by position over n', () => {
    expect(percentRank([30, 10, 20, 40])).toEqual([0.75, 0.25, 0.5, 1]);
  });

  it('averages ties', () => {
    expect(percentRank([10, 20, 20, 30])).toEqual([0.25, 0.625, 0.625, 1]);
  });

  it('gives every tied value the average rank', () => {
    expect(percentRank([5, 5, 5])).toEqual([2 / 3, 2 / 3, 2 / 3]);
  });

  it('gives 1 to a single value', () => {
    expect(percentRank([123])).toEqual([1]);
  });

  it('returns an empty list for no values', () => {
    expect(percentRank([])).toEqual([]);
  });

  it('stays in (0, 1] and never decreases with population', () => {
    const values = [812, 5, 44_000, 5, 1_200_000, 19, 812, 3];
    const ranks = percentRank(values);

    for (const r of ranks) {
      expect(r).toBeGreaterThan(0);
      expect(r).toBeLessThanOrEqual(1);
    }
    for (let i = 0; i < values.length; i++) {
      for (let j = 0; j < values.length; j++) {
        if (values[i] > values[j]) expect(ranks[i]).toBeGreaterThan(ranks[j]);
        if (values[i] === values[j]) expect(ranks[i]).toBe(ranks[j]);
      }
    }
  });
});

// ============================================================================
// Color ramp
// ============================================================================

describe('populationColor', () => {
  it('hits the band boundary colors', () => {
    expect(populationColor(0)).toEqual([30, 60, 150, 200]);
    expect(populationColor(0.25)).toEqual([30, 200, 255, 200]);
    expect(populationColor(0.5)).toEqual([130, 255, 155, 200]);
    expect(populationColor(0.75)).toEqual([255, 200, 50, 200]);
    expect(populationColor(1)).toEqual([255, 70, 0, 200]);
  });

  it('interpolates within each band and truncates channels', () => {
    expect(populationColor(0.125)).toEqual([30, 130, 202, 200]);
    expect(populationColor(0.375)).toEqual([80, 227, 205, 200]);
    expect(populationColor(0.625)).toEqual([192, 227, 102, 200]);
    expect(populationColor(0.875)).toEqual([255, 135, 25, 200]);
  });

  it('keeps alpha fixed', () => {
    for (const t of [0, 0.1, 0.3, 0.6, 0.9, 1]) {
      expect(populationColor(t)[3]).toBe(200);
    }
  });
});

// ============================================================================
// Formatting
// ============================================================================

describe('formatPopulation', () => {
  it('adds thousands separators', () => {
    expect(formatPopulation(10_000_000)).toBe('10,000,000');
    expect(formatPopulation(3_298_634)).toBe('3,298,634');
    expect(formatPopulation(64)).toBe('64');
  });
});

describe('roundTo', () => {
  it('rounds to the given decimals', () => {
    expect(roundTo(6.477121254719662, 4)).toBe(6.4771);
    expect(roundTo(0.33333, 4)).toBe(0.3333);
    expect(roundTo(1, 4)).toBe(1);
  });
});

// ============================================================================
// Records
// ============================================================================

describe('derivePopulationRecords', () => {
  it('computes every field', () => {
    const records = derivePopulationRecords([
      { fips: '06037', name: 'Los Angeles County, California', population: 10_000_000 },
      { fips: '06073', name: 'San Diego County, California', population: 3_000_000 },
    ]);

    expect(records[0]).toEqual({
      fips: '06037',
      name: 'Los Angeles County, California',
      population: 10_000_000,
      populationFormatted: '10,000,000',
      logPop: Math.log10(10_000_001),
      quantile: 1,
      fillColor: [255, 70, 0, 200],
    });
    expect(records[1].quantile).toBe(0.5);
    expect(records[1].fillColor).toEqual([130, 255, 155, 200]);
  });

  it('yields identical fields on identical input', () => {
    const rows = [
      { fips: '01001', name: 'A', population: 58_000 },
      { fips: '01003', name: 'B', population: 233_000 },
      { fips: '01005', name: 'C', population: 25_000 },
    ];

    expect(derivePopulationRecords(rows)).toEqual(derivePopulationRecords(rows));
  });
});

describe('summarizePopulation', () => {
  it('returns min, max and median', () => {
    expect(
      summarizePopulation([{ population: 5 }, { population: 1 }, { population: 9 }, { population: 3 }])
    ).toEqual({ count: 4, min: 1, max: 9, median: 4 });
  });

  it('returns null for an empty table', () => {
    expect(summarizePopulation([])).toBeNull();
  });
});
