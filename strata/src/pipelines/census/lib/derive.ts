/**
 * Derived population fields: cleaning, log scale, percentile rank, color ramp.
 *
 * Everything here is a pure function of the cleaned Census table so a re-run
 * on identical inputs yields identical values.
 */

import type { CensusRow, PopulationRecord, RGBA } from '../../../schemas/county.js';
import { buildFips } from './acs-parser.js';

export interface CleanRow {
  fips: string;
  name: string;
  population: number;
}

const FILL_ALPHA = 200;
const BAND_WIDTH = 0.25;

/**
 * Numeric value of a raw Census cell, or NaN when it is not a number.
 * Blank cells are not numbers.
 */
export function toNumber(value: string): number {
  return value.trim() === '' ? NaN : Number(value);
}

/**
 * Keep rows whose statistic is numeric and strictly positive. The ACS
 * "no data" sentinel is negative, so it is dropped with the rest.
 */
export function cleanRows(rows: CensusRow[]): CleanRow[] {
  const cleaned: CleanRow[] = [];

  for (const row of rows) {
    const population = toNumber(row.value);
    if (!(population > 0)) continue;

    cleaned.push({
      fips: buildFips(row),
      name: row.name,
      population,
    });
  }

  return cleaned;
}

export function logPopulation(population: number): number {
  return Math.log10(population + 1);
}

/**
 * Percentile rank of every value: average rank for ties, divided by the
 * number of values. Output is in input order, each in (0, 1].
 */
export function percentRank(values: number[]): number[] {
  const n = values.length;
  const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b] || a - b);
  const ranks = new Array<number>(n);

  let start = 0;
  while (start < n) {
    let end = start;
    while (end + 1 < n && values[order[end + 1]] === values[order[start]]) {
      end++;
    }

    // 1-based positions start+1 .. end+1 share their mean
    const avg = (start + end + 2) / 2;
    for (let k = start; k <= end; k++) {
      ranks[order[k]] = avg / n;
    }
    start = end + 1;
  }

  return ranks;
}

/**
 * Map a percentile rank in [0, 1] onto the blue -> cyan -> green -> yellow -> red
 * ramp. Channels are truncated to integers.
 */
export function populationColor(t: number): RGBA {
  let r: number;
  let g: number;
  let b: number;

  if (t < 0.25) {
    const s = t / BAND_WIDTH;
    r = 30;
    g = 60 + 140 * s;
    b = 150 + 105 * s;
  } else if (t < 0.5) {
    const s = (t - 0.25) / BAND_WIDTH;
    r = 30 + 100 * s;
    g = 200 + 55 * s;
    b = 255 - 100 * s;
  } else if (t < 0.75) {
    const s = (t - 0.5) / BAND_WIDTH;
    r = 130 + 125 * s;
    g = 255 - 55 * s;
    b = 155 - 105 * s;
  } else {
    const s = (t - 0.75) / BAND_WIDTH;
    r = 255;
    g = 200 - 130 * s;
    b = 50 - 50 * s;
  }

  return [Math.trunc(r), Math.trunc(g), Math.trunc(b), FILL_ALPHA];
}

export function formatPopulation(population: number): string {
  return Math.trunc(population).toLocaleString('en-US');
}

/** Round to a fixed number of decimals; halves round up. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Compute every derived field for the cleaned table.
 */
export function derivePopulationRecords(rows: CleanRow[]): PopulationRecord[] {
  const quantiles = percentRank(rows.map((r) => r.population));

  return rows.map((row, i) => ({
    fips: row.fips,
    name: row.name,
    population: Math.trunc(row.population),
    populationFormatted: formatPopulation(row.population),
    logPop: logPopulation(row.population),
    quantile: quantiles[i],
    fillColor: populationColor(quantiles[i]),
  }));
}

export interface PopulationSummary {
  count: number;
  min: number;
  max: number;
  median: number;
}

export function summarizePopulation(records: Pick<PopulationRecord, 'population'>[]): PopulationSummary | null {
  if (records.length === 0) return null;

  const sorted = records.map((r) => r.population).sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];

  return {
    count: sorted.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    median,
  };
}
