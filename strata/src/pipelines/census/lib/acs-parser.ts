/**
 * Census Bureau data API response parser.
 *
 * The API answers with a JSON array of string arrays: the first row is the
 * header (requested variables followed by the geography columns), the rest
 * are data rows.
 */

import type { CensusRow } from '../../../schemas/county.js';
import { MalformedResponseError } from './errors.js';
import { isRecord } from './guards.js';

/** ACS table B01003, Total Population */
export const TOTAL_POPULATION_VARIABLE = 'B01003_001E';

/** Value the ACS uses when an estimate is not available */
export const MISSING_VALUE_SENTINEL = '-666666666';

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}

/**
 * Map a raw ACS table onto CensusRow objects.
 * Throws MalformedResponseError when the header or any row is unusable.
 */
export function parseCensusTable(raw: unknown, variable: string): CensusRow[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new MalformedResponseError('Census', 'expected a non-empty array of rows');
  }

  const [header, ...rows]: unknown[] = raw;
  if (!isStringRow(header)) {
    throw new MalformedResponseError('Census', 'header row is not an array of strings');
  }

  const nameIdx = header.indexOf('NAME');
  const valueIdx = header.indexOf(variable);
  const stateIdx = header.indexOf('state');
  const countyIdx = header.indexOf('county');

  const columns: Array<[string, number]> = [
    ['NAME', nameIdx],
    [variable, valueIdx],
    ['state', stateIdx],
    ['county', countyIdx],
  ];
  const missing = columns
    .filter(([, idx]) => idx === -1)
    .map(([column]) => column);

  if (missing.length > 0) {
    throw new MalformedResponseError('Census', `header is missing ${missing.join(', ')}`);
  }

  return rows.map((row, i) => {
    if (!isStringRow(row) || row.length !== header.length) {
      throw new MalformedResponseError(
        'Census',
        `row ${i + 1} does not match the ${header.length}-column header`
      );
    }

    return {
      name: row[nameIdx],
      state: row[stateIdx],
      county: row[countyIdx],
      value: row[valueIdx],
    };
  });
}

/**
 * Validate rows read back from the cache (same shape as parseCensusTable output).
 */
export function isCensusRow(value: unknown): value is CensusRow {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.state === 'string' &&
    typeof value.county === 'string' &&
    typeof value.value === 'string'
  );
}

/** Concatenate the 2-digit state and 3-digit county codes. */
export function buildFips(row: Pick<CensusRow, 'state' | 'county'>): string {
  return row.state + row.county;
}
