/**
 * Artifact writers. Every write truncates the target file.
 */

import { open, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CountyFeature, PopulationRecord } from '../../../schemas/county.js';

export const CSV_COLUMNS = [
  'fips',
  'name',
  'population',
  'populationFormatted',
  'logPop',
  'quantile',
] as const;

/**
 * Stream a FeatureCollection to disk one feature at a time to stay clear of
 * string length limits on the full collection.
 */
export async function writeFeatureCollection(
  outputPath: string,
  features: CountyFeature[]
): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  const file = await open(outputPath, 'w');

  try {
    await file.write('{"type":"FeatureCollection","features":[');
    for (let i = 0; i < features.length; i++) {
      if (i > 0) await file.write(',');
      await file.write(JSON.stringify(features[i]));
    }
    await file.write(']}');
  } finally {
    await file.close();
  }
}

/** Quote a CSV field when it holds a comma, quote or line break (RFC 4180). */
export function csvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(records: PopulationRecord[]): string {
  const lines = [CSV_COLUMNS.join(',')];

  for (const record of records) {
    lines.push(CSV_COLUMNS.map((column) => csvField(record[column])).join(','));
  }

  return lines.join('\n') + '\n';
}

export async function writeCsv(outputPath: string, records: PopulationRecord[]): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, toCsv(records));
}

export async function writeJson(outputPath: string, value: unknown): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, JSON.stringify(value, null, 2));
}
