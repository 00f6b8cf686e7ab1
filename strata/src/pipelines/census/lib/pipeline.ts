/**
 * County population preparation: fetch -> clean -> derive -> join -> write.
 *
 * All fetching and validation finish before the first artifact is written,
 * so a failed run leaves the previous artifacts untouched.
 */

import { join } from 'node:path';
import { adapterUrl, fetchSource } from '../../../core/fetcher.js';
import type { SourceCache } from '../../../core/cache.js';
import {
  getSources,
  COUNTY_BOUNDARIES_ID,
  ACS_POPULATION_ID,
  type SourceDefinition,
} from '../../../registry/sources.js';
import type { BoundaryFeature, CensusRow } from '../../../schemas/county.js';
import {
  parseCensusTable,
  isCensusRow,
  buildFips,
  TOTAL_POPULATION_VARIABLE,
} from './acs-parser.js';
import { parseBoundaryCollection, isBoundaryFeature, boundaryFips } from './boundaries.js';
import { cleanRows, derivePopulationRecords, summarizePopulation, type PopulationSummary } from './derive.js';
import { buildAttributeLookup, joinBoundaries } from './join.js';
import { writeFeatureCollection, writeCsv, writeJson } from './writers.js';
import type { PipelineOptions } from './options.js';

export const GEOJSON_FILE = 'counties.geojson';
export const CSV_FILE = 'counties.csv';
export const METADATA_FILE = 'metadata.json';

export interface PipelineResult {
  boundaryCount: number;
  censusRowCount: number;
  populationCount: number;
  matched: number;
  unmatched: number;
  summary: PopulationSummary | null;
  outputs: {
    geojson: string;
    csv: string;
    metadata: string;
  };
}

/**
 * Read a source from the cache when it is fresh, otherwise fetch, parse and
 * store it. `isRecord` guards what comes back out of SQLite.
 */
async function loadSource<T>(
  source: SourceDefinition,
  options: PipelineOptions,
  cache: SourceCache | null,
  parse: (raw: unknown) => T[],
  isRecord: (value: unknown) => value is T,
  recordId: (record: T, index: number) => string
): Promise<T[]> {
  const url = adapterUrl(source.api);

  if (cache && !options.refresh && !cache.needsRefresh(source.id, url, options.maxAgeHours)) {
    const meta = cache.getSourceMetadata(source.id);
    const cached = cache.getRecords(source.id);

    if (cached.every(isRecord)) {
      console.log(
        `       Using cached ${source.id} (${cached.length.toLocaleString()} records from ${meta?.lastFetched})`
      );
      return cached;
    }
    console.warn(`       Cached ${source.id} records are unreadable, fetching again`);
  }

  const result = await fetchSource(source.api, { timeoutMs: options.timeoutMs });
  const records = parse(result.data);

  cache?.replaceRecords(source.id, result.url, records, recordId);
  return records;
}

export async function runPipeline(
  options: PipelineOptions,
  cache: SourceCache | null
): Promise<PipelineResult> {
  const sources = getSources({ year: options.year, censusApiKey: options.censusApiKey });
  const boundarySource = sources[COUNTY_BOUNDARIES_ID];
  const populationSource = sources[ACS_POPULATION_ID];

  console.log('\n[1/5] Downloading US county boundaries...');
  const boundaries = await loadSource<BoundaryFeature>(
    boundarySource,
    options,
    cache,
    parseBoundaryCollection,
    isBoundaryFeature,
    (feature, i) => boundaryFips(feature) || `feature_${i}`
  );
  console.log(`       Loaded ${boundaries.length.toLocaleString()} county polygons`);

  console.log(`[2/5] Fetching ACS ${options.year} population data from Census Bureau...`);
  const censusRows = await loadSource<CensusRow>(
    populationSource,
    options,
    cache,
    (raw) => parseCensusTable(raw, TOTAL_POPULATION_VARIABLE),
    isCensusRow,
    (row) => buildFips(row)
  );

  const cleaned = cleanRows(censusRows);
  const summary = summarizePopulation(cleaned);
  console.log(`       Loaded ${cleaned.length.toLocaleString()} counties with valid population data`);
  if (cleaned.length < censusRows.length) {
    console.warn(`       Dropped ${censusRows.length - cleaned.length} rows without a positive population`);
  }
  if (summary) {
    console.log(`       Range: ${summary.min.toLocaleString()} - ${summary.max.toLocaleString()}`);
    console.log(`       Median: ${Math.round(summary.median).toLocaleString()}`);
  }

  console.log('[3/5] Computing derived fields...');
  console.log('[4/5] Computing quantile-based colors...');
  const records = derivePopulationRecords(cleaned);

  console.log('[5/5] Merging data into GeoJSON and saving...');
  const lookup = buildAttributeLookup(records);
  const joined = joinBoundaries(boundaries, lookup);
  console.log(`       Matched ${joined.matched.toLocaleString()} counties`);
  if (joined.unmatched.length > 0) {
    console.warn(`       ${joined.unmatched.length} boundaries had no population record`);
  }

  const outputs = {
    geojson: join(options.outputDir, GEOJSON_FILE),
    csv: join(options.outputDir, CSV_FILE),
    metadata: join(options.outputDir, METADATA_FILE),
  };

  await writeFeatureCollection(outputs.geojson, joined.features);
  console.log(`       Saved ${outputs.geojson}`);

  await writeCsv(outputs.csv, records);
  console.log(`       Saved ${outputs.csv}`);

  await writeJson(outputs.metadata, {
    name: 'US County Population',
    sources: [boundarySource, populationSource].map((s) => ({
      id: s.id,
      name: s.name,
      attribution: s.attribution,
      attributionUrl: s.attributionUrl,
      license: s.license,
      notes: s.notes,
    })),
    year: options.year,
    variable: TOTAL_POPULATION_VARIABLE,
    counts: {
      boundaries: boundaries.length,
      censusRows: censusRows.length,
      withPopulation: records.length,
      matched: joined.matched,
    },
    population: summary,
    generatedAt: new Date().toISOString(),
  });
  console.log(`       Saved ${outputs.metadata}`);

  return {
    boundaryCount: boundaries.length,
    censusRowCount: censusRows.length,
    populationCount: records.length,
    matched: joined.matched,
    unmatched: joined.unmatched.length,
    summary,
    outputs,
  };
}
