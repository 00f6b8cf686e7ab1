export { fetchJson, fetchSource, buildCensusUrl, FetchError } from './core/fetcher.js';
export type { AdapterConfig, CensusConfig, GeoJSONConfig, FetchResult } from './core/fetcher.js';

export { SourceCache, openCache } from './core/cache.js';
export type { SourceMetadata } from './core/cache.js';

export {
  cleanRows,
  logPopulation,
  percentRank,
  populationColor,
  formatPopulation,
  derivePopulationRecords,
} from './pipelines/census/lib/derive.js';
export { buildAttributeLookup, joinBoundaries } from './pipelines/census/lib/join.js';
export { parseCensusTable, buildFips } from './pipelines/census/lib/acs-parser.js';
export { parseBoundaryCollection, boundaryFips } from './pipelines/census/lib/boundaries.js';
export { MalformedResponseError } from './pipelines/census/lib/errors.js';
export { runPipeline } from './pipelines/census/lib/pipeline.js';
export type { PipelineResult } from './pipelines/census/lib/pipeline.js';
export { parseArgs } from './pipelines/census/lib/options.js';
export type { PipelineOptions } from './pipelines/census/lib/options.js';

export type {
  RGBA,
  CensusRow,
  PopulationRecord,
  CountyAttributes,
  CountyFeature,
  CountyFeatureCollection,
} from './schemas/county.js';
