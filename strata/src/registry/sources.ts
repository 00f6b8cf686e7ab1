/**
 * Source registry for the county population pipeline.
 * Defines API endpoints and attribution for each upstream dataset.
 */
import {
  createCensusFetcher,
  createGeoJSONFetcher,
  type AdapterConfig,
} from '../core/fetcher.js';
import { COUNTY_BOUNDARIES_URL } from '../pipelines/census/lib/boundaries.js';
import { TOTAL_POPULATION_VARIABLE } from '../pipelines/census/lib/acs-parser.js';

// ============================================================================
// Types
// ============================================================================

export interface SourceDefinition {
  id: string;
  name: string;

  /** API configuration for fetching */
  api: AdapterConfig;

  /** Source attribution */
  attribution: string;
  attributionUrl: string;

  /** License type */
  license?: string;

  /** Notes about data quality or limitations */
  notes?: string;
}

export interface SourceOptions {
  /** ACS 5-year vintage */
  year: number;
  /** Census API key (optional for low request volumes) */
  censusApiKey?: string;
}

// ============================================================================
// Sources
// ============================================================================

export const COUNTY_BOUNDARIES_ID = 'county-boundaries';
export const ACS_POPULATION_ID = 'acs-population';

export function countyBoundariesSource(): SourceDefinition {
  return {
    id: COUNTY_BOUNDARIES_ID,
    name: 'US County Boundaries (20m)',
    api: createGeoJSONFetcher(COUNTY_BOUNDARIES_URL),
    attribution: 'US Census Bureau cartographic boundaries via Plotly datasets',
    attributionUrl: 'https://github.com/plotly/datasets',
    notes: 'Feature id is the 5-digit county FIPS; properties.GEO_ID ends with it.',
  };
}

export function acsPopulationSource(options: SourceOptions): SourceDefinition {
  return {
    id: ACS_POPULATION_ID,
    name: `ACS ${options.year} 5-Year Total Population (${TOTAL_POPULATION_VARIABLE})`,
    api: createCensusFetcher(
      options.year,
      ['NAME', TOTAL_POPULATION_VARIABLE],
      options.censusApiKey
    ),
    attribution: 'US Census Bureau, American Community Survey 5-Year Estimates',
    attributionUrl: 'https://www.census.gov/data/developers/data-sets/acs-5year.html',
    license: 'Public domain',
    notes: 'Estimates that are not available are reported as -666666666.',
  };
}

// ============================================================================
// Registry
// ============================================================================

export function getSources(options: SourceOptions): Record<string, SourceDefinition> {
  return {
    [COUNTY_BOUNDARIES_ID]: countyBoundariesSource(),
    [ACS_POPULATION_ID]: acsPopulationSource(options),
  };
}
