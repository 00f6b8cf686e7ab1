import type { Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';

/** RGBA, 0-255 per channel */
export type RGBA = [number, number, number, number];

/** One row of the Census table after header mapping. Values are raw strings. */
export interface CensusRow {
  name: string;
  state: string;   // 2-digit state FIPS
  county: string;  // 3-digit county FIPS
  value: string;   // statistic, as returned
}

export interface PopulationRecord {
  fips: string;            // state + county, e.g. "06037"
  name: string;            // "Los Angeles County, California"
  population: number;
  populationFormatted: string;
  logPop: number;          // log10(population + 1)
  quantile: number;        // percentile rank in (0, 1]
  fillColor: RGBA;
}

/** Attributes attached to each matched boundary feature */
export interface CountyAttributes {
  population: number;
  populationFormatted: string;
  logPop: number;
  quantile: number;
  fillColor: RGBA;
  countyName: string;
  fips: string;
}

export type BoundaryFeature = Feature<Geometry, GeoJsonProperties>;

export type CountyFeature = Feature<Geometry, Record<string, unknown> & CountyAttributes>;

export interface CountyFeatureCollection extends FeatureCollection<Geometry, Record<string, unknown> & CountyAttributes> {
  features: CountyFeature[];
}
