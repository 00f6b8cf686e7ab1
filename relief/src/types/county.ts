import type { Feature, FeatureCollection, Polygon, MultiPolygon } from 'geojson';

/** RGBA, 0-255 per channel */
export type RGBA = [number, number, number, number];

/** Properties the preparation pipeline attaches to every county */
export interface CountyProperties {
  fips: string;
  countyName: string;
  population: number;
  populationFormatted: string;
  logPop: number;
  quantile: number;
  fillColor: RGBA;
  [key: string]: unknown;
}

export type CountyFeature = Feature<Polygon | MultiPolygon, CountyProperties>;

export type CountyCollection = FeatureCollection<Polygon | MultiPolygon, CountyProperties>;

export type BaseMapStyle = 'dark' | 'light' | 'satellite' | 'road';

/** Everything the sidebar controls; purely visual */
export interface ViewSettings {
  elevationScale: number;
  pitch: number;
  opacity: number;
  baseMap: BaseMapStyle;
  wireframe: boolean;
}
