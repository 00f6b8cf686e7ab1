/**
 * County boundary collection parsing.
 */

import type { BoundaryFeature } from '../../../schemas/county.js';
import { MalformedResponseError } from './errors.js';
import { isRecord } from './guards.js';

export const COUNTY_BOUNDARIES_URL =
  'https://raw.githubusercontent.com/plotly/datasets/master/geojson-counties-fips.json';

export function isBoundaryFeature(value: unknown): value is BoundaryFeature {
  return (
    isRecord(value) &&
    value.type === 'Feature' &&
    typeof value.properties === 'object' &&
    typeof value.geometry === 'object'
  );
}

/**
 * Pull the feature list out of a boundary FeatureCollection.
 */
export function parseBoundaryCollection(raw: unknown): BoundaryFeature[] {
  if (!isRecord(raw)) {
    throw new MalformedResponseError('boundary', 'expected a GeoJSON object');
  }

  if (raw.type !== 'FeatureCollection' || !Array.isArray(raw.features)) {
    throw new MalformedResponseError('boundary', 'expected a FeatureCollection with a features array');
  }

  const features: unknown[] = raw.features;
  const badIndex = features.findIndex((f) => !isBoundaryFeature(f));
  if (badIndex !== -1) {
    throw new MalformedResponseError('boundary', `features[${badIndex}] is not a GeoJSON Feature`);
  }

  return features.filter(isBoundaryFeature);
}

/**
 * County FIPS for a boundary feature: the feature id when set, otherwise the
 * last 5 characters of properties.GEO_ID (e.g. "0500000US06037" -> "06037").
 * Returns an empty string when neither is present.
 */
export function boundaryFips(feature: BoundaryFeature): string {
  if (feature.id !== undefined && feature.id !== '') {
    return String(feature.id);
  }

  const geoId = feature.properties?.GEO_ID;
  return typeof geoId === 'string' ? geoId.slice(-5) : '';
}
