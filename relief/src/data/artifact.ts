/**
 * Loading and validation of the prepared county artifact.
 */
import type { CountyCollection, CountyFeature } from '../types/county';

export class ArtifactError extends Error {
  constructor(message: string, readonly url: string) {
    super(message);
    this.name = 'ArtifactError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRgba(value: unknown): boolean {
  return (
    Array.isArray(value) &&
    value.length === 4 &&
    value.every((channel) => typeof channel === 'number' && Number.isInteger(channel) && channel >= 0 && channel <= 255)
  );
}

export function isCountyFeature(value: unknown): value is CountyFeature {
  if (!isRecord(value) || value.type !== 'Feature') return false;

  const { properties, geometry } = value;
  if (!isRecord(geometry) || (geometry.type !== 'Polygon' && geometry.type !== 'MultiPolygon')) {
    return false;
  }

  return (
    isRecord(properties) &&
    typeof properties.fips === 'string' &&
    properties.fips.length === 5 &&
    typeof properties.countyName === 'string' &&
    typeof properties.population === 'number' &&
    properties.population > 0 &&
    typeof properties.populationFormatted === 'string' &&
    typeof properties.logPop === 'number' &&
    typeof properties.quantile === 'number' &&
    isRgba(properties.fillColor)
  );
}

/**
 * Check that a parsed artifact is a FeatureCollection of prepared counties.
 * Any bad feature fails the whole artifact.
 */
export function parseCountyCollection(raw: unknown, url: string): CountyCollection {
  if (!isRecord(raw) || raw.type !== 'FeatureCollection' || !Array.isArray(raw.features)) {
    throw new ArtifactError(`${url} is not a GeoJSON FeatureCollection`, url);
  }

  const features: unknown[] = raw.features;
  const badIndex = features.findIndex((f) => !isCountyFeature(f));
  if (badIndex !== -1) {
    throw new ArtifactError(`${url}: feature ${badIndex} is missing prepared county properties`, url);
  }

  return {
    type: 'FeatureCollection',
    features: features.filter(isCountyFeature),
  };
}

export async function fetchCountyCollection(url: string): Promise<CountyCollection> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new ArtifactError(`Failed to load ${url}: ${response.status}`, url);
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    throw new ArtifactError(`Failed to parse ${url}`, url);
  }

  return parseCountyCollection(json, url);
}

export interface ArtifactLoader {
  url: string;
  /** First call fetches; later calls share the same promise */
  load(): Promise<CountyCollection>;
}

/**
 * Memoized loader. Each app session owns one, so the artifact is read once
 * per session and never shared across sessions.
 */
export function createArtifactLoader(
  url: string,
  fetchCollection: (url: string) => Promise<CountyCollection> = fetchCountyCollection
): ArtifactLoader {
  let pending: Promise<CountyCollection> | null = null;

  return {
    url,
    load() {
      if (!pending) {
        pending = fetchCollection(url);
      }
      return pending;
    },
  };
}
