/**
 * Single-request data fetcher with adapter configs for the upstream APIs.
 * Supports plain GeoJSON downloads and the Census Bureau data API.
 */

// ============================================================================
// Types
// ============================================================================

export interface FetchResult<T> {
  data: T;
  url: string;
}

export interface FetcherOptions {
  /** Request timeout in ms (default: 60s) */
  timeoutMs?: number;
}

export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * GET a URL and parse the body as JSON. Transport errors, timeouts, non-2xx
 * statuses and non-JSON bodies all surface as FetchError. No retries.
 */
export async function fetchJson(
  url: string,
  options: FetcherOptions = {}
): Promise<unknown> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  let res: Response;
  try {
    res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Request failed: ${message}`, url);
  }

  if (!res.ok) {
    throw new FetchError(`HTTP ${res.status}: ${await res.text()}`, url, res.status);
  }

  try {
    return (await res.json()) as unknown;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Invalid JSON body: ${message}`, url, res.status);
  }
}

// ============================================================================
// GeoJSON Adapter
// ============================================================================

export interface GeoJSONConfig {
  type: 'geojson';
  url: string;
}

// ============================================================================
// Census Adapter
// ============================================================================

export interface CensusConfig {
  type: 'census';
  /** e.g. https://api.census.gov/data */
  baseUrl: string;
  year: number;
  /** e.g. acs/acs5 */
  dataset: string;
  variables: string[];
  /** Geography predicate, e.g. county:* */
  for: string;
  /** Parent geography predicate, e.g. state:* */
  in?: string;
  key?: string;
}

export function buildCensusUrl(config: CensusConfig): string {
  const params = new URLSearchParams({
    get: config.variables.join(','),
    for: config.for,
  });

  if (config.in) {
    params.set('in', config.in);
  }
  if (config.key) {
    params.set('key', config.key);
  }

  // The Census API wants literal `*` and `:` in predicates
  const query = params.toString().replace(/%2A/g, '*').replace(/%3A/g, ':').replace(/%2C/g, ',');
  return `${config.baseUrl}/${config.year}/${config.dataset}?${query}`;
}

// ============================================================================
// Unified Fetcher
// ============================================================================

export type AdapterConfig = GeoJSONConfig | CensusConfig;

export function adapterUrl(config: AdapterConfig): string {
  return config.type === 'census' ? buildCensusUrl(config) : config.url;
}

export async function fetchSource(
  config: AdapterConfig,
  options: FetcherOptions = {}
): Promise<FetchResult<unknown>> {
  const url = adapterUrl(config);
  const data = await fetchJson(url, options);

  return {
    data,
    url,
  };
}

// ============================================================================
// Convenience Helpers
// ============================================================================

export function createGeoJSONFetcher(url: string): GeoJSONConfig {
  return {
    type: 'geojson',
    url,
  };
}

export function createCensusFetcher(
  year: number,
  variables: string[],
  key?: string
): CensusConfig {
  return {
    type: 'census',
    baseUrl: 'https://api.census.gov/data',
    year,
    dataset: 'acs/acs5',
    variables,
    for: 'county:*',
    in: 'state:*',
    key,
  };
}
