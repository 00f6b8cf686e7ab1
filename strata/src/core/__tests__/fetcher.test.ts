/**
 * Unit tests for the data fetcher.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  fetchJson,
  fetchSource,
  buildCensusUrl,
  createCensusFetcher,
  createGeoJSONFetcher,
  FetchError,
} from '../fetcher.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// Helper functions
// ============================================================================

function mockJsonResponse<T>(data: T): Response {
  return new Response(JSON.stringify(data), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function mockErrorResponse(status: number, message: string): Response {
  return new Response(message, { status });
}

// ============================================================================
// Census URL
// ============================================================================

describe('buildCensusUrl', () => {
  it('builds the county population query', () => {
    const config = createCensusFetcher(2024, ['NAME', 'B01003_001E']);

    expect(buildCensusUrl(config)).toBe(
      'https://api.census.gov/data/2024/acs/acs5?get=NAME,B01003_001E&for=county:*&in=state:*'
    );
  });

  it('appends the API key when given', () => {
    const config = createCensusFetcher(2022, ['NAME', 'B01003_001E'], 'test-key');

    expect(buildCensusUrl(config)).toBe(
      'https://api.census.gov/data/2022/acs/acs5?get=NAME,B01003_001E&for=county:*&in=state:*&key=test-key'
    );
  });

  it('omits the parent geography when not set', () => {
    const config = { ...createCensusFetcher(2024, ['NAME']), for: 'state:*', in: undefined };

    expect(buildCensusUrl(config)).toBe(
      'https://api.census.gov/data/2024/acs/acs5?get=NAME&for=state:*'
    );
  });
});

// ============================================================================
// fetchJson
// ============================================================================

describe('fetchJson', () => {
  it('returns the parsed body', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse([['NAME'], ['Test County']]));

    const data = await fetchJson('https://example.com/data.json');

    expect(data).toEqual([['NAME'], ['Test County']]);
    expect(mockFetch.mock.calls[0][0]).toBe('https://example.com/data.json');
  });

  it('passes an abort signal for the timeout', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse({}));

    await fetchJson('https://example.com/data.json', { timeoutMs: 5000 });

    const init = mockFetch.mock.calls[0][1] as RequestInit;
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('throws FetchError with the status on non-2xx responses', async () => {
    mockFetch.mockResolvedValueOnce(mockErrorResponse(503, 'Service Unavailable'));

    const error = await fetchJson('https://example.com/data.json').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect((error as FetchError).status).toBe(503);
    expect((error as FetchError).message).toBe('HTTP 503: Service Unavailable');
    expect((error as FetchError).url).toBe('https://example.com/data.json');
  });

  it('does not retry', async () => {
    mockFetch.mockResolvedValue(mockErrorResponse(500, 'Internal Server Error'));

    await expect(fetchJson('https://example.com/data.json')).rejects.toThrow(FetchError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('wraps transport errors', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(fetchJson('https://example.com/data.json')).rejects.toThrow(
      'Request failed: fetch failed'
    );
  });

  it('rejects bodies that are not JSON', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

    await expect(fetchJson('https://example.com/data.json')).rejects.toThrow(/^Invalid JSON body/);
  });
});

// ============================================================================
// fetchSource
// ============================================================================

describe('fetchSource', () => {
  it('fetches a GeoJSON source from its url', async () => {
    const collection = { type: 'FeatureCollection', features: [] };
    mockFetch.mockResolvedValueOnce(mockJsonResponse(collection));

    const result = await fetchSource(createGeoJSONFetcher('https://example.com/counties.json'));

    expect(result).toEqual({
      data: collection,
      url: 'https://example.com/counties.json',
    });
  });

  it('fetches a Census source from its built url', async () => {
    mockFetch.mockResolvedValueOnce(mockJsonResponse([['NAME']]));

    const result = await fetchSource(createCensusFetcher(2024, ['NAME']));

    expect(result.url).toBe(
      'https://api.census.gov/data/2024/acs/acs5?get=NAME&for=county:*&in=state:*'
    );
    expect(mockFetch.mock.calls[0][0]).toBe(result.url);
  });
});
