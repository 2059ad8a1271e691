import { describe, expect, test, vi } from 'vitest';
import {
  GeocodingResolver,
  type FetchFn,
  NominatimGeocodingProvider,
} from '../../services/geocoding';
import { GeocodingNotFoundError, GeocodingTransientError } from '../../utils/errors';
import { createMention, getTestKnowledge, noSleep } from '../helpers';

const HIT = [
  {
    lat: '35.6947',
    lon: '139.9825',
    display_name: '船橋市, 千葉県, 日本',
    importance: 0.6,
  },
];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createProvider(fetchFn: FetchFn, timeoutMs = 1000) {
  return new NominatimGeocodingProvider({
    baseUrl: 'https://nominatim.test/',
    userAgent: 'place-tests/1.0',
    timeoutMs,
    fetchFn,
  });
}

describe('NominatimGeocodingProvider', () => {
  test('builds a Japan-restricted search URL with the region hint', () => {
    const provider = createProvider(vi.fn<FetchFn>());

    const url = new URL(provider.buildUrl({ placeName: '柏', regionHint: '千葉県柏市' }));

    expect(url.origin + url.pathname).toBe('https://nominatim.test/search');
    expect(url.searchParams.get('q')).toBe('柏 千葉県柏市');
    expect(url.searchParams.get('countrycodes')).toBe('jp');
    expect(url.searchParams.get('format')).toBe('jsonv2');
    expect(url.searchParams.get('limit')).toBe('1');
  });

  test('returns the first hit', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse(HIT));

    const result = await createProvider(fetchFn).geocode({
      placeName: '船橋市',
      regionHint: null,
    });

    expect(result).toEqual({
      canonicalName: '船橋市, 千葉県, 日本',
      latitude: 35.6947,
      longitude: 139.9825,
      confidence: 0.85,
    });
    const init = fetchFn.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ 'User-Agent': 'place-tests/1.0', Accept: 'application/json' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  test('reports not-found for an empty result', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse([]));

    await expect(
      createProvider(fetchFn).geocode({ placeName: '真崎村', regionHint: null })
    ).rejects.toBeInstanceOf(GeocodingNotFoundError);
  });

  test('reports not-found for a client error', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ error: 'bad' }, 400));

    await expect(
      createProvider(fetchFn).geocode({ placeName: '船橋市', regionHint: null })
    ).rejects.toThrow('No geocoding match for "船橋市"');
  });

  test('times out while the body is still streaming', async () => {
    const fetchFn = vi.fn<FetchFn>(async (_input, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          init.signal?.addEventListener('abort', () => {
            controller.error(new Error('body aborted'));
          });
        },
      });
      return new Response(body, { status: 200 });
    });

    await expect(
      createProvider(fetchFn, 20).geocode({ placeName: '船橋市', regionHint: null })
    ).rejects.toThrow('Nominatim response could not be read: body aborted');
  });

  test('raises a transient error for a server error', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({}, 503));

    const failure = createProvider(fetchFn).geocode({ placeName: '船橋市', regionHint: null });

    await expect(failure).rejects.toBeInstanceOf(GeocodingTransientError);
    await expect(failure).rejects.toMatchObject({ httpStatus: 503 });
  });

  test('raises a transient error when the request fails', async () => {
    const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new Error('socket hang up'));

    await expect(
      createProvider(fetchFn).geocode({ placeName: '船橋市', regionHint: null })
    ).rejects.toThrow('Nominatim request failed: socket hang up');
  });

  test('raises a transient error for an unexpected payload', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ results: [] }));

    await expect(
      createProvider(fetchFn).geocode({ placeName: '船橋市', regionHint: null })
    ).rejects.toBeInstanceOf(GeocodingTransientError);
  });

  test('is retried by the resolver after a server error', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse(HIT));
    const resolver = new GeocodingResolver(getTestKnowledge(), {
      provider: createProvider(fetchFn),
      requestDelayMs: 0,
      retry: { attempts: 3, baseDelayMs: 1 },
      sleep: noSleep,
    });

    const record = await resolver.resolve(createMention());

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(record.resolutionSource).toBe('nominatim_with_context');
    expect(record.confidence).toBeCloseTo(0.765);
  });
});
