/**
 * OpenStreetMap Nominatim search, restricted to Japan.
 */

import { z } from 'zod';
import { env } from '../../../config/env';
import {
  GeocodingNotFoundError,
  GeocodingTransientError,
  toErrorMessage,
} from '../../../utils/errors';
import { logger } from '../../../utils/logger';
import type { GeocodeQuery, ProviderResult } from '../geocoding.types';
import type { ExternalGeocodingProvider } from '../provider.interface';

const nominatimRowSchema = z.object({
  lat: z.string(),
  lon: z.string(),
  display_name: z.string(),
  importance: z.number().optional(),
});

const nominatimResponseSchema = z.array(nominatimRowSchema);

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface NominatimOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  countryCodes?: string;
  /** Confidence reported for every hit */
  confidence?: number;
  fetchFn?: FetchFn;
}

export const shouldRetryHttpStatus = (httpStatus: number): boolean =>
  httpStatus === 408 || httpStatus === 429 || httpStatus >= 500;

export class NominatimGeocodingProvider implements ExternalGeocodingProvider {
  readonly name = 'nominatim';

  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly countryCodes: string;
  private readonly confidence: number;
  private readonly fetchFn: FetchFn;

  constructor(options?: NominatimOptions) {
    this.baseUrl = (options?.baseUrl ?? env.NOMINATIM_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options?.userAgent ?? env.GEOCODER_USER_AGENT;
    this.timeoutMs = options?.timeoutMs ?? env.GEOCODER_TIMEOUT_MS;
    this.countryCodes = options?.countryCodes ?? 'jp';
    this.confidence = options?.confidence ?? 0.85;
    this.fetchFn = options?.fetchFn ?? ((input, init) => fetch(input, init));
  }

  buildUrl(query: GeocodeQuery): string {
    const url = new URL(`${this.baseUrl}/search`);
    const q = query.regionHint ? `${query.placeName} ${query.regionHint}` : query.placeName;
    url.searchParams.set('q', q);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('limit', '1');
    url.searchParams.set('countrycodes', this.countryCodes);
    url.searchParams.set('accept-language', 'ja');
    return url.toString();
  }

  async geocode(query: GeocodeQuery): Promise<ProviderResult> {
    const url = this.buildUrl(query);
    const { status, body } = await this.fetchJsonWithTimeout(url);

    if (shouldRetryHttpStatus(status)) {
      throw new GeocodingTransientError(`Nominatim responded with HTTP ${status}`, status);
    }
    if (status < 200 || status >= 300) {
      logger.warn({ status, placeName: query.placeName }, 'Nominatim rejected query');
      throw new GeocodingNotFoundError(query.placeName);
    }

    const parsed = nominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeocodingTransientError('Nominatim returned an unexpected payload', status);
    }

    const [row] = parsed.data;
    if (!row) {
      throw new GeocodingNotFoundError(query.placeName);
    }

    const latitude = Number.parseFloat(row.lat);
    const longitude = Number.parseFloat(row.lon);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new GeocodingNotFoundError(query.placeName);
    }

    return {
      canonicalName: row.display_name,
      latitude,
      longitude,
      confidence: this.confidence,
    };
  }

  /**
   * The abort timer covers the body as well as the headers. Error statuses
   * are returned without reading the body.
   */
  private async fetchJsonWithTimeout(url: string): Promise<{ status: number; body: unknown }> {
    const abortController = new AbortController();
    const timeoutHandle = setTimeout(() => {
      abortController.abort();
    }, this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
          signal: abortController.signal,
        });
      } catch (error) {
        throw new GeocodingTransientError(
          `Nominatim request failed: ${toErrorMessage(error)}`,
          null,
          error
        );
      }

      if (!response.ok) {
        return { status: response.status, body: null };
      }

      try {
        return { status: response.status, body: await response.json() };
      } catch (error) {
        throw new GeocodingTransientError(
          `Nominatim response could not be read: ${toErrorMessage(error)}`,
          response.status,
          error
        );
      }
    } finally {
      clearTimeout(timeoutHandle);
    }
  }
}
