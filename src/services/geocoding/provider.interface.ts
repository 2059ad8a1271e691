import type { GeocodeQuery, ProviderResult } from './geocoding.types';

/**
 * Name-to-coordinates service. Throws GeocodingTransientError for retryable
 * failures and GeocodingNotFoundError for a definite not-found.
 */
export interface ExternalGeocodingProvider {
  readonly name: string;
  geocode(query: GeocodeQuery): Promise<ProviderResult>;
}
