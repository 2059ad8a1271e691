/**
 * Geocoding module - layered resolution of accepted mentions to coordinates.
 */

export { geocodeCacheKey, InMemoryGeocodeCache, RedisGeocodeCache, type RedisLike } from './cache';
export type {
  CachedOutcome,
  GeocodeCache,
  GeocodeQuery,
  LayerResolution,
  ProviderResult,
  ResolutionHints,
  ResolutionLayer,
} from './geocoding.types';
export { ClassicalLayer, ExternalProviderLayer, GazetteerLayer, type RetryOptions } from './layers';
export type { ExternalGeocodingProvider } from './provider.interface';
export {
  type FetchFn,
  NominatimGeocodingProvider,
  type NominatimOptions,
  shouldRetryHttpStatus,
} from './providers/nominatim.provider';
export { RateLimiter, type SleepFn, sleep } from './rateLimiter';
export {
  FAILED_SOURCE,
  GeocodingResolver,
  type GeocodingResolverOptions,
  REJECTED_SOURCE,
} from './resolver';
