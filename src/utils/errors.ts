export type PlaceEngineErrorCode =
  | 'EXTRACTION_FAILED'
  | 'CLASSIFICATION_FAILED'
  | 'GEOCODING_TRANSIENT'
  | 'GEOCODING_NOT_FOUND'
  | 'CONFIGURATION_INVALID';

export class PlaceEngineError extends Error {
  constructor(
    public code: PlaceEngineErrorCode,
    public message: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PlaceEngineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** A single extraction strategy failed on one sentence. */
export class ExtractionError extends PlaceEngineError {
  constructor(
    public strategy: string,
    message: string,
    cause?: unknown
  ) {
    super('EXTRACTION_FAILED', message, cause);
    this.name = 'ExtractionError';
  }
}

export class ClassificationError extends PlaceEngineError {
  constructor(message: string, cause?: unknown) {
    super('CLASSIFICATION_FAILED', message, cause);
    this.name = 'ClassificationError';
  }
}

/** Timeout, rate limit or server error from a geocoding provider. Retryable. */
export class GeocodingTransientError extends PlaceEngineError {
  constructor(
    message: string,
    public httpStatus: number | null = null,
    cause?: unknown
  ) {
    super('GEOCODING_TRANSIENT', message, cause);
    this.name = 'GeocodingTransientError';
  }
}

export class GeocodingNotFoundError extends PlaceEngineError {
  constructor(placeName: string) {
    super('GEOCODING_NOT_FOUND', `No geocoding match for "${placeName}"`);
    this.name = 'GeocodingNotFoundError';
  }
}

/** Malformed knowledge table. Fatal at startup. */
export class ConfigurationError extends PlaceEngineError {
  constructor(
    public source: string,
    message: string,
    cause?: unknown
  ) {
    super('CONFIGURATION_INVALID', `${source}: ${message}`, cause);
    this.name = 'ConfigurationError';
  }
}

export function toErrorMessage(value: unknown): string {
  if (value instanceof Error && value.message.trim()) {
    return value.message.trim();
  }
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return 'Unknown error';
}
