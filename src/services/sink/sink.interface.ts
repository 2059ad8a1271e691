import type { GeocodedRecord } from '../../types/places';

/**
 * Destination for geocoded records. A commit replaces everything previously
 * stored for the document, as one atomic unit.
 */
export interface ResultSink {
  commit(documentId: string, records: readonly GeocodedRecord[]): Promise<void>;
}
