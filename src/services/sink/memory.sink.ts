import type { GeocodedRecord } from '../../types/places';
import type { ResultSink } from './sink.interface';

export class InMemoryResultSink implements ResultSink {
  private readonly documents = new Map<string, GeocodedRecord[]>();

  async commit(documentId: string, records: readonly GeocodedRecord[]): Promise<void> {
    this.documents.set(
      documentId,
      records.map((record) => ({ ...record, span: { ...record.span } }))
    );
  }

  recordsFor(documentId: string): GeocodedRecord[] {
    return this.documents.get(documentId) ?? [];
  }

  get documentIds(): string[] {
    return [...this.documents.keys()];
  }
}
