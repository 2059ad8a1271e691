/**
 * Postgres sink. Each commit deletes the document's rows and inserts the new
 * ones inside one transaction.
 */

import { createHash } from 'node:crypto';
import { eq, type SQL } from 'drizzle-orm';
import { geocodedMentions, type NewGeocodedMentionRow } from '../../models/schema';
import type { GeocodedRecord } from '../../types/places';
import { logger } from '../../utils/logger';
import type { ResultSink } from './sink.interface';

export function computeSentenceHash(sentenceText: string): string {
  return createHash('sha256').update(sentenceText).digest('hex');
}

export function toRow(record: GeocodedRecord): NewGeocodedMentionRow {
  return {
    documentId: record.documentId,
    placeName: record.placeName,
    sentenceHash: computeSentenceHash(record.sentenceText),
    spanStart: record.span.start,
    spanEnd: record.span.end,
    canonicalName: record.canonicalName,
    latitude: record.latitude,
    longitude: record.longitude,
    confidence: record.confidence,
    resolutionSource: record.resolutionSource,
    regionHint: record.regionHint,
    sentenceText: record.sentenceText,
  };
}

/** The drizzle calls the sink makes inside a transaction. */
export interface MentionTransaction {
  delete(table: typeof geocodedMentions): {
    where(condition: SQL | undefined): PromiseLike<unknown>;
  };
  insert(table: typeof geocodedMentions): {
    values(rows: NewGeocodedMentionRow[]): { onConflictDoNothing(): PromiseLike<unknown> };
  };
}

/** Satisfied by PostgresJsDatabase. */
export interface MentionDatabase {
  transaction<T>(run: (tx: MentionTransaction) => Promise<T>): Promise<T>;
}

export class DrizzleResultSink implements ResultSink {
  constructor(private readonly database: MentionDatabase) {}

  async commit(documentId: string, records: readonly GeocodedRecord[]): Promise<void> {
    const rows = records.map(toRow);

    await this.database.transaction(async (tx) => {
      await tx.delete(geocodedMentions).where(eq(geocodedMentions.documentId, documentId));
      if (rows.length > 0) {
        // Repeated identical sentences produce identical rows
        await tx.insert(geocodedMentions).values(rows).onConflictDoNothing();
      }
    });

    logger.debug({ documentId, rows: rows.length }, 'Committed geocoded mentions');
  }
}
