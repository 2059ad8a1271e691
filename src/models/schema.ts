import {
  doublePrecision,
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

export const geocodedMentions = pgTable(
  'geocoded_mentions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    documentId: varchar('document_id', { length: 255 }).notNull(),
    placeName: varchar('place_name', { length: 255 }).notNull(),
    /** SHA-256 of the sentence; spans are sentence-relative */
    sentenceHash: varchar('sentence_hash', { length: 64 }).notNull(),
    spanStart: integer('span_start').notNull(),
    spanEnd: integer('span_end').notNull(),
    canonicalName: text('canonical_name').notNull(),
    latitude: doublePrecision('latitude'),
    longitude: doublePrecision('longitude'),
    confidence: doublePrecision('confidence').notNull(),
    resolutionSource: varchar('resolution_source', { length: 100 }).notNull(),
    regionHint: text('region_hint'),
    sentenceText: text('sentence_text').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    documentIdx: index('geocoded_mentions_document_idx').on(table.documentId),
    mentionUnique: uniqueIndex('geocoded_mentions_mention_unique').on(
      table.documentId,
      table.sentenceHash,
      table.placeName,
      table.spanStart,
      table.spanEnd
    ),
  })
);

export type GeocodedMentionRow = typeof geocodedMentions.$inferSelect;
export type NewGeocodedMentionRow = typeof geocodedMentions.$inferInsert;
