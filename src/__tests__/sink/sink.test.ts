import { describe, expect, test } from 'vitest';
import {
  computeSentenceHash,
  DrizzleResultSink,
  InMemoryResultSink,
  type MentionDatabase,
  type MentionTransaction,
  toRow,
} from '../../services/sink';
import type { GeocodedRecord } from '../../types/places';

function createRecord(overrides: Partial<GeocodedRecord> = {}): GeocodedRecord {
  return {
    documentId: 'doc-1',
    placeName: '本郷',
    span: { start: 0, end: 2 },
    canonicalName: '本郷',
    latitude: 35.7081,
    longitude: 139.7619,
    confidence: 0.855,
    resolutionSource: 'tokyo_detail',
    regionHint: '東京都文京区',
    sentenceText: '本郷の下宿に戻った。',
    ...overrides,
  };
}

/** Applies a transaction's statements only when its callback resolves. */
class FakeMentionDatabase implements MentionDatabase {
  readonly applied: string[] = [];
  transactions = 0;

  constructor(private readonly failInsert = false) {}

  async transaction<T>(run: (tx: MentionTransaction) => Promise<T>): Promise<T> {
    this.transactions += 1;
    const staged: string[] = [];
    const result = await run({
      delete: () => ({
        where: async () => {
          staged.push('delete');
        },
      }),
      insert: () => ({
        values: (rows) => ({
          onConflictDoNothing: async () => {
            if (this.failInsert) {
              throw new Error('insert failed');
            }
            staged.push(`insert ${rows.map((row) => row.placeName).join(',')}`);
          },
        }),
      }),
    });
    this.applied.push(...staged);
    return result;
  }
}

describe('DrizzleResultSink', () => {
  test('deletes then inserts inside one transaction', async () => {
    const database = new FakeMentionDatabase();

    await new DrizzleResultSink(database).commit('doc-1', [
      createRecord(),
      createRecord({ placeName: '神田' }),
    ]);

    expect(database.transactions).toBe(1);
    expect(database.applied).toEqual(['delete', 'insert 本郷,神田']);
  });

  test('only deletes when the document has no records', async () => {
    const database = new FakeMentionDatabase();

    await new DrizzleResultSink(database).commit('doc-1', []);

    expect(database.applied).toEqual(['delete']);
  });

  test('rejects and applies nothing when the insert fails', async () => {
    const database = new FakeMentionDatabase(true);

    await expect(
      new DrizzleResultSink(database).commit('doc-1', [createRecord()])
    ).rejects.toThrow('insert failed');
    expect(database.applied).toEqual([]);
  });
});

describe('InMemoryResultSink', () => {
  test('replaces a document on every commit', async () => {
    const sink = new InMemoryResultSink();

    await sink.commit('doc-1', [createRecord(), createRecord({ placeName: '神田' })]);
    await sink.commit('doc-1', [createRecord()]);

    expect(sink.recordsFor('doc-1')).toHaveLength(1);
    expect(sink.documentIds).toEqual(['doc-1']);
  });

  test('stores copies of the records', async () => {
    const sink = new InMemoryResultSink();
    const record = createRecord();

    await sink.commit('doc-1', [record]);
    record.span.start = 5;

    expect(sink.recordsFor('doc-1')[0]?.span.start).toBe(0);
  });

  test('returns nothing for an unknown document', () => {
    expect(new InMemoryResultSink().recordsFor('missing')).toEqual([]);
  });
});

describe('toRow', () => {
  test('flattens a record into a table row', () => {
    const row = toRow(createRecord({ latitude: null, longitude: null, regionHint: null }));

    expect(row).toEqual({
      documentId: 'doc-1',
      placeName: '本郷',
      sentenceHash: computeSentenceHash('本郷の下宿に戻った。'),
      spanStart: 0,
      spanEnd: 2,
      canonicalName: '本郷',
      latitude: null,
      longitude: null,
      confidence: 0.855,
      resolutionSource: 'tokyo_detail',
      regionHint: null,
      sentenceText: '本郷の下宿に戻った。',
    });
  });

  test('hashes sentences to hex SHA-256', () => {
    expect(computeSentenceHash('本郷の下宿に戻った。')).toMatch(/^[0-9a-f]{64}$/);
  });
});
