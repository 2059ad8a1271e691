/**
 * Batch pipeline: sentence contexts -> coordinator -> resolver -> sink.
 *
 * Documents run one after another; the sentences of a document run
 * concurrently. A document's records are committed together or not at all.
 * Cancellation takes effect between documents.
 */

import type { GeocodedRecord, SentenceContext } from '../../types/places';
import { toErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ExtractionCoordinator, RejectedCandidate } from '../coordinator';
import type { GeocodingResolver } from '../geocoding';
import { buildSentenceContexts, type SentenceContextOptions } from '../sentences';
import type { ResultSink } from '../sink';
import { BatchCancelledError } from './errors';
import type {
  DocumentOutcome,
  DocumentReport,
  PipelineDocument,
  PipelineReport,
  PipelineRunOptions,
} from './pipeline.types';

/**
 * Throw if the batch has been cancelled.
 */
function checkForInterruption(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new BatchCancelledError('Batch cancelled before next document');
  }
}

export class PlacePipeline {
  constructor(
    private readonly coordinator: ExtractionCoordinator,
    private readonly resolver: GeocodingResolver,
    private readonly sink: ResultSink,
    private readonly sentenceOptions: SentenceContextOptions = {}
  ) {}

  async run(
    documents: Iterable<PipelineDocument>,
    options: PipelineRunOptions = {}
  ): Promise<PipelineReport> {
    const reports: DocumentReport[] = [];
    let cancelled = false;

    for (const document of documents) {
      try {
        checkForInterruption(options.signal);
      } catch (error) {
        if (!(error instanceof BatchCancelledError)) throw error;
        logger.info({ processed: reports.length }, error.message);
        cancelled = true;
        break;
      }
      reports.push(await this.runDocument(document));
    }

    const report = summarize(reports, cancelled);
    logger.info({ ...report.totals, cancelled }, 'Place pipeline finished');
    return report;
  }

  async processDocument(document: PipelineDocument): Promise<DocumentOutcome> {
    const contexts = this.contextsFor(document);

    const perSentence = await Promise.all(
      contexts.map(async (context) => {
        const coordination = await this.coordinator.coordinate(context);
        const records = await Promise.all(
          coordination.mentions.map((mention) => this.resolver.resolve(mention))
        );
        return { records, rejected: coordination.rejected };
      })
    );

    const records: GeocodedRecord[] = perSentence.flatMap((sentence) => sentence.records);
    const rejected: RejectedCandidate[] = perSentence.flatMap((sentence) => sentence.rejected);
    const geocoded = records.filter((record) => record.latitude !== null).length;
    const nonPlace = rejected.filter((entry) => entry.reason === 'non_place').length;

    return {
      records,
      rejected,
      counts: {
        sentences: contexts.length,
        accepted: records.length,
        rejected: nonPlace,
        dropped: rejected.length - nonPlace,
        geocoded,
        geocodingFailures: records.length - geocoded,
      },
    };
  }

  private contextsFor(document: PipelineDocument): readonly SentenceContext[] {
    if ('sentences' in document) {
      return document.sentences;
    }
    return buildSentenceContexts(document.documentId, document.text, this.sentenceOptions);
  }

  private async runDocument(document: PipelineDocument): Promise<DocumentReport> {
    const { documentId } = document;
    const startTime = Date.now();

    let outcome: DocumentOutcome;
    try {
      outcome = await this.processDocument(document);
    } catch (error) {
      logger.error({ documentId, error: toErrorMessage(error) }, 'Document processing failed');
      return { documentId, status: 'failed', error: toErrorMessage(error), ...emptyCounts() };
    }

    try {
      await this.sink.commit(documentId, outcome.records);
    } catch (error) {
      logger.error({ documentId, error: toErrorMessage(error) }, 'Result sink commit failed');
      return { documentId, status: 'failed', error: toErrorMessage(error), ...outcome.counts };
    }

    logger.info(
      { documentId, ...outcome.counts, durationMs: Date.now() - startTime },
      'Document committed'
    );
    return { documentId, status: 'committed', ...outcome.counts };
  }
}

function emptyCounts() {
  return { sentences: 0, accepted: 0, rejected: 0, dropped: 0, geocoded: 0, geocodingFailures: 0 };
}

function summarize(reports: DocumentReport[], cancelled: boolean): PipelineReport {
  const totals = { documents: reports.length, committed: 0, failed: 0, ...emptyCounts() };
  for (const report of reports) {
    if (report.status === 'committed') totals.committed += 1;
    else totals.failed += 1;
    totals.sentences += report.sentences;
    totals.accepted += report.accepted;
    totals.rejected += report.rejected;
    totals.dropped += report.dropped;
    totals.geocoded += report.geocoded;
    totals.geocodingFailures += report.geocodingFailures;
  }
  return { documents: reports, totals, cancelled };
}
