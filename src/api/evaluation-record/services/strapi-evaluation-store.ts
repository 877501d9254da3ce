/**
 * Evaluation store backed by the evaluation-record content type.
 */

import { z } from 'zod';

import type { EvaluationStore } from '../../../ai/creative/evaluation/store';
import type { EvaluationRecord } from '../../../ai/creative/types';
import type { EvaluationRecordDocument, StrapiDocumentService } from '../../../types/strapi';
import { createPrefixedLogger } from '../../../utils/logger';

export const EVALUATION_RECORD_UID = 'api::evaluation-record.evaluation-record';

const evaluatorName = z.enum(['relevance', 'groundedness', 'fluency', 'coherence', 'safety', 'friendliness']);

const storedScoresSchema = z.array(
  z.object({
    evaluator: evaluatorName,
    score: z.number(),
    reason: z.string(),
    details: z.record(z.number()).optional(),
  })
);

const storedFailuresSchema = z.array(z.object({ evaluator: evaluatorName, message: z.string() }));

/**
 * Converts a stored document back into a record; undefined when the JSON
 * columns don't have the expected shape.
 */
export function toEvaluationRecord(doc: EvaluationRecordDocument): EvaluationRecord | undefined {
  const scores = storedScoresSchema.safeParse(doc.scores);
  const failures = storedFailuresSchema.safeParse(doc.failures);
  if (!scores.success || !failures.success) {
    return undefined;
  }
  return {
    runId: doc.runId,
    scores: scores.data,
    failures: failures.data,
    startedAt: doc.startedAt,
    completedAt: doc.completedAt,
  };
}

export class StrapiEvaluationStore implements EvaluationStore {
  private readonly log = createPrefixedLogger('[EvaluationStore]');

  constructor(private readonly documents: StrapiDocumentService<EvaluationRecordDocument>) {}

  async append(record: EvaluationRecord): Promise<void> {
    await this.documents.create({
      data: {
        runId: record.runId,
        scores: record.scores,
        failures: record.failures,
        startedAt: record.startedAt,
        completedAt: record.completedAt,
      },
    });
  }

  async findByRunId(runId: string): Promise<readonly EvaluationRecord[]> {
    const docs = await this.documents.findMany({
      filters: { runId: { $eq: runId } },
      sort: 'createdAt:asc',
    });

    const records: EvaluationRecord[] = [];
    for (const doc of docs) {
      const record = toEvaluationRecord(doc);
      if (record) {
        records.push(record);
      } else {
        this.log.warn(`Skipping malformed evaluation record ${doc.documentId}`);
      }
    }
    return records;
  }
}
