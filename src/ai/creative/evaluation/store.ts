/**
 * Evaluation Store
 *
 * Append-only storage for EvaluationRecords. The in-memory store backs tests
 * and standalone scripts; inside Strapi the app registers a store backed by
 * the evaluation-record content type.
 */

import type { EvaluationRecord } from '../types';

export interface EvaluationStore {
  append(record: EvaluationRecord): Promise<void>;
  /** Records for one run, oldest first */
  findByRunId(runId: string): Promise<readonly EvaluationRecord[]>;
}

export class InMemoryEvaluationStore implements EvaluationStore {
  private readonly records: EvaluationRecord[] = [];

  async append(record: EvaluationRecord): Promise<void> {
    this.records.push(record);
  }

  async findByRunId(runId: string): Promise<readonly EvaluationRecord[]> {
    return this.records.filter((record) => record.runId === runId);
  }

  get size(): number {
    return this.records.length;
  }
}

let activeStore: EvaluationStore = new InMemoryEvaluationStore();

/**
 * Store used by the HTTP layer. Defaults to in-memory.
 */
export function getEvaluationStore(): EvaluationStore {
  return activeStore;
}

export function setEvaluationStore(store: EvaluationStore): void {
  activeStore = store;
}
