/**
 * Background Evaluation Runner
 *
 * Scores an accepted article after its stream has ended. Runs outside the
 * request lifecycle; failures are recorded and logged, never thrown to the
 * caller.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { buildProductSummary, buildResearchSummary } from '../prompts/writer';
import { EVALUATION_CONFIG } from '../config';
import {
  systemClock,
  type Article,
  type Clock,
  type EvaluationFailure,
  type EvaluationRecord,
  type EvaluationScore,
  type WorkflowContext,
} from '../types';
import type { EvaluationInput, Evaluator } from './evaluators';
import type { EvaluationStore } from './store';

export interface EvaluationDeps {
  readonly evaluators: readonly Evaluator[];
  readonly store: EvaluationStore;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

/**
 * Builds the judge input from the caller's briefs and the accepted article.
 */
export function buildEvaluationInput(context: WorkflowContext, article: Article): EvaluationInput {
  const half = Math.floor(EVALUATION_CONFIG.MAX_CONTEXT_LENGTH / 2);
  return {
    runId: article.runId,
    query: context.assignment,
    context: `${buildResearchSummary(article.research, half)}\n\n${buildProductSummary(article.products, half)}`,
    response: article.content,
  };
}

/**
 * Runs every evaluator independently and appends one record.
 * Resolves once the record is stored (or storing has failed and been logged).
 */
export async function runEvaluation(input: EvaluationInput, deps: EvaluationDeps): Promise<EvaluationRecord> {
  const log = deps.logger ?? createPrefixedLogger('[Evaluation]');
  const clock = deps.clock ?? systemClock;
  const startedAt = new Date(clock.now()).toISOString();

  const outcomes = await Promise.allSettled(deps.evaluators.map((evaluator) => evaluator.evaluate(input)));

  const scores: EvaluationScore[] = [];
  const failures: EvaluationFailure[] = [];
  outcomes.forEach((outcome, i) => {
    const name = deps.evaluators[i].name;
    if (outcome.status === 'fulfilled') {
      scores.push(outcome.value);
    } else {
      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      failures.push({ evaluator: name, message });
      log.warn(`${name} evaluator failed for run ${input.runId}: ${message}`);
    }
  });

  const record: EvaluationRecord = {
    runId: input.runId,
    scores,
    failures,
    startedAt,
    completedAt: new Date(clock.now()).toISOString(),
  };

  try {
    await deps.store.append(record);
    log.info(
      `Recorded evaluation for run ${input.runId}: ` +
        (scores.map((s) => `${s.evaluator}=${s.score}`).join(', ') || 'no scores') +
        (failures.length > 0 ? ` (${failures.length} failed)` : '')
    );
  } catch (error) {
    log.error(
      `Failed to store evaluation for run ${input.runId}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return record;
}

/**
 * Queues `runEvaluation` on the next turn of the event loop and returns
 * immediately. The returned promise settles when the evaluation is done and
 * never rejects; callers may ignore it.
 */
export function scheduleEvaluation(input: EvaluationInput, deps: EvaluationDeps): Promise<EvaluationRecord | undefined> {
  const log = deps.logger ?? createPrefixedLogger('[Evaluation]');

  return new Promise((resolve) => {
    setImmediate(() => {
      runEvaluation(input, deps).then(resolve, (error: unknown) => {
        log.error(
          `Evaluation for run ${input.runId} failed: ${error instanceof Error ? error.message : String(error)}`
        );
        resolve(undefined);
      });
    });
  });
}
