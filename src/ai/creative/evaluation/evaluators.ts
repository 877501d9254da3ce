/**
 * Article Evaluators
 *
 * Each evaluator delegates one judgment to a model call and returns a 1-5
 * score. They are independent: the runner calls them all and records each
 * outcome separately.
 */

import { z } from 'zod';

import { EVALUATION_CONFIG } from '../config';
import type { LanguageModelClient } from '../llm';
import {
  getJudgeUserPrompt,
  getSafetyJudgeSystemPrompt,
  getScoreJudgeSystemPrompt,
  type ScoredEvaluatorName,
} from '../prompts/evaluator';
import { withRetry } from '../retry';
import type { EvaluationScore, EvaluatorName } from '../types';

export interface EvaluationInput {
  readonly runId: string;
  /** The writing assignment */
  readonly query: string;
  /** Research and product material the article should be grounded in */
  readonly context: string;
  /** The accepted article */
  readonly response: string;
}

export interface Evaluator {
  readonly name: EvaluatorName;
  evaluate(input: EvaluationInput, signal?: AbortSignal): Promise<EvaluationScore>;
}

export const ScoreJudgeSchema = z.object({
  score: z.number().int().min(EVALUATION_CONFIG.MIN_SCORE).max(EVALUATION_CONFIG.MAX_SCORE),
  reason: z.string(),
});

const severity = z.number().int().min(0).max(EVALUATION_CONFIG.MAX_SEVERITY);

export const SafetyJudgeSchema = z.object({
  violence: severity,
  selfHarm: severity,
  sexual: severity,
  hateUnfairness: severity,
  reason: z.string(),
});

function promptFor(input: EvaluationInput): string {
  return getJudgeUserPrompt({
    query: input.query,
    context: input.context,
    response: input.response,
    maxResponseLength: EVALUATION_CONFIG.MAX_RESPONSE_LENGTH,
    maxContextLength: EVALUATION_CONFIG.MAX_CONTEXT_LENGTH,
  });
}

/**
 * Folds the worst harm severity (0 to MAX_SEVERITY) onto the 1-5 scale,
 * where 5 means no harmful content.
 */
export function severityToScore(maxSeverity: number): number {
  const { MIN_SCORE, MAX_SCORE, MAX_SEVERITY } = EVALUATION_CONFIG;
  const clamped = Math.min(Math.max(maxSeverity, 0), MAX_SEVERITY);
  return MAX_SCORE - Math.round((clamped * (MAX_SCORE - MIN_SCORE)) / MAX_SEVERITY);
}

export function createScoreEvaluator(name: ScoredEvaluatorName, llm: LanguageModelClient): Evaluator {
  return {
    name,
    async evaluate(input, signal) {
      const { object } = await withRetry(
        () =>
          llm.generateObject({
            schema: ScoreJudgeSchema,
            schemaName: 'ScoreJudgement',
            system: getScoreJudgeSystemPrompt(name),
            prompt: promptFor(input),
            temperature: EVALUATION_CONFIG.TEMPERATURE,
            maxOutputTokens: EVALUATION_CONFIG.MAX_OUTPUT_TOKENS,
            signal,
          }),
        { context: `${name} evaluation`, signal }
      );
      return { evaluator: name, score: object.score, reason: object.reason };
    },
  };
}

export function createSafetyEvaluator(llm: LanguageModelClient): Evaluator {
  return {
    name: 'safety',
    async evaluate(input, signal) {
      const { object } = await withRetry(
        () =>
          llm.generateObject({
            schema: SafetyJudgeSchema,
            schemaName: 'SafetyJudgement',
            system: getSafetyJudgeSystemPrompt(EVALUATION_CONFIG.MAX_SEVERITY),
            prompt: promptFor(input),
            temperature: EVALUATION_CONFIG.TEMPERATURE,
            maxOutputTokens: EVALUATION_CONFIG.MAX_OUTPUT_TOKENS,
            signal,
          }),
        { context: 'safety evaluation', signal }
      );
      const details = {
        violence: object.violence,
        selfHarm: object.selfHarm,
        sexual: object.sexual,
        hateUnfairness: object.hateUnfairness,
      };
      return {
        evaluator: 'safety',
        score: severityToScore(Math.max(...Object.values(details))),
        reason: object.reason,
        details,
      };
    },
  };
}

/**
 * The full evaluator set, all judged by the same model.
 */
export function createDefaultEvaluators(llm: LanguageModelClient): Evaluator[] {
  return [
    createScoreEvaluator('relevance', llm),
    createScoreEvaluator('groundedness', llm),
    createScoreEvaluator('fluency', llm),
    createScoreEvaluator('coherence', llm),
    createSafetyEvaluator(llm),
    createScoreEvaluator('friendliness', llm),
  ];
}
