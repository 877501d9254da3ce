/**
 * Editor Agent
 *
 * Critiques a draft and decides accept or reject. `editorFeedback` goes back
 * to the writer; `researchFeedback` is kept on the payload only.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { EDITOR_CONFIG } from '../config';
import type { LanguageModelClient } from '../llm';
import { getEditorSystemPrompt, getEditorUserPrompt } from '../prompts/editor';
import { withRetry } from '../retry';
import {
  systemClock,
  type AgentClient,
  type AgentRunOptions,
  type Clock,
  type EditorInput,
  type EditorResult,
  type EditorReview,
} from '../types';

export interface EditorDeps {
  readonly llm: LanguageModelClient;
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly temperature?: number;
}

export const EditorReviewSchema = z.object({
  decision: z.enum(['accept', 'reject']),
  researchFeedback: z.string().default(''),
  editorFeedback: z.string().default(''),
});

/**
 * Runs the Editor agent. One structured model call.
 */
export async function runEditor(
  input: EditorInput,
  deps: EditorDeps,
  options: AgentRunOptions = {}
): Promise<EditorResult> {
  const log = deps.logger ?? createPrefixedLogger('[Editor]');
  const clock = deps.clock ?? systemClock;
  const { signal } = options;
  const startedAt = clock.now();

  const { object, usage } = await withRetry(
    () =>
      deps.llm.generateObject({
        schema: EditorReviewSchema,
        schemaName: 'EditorReview',
        system: getEditorSystemPrompt(),
        prompt: getEditorUserPrompt(input.article, input.feedback, EDITOR_CONFIG.MAX_ARTICLE_CONTENT_LENGTH),
        temperature: deps.temperature ?? EDITOR_CONFIG.TEMPERATURE,
        maxOutputTokens: EDITOR_CONFIG.MAX_OUTPUT_TOKENS,
        signal,
      }),
    { context: 'Editor review', signal }
  );

  const review: EditorReview = {
    decision: object.decision,
    researchFeedback: object.researchFeedback.trim(),
    editorFeedback: object.editorFeedback.trim(),
  };

  log.info(`Decision: ${review.decision === 'accept' ? 'ACCEPTED' : 'REJECTED'}`);

  return {
    role: 'editor',
    payload: review,
    feedback: review.editorFeedback,
    tokenUsage: usage,
    durationMs: clock.now() - startedAt,
  };
}

export function createEditorAgent(deps: EditorDeps): AgentClient<EditorInput, EditorReview> {
  return {
    role: 'editor',
    run: (input, options) => runEditor(input, deps, options),
  };
}
