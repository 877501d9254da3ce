/**
 * Writer Agent
 *
 * Drafts the article from research, products and the assignment. The model
 * answers in one block; the first line that is exactly the separator splits
 * the article from the writer's notes to the editor.
 */

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { WORKFLOW_CONFIG, WRITER_CONFIG } from '../config';
import type { LanguageModelClient } from '../llm';
import { getWriterSystemPrompt, getWriterUserPrompt } from '../prompts/writer';
import { withRetry } from '../retry';
import {
  systemClock,
  type AgentClient,
  type AgentRunOptions,
  type Clock,
  type WriterDraft,
  type WriterInput,
  type WriterResult,
} from '../types';

export interface WriterDeps {
  readonly llm: LanguageModelClient;
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly temperature?: number;
}

/**
 * Splits model output on the first line that is exactly `separator`
 * (surrounding whitespace on that line is ignored). Without a separator the
 * whole output is the article and the feedback is `NO_FEEDBACK`.
 */
export function splitWriterOutput(
  output: string,
  separator: string = WRITER_CONFIG.FEEDBACK_SEPARATOR
): WriterDraft {
  const lines = output.split(/\r?\n/);
  const separatorIndex = lines.findIndex((line) => line.trim() === separator);

  if (separatorIndex === -1) {
    return { article: output.trim(), feedback: WORKFLOW_CONFIG.NO_FEEDBACK };
  }

  const article = lines.slice(0, separatorIndex).join('\n').trim();
  const feedback = lines.slice(separatorIndex + 1).join('\n').trim();
  return { article, feedback: feedback || WORKFLOW_CONFIG.NO_FEEDBACK };
}

/**
 * Runs the Writer agent.
 *
 * @throws Error when the model returns no article text
 */
export async function runWriter(
  input: WriterInput,
  deps: WriterDeps,
  options: AgentRunOptions = {}
): Promise<WriterResult> {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');
  const clock = deps.clock ?? systemClock;
  const { signal } = options;
  const startedAt = clock.now();

  log.info(input.feedback ? 'Revising draft with editor feedback' : 'Writing first draft');

  const { text, usage } = await withRetry(
    () =>
      deps.llm.generateText({
        system: getWriterSystemPrompt(WRITER_CONFIG.FEEDBACK_SEPARATOR),
        prompt: getWriterUserPrompt({
          research: input.research,
          products: input.products,
          assignment: input.assignment,
          feedback: input.feedback,
          maxResearchLength: WRITER_CONFIG.MAX_RESEARCH_CONTEXT_LENGTH,
          maxProductLength: WRITER_CONFIG.MAX_PRODUCT_CONTEXT_LENGTH,
        }),
        temperature: deps.temperature ?? WRITER_CONFIG.TEMPERATURE,
        maxOutputTokens: WRITER_CONFIG.MAX_OUTPUT_TOKENS,
        signal,
      }),
    { context: 'Writer draft', signal }
  );

  const draft = splitWriterOutput(text);
  if (draft.article.length === 0) {
    throw new Error('Writer returned an empty article');
  }

  log.info(`Draft complete: ${draft.article.length} chars`);

  return {
    role: 'writer',
    payload: draft,
    feedback: draft.feedback,
    tokenUsage: usage,
    durationMs: clock.now() - startedAt,
  };
}

export function createWriterAgent(deps: WriterDeps): AgentClient<WriterInput, WriterDraft> {
  return {
    role: 'writer',
    run: (input, options) => runWriter(input, deps, options),
  };
}
