/**
 * Product Agent
 *
 * Vector search over the product catalog: the model turns the product brief
 * into search phrases, which are embedded in one batch and matched against
 * the catalog by cosine similarity.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { PRODUCT_CONFIG } from '../config';
import type { LanguageModelClient } from '../llm';
import type { ProductIndex } from '../products/product-index';
import { getProductQuerySystemPrompt, getProductQueryUserPrompt } from '../prompts/product';
import { withRetry } from '../retry';
import {
  addTokenUsage,
  systemClock,
  type AgentClient,
  type AgentRunOptions,
  type Clock,
  type ProductFindings,
  type ProductInput,
  type ProductResult,
} from '../types';
import { normalizeQueries } from './researcher';

export interface ProductDeps {
  readonly llm: LanguageModelClient;
  readonly index: ProductIndex;
  readonly logger?: Logger;
  readonly clock?: Clock;
  readonly temperature?: number;
}

export const ProductQueriesSchema = z.object({
  queries: z.array(z.string()).min(PRODUCT_CONFIG.MIN_QUERIES),
});

/**
 * Runs the Product agent. One model call, one or two embedding calls.
 */
export async function runProductAgent(
  input: ProductInput,
  deps: ProductDeps,
  options: AgentRunOptions = {}
): Promise<ProductResult> {
  const log = deps.logger ?? createPrefixedLogger('[Product]');
  const clock = deps.clock ?? systemClock;
  const { signal } = options;
  const startedAt = clock.now();

  const planned = await withRetry(
    () =>
      deps.llm.generateObject({
        schema: ProductQueriesSchema,
        schemaName: 'ProductQueries',
        system: getProductQuerySystemPrompt(PRODUCT_CONFIG.MAX_QUERIES),
        prompt: getProductQueryUserPrompt(input.context),
        temperature: deps.temperature ?? PRODUCT_CONFIG.TEMPERATURE,
        signal,
      }),
    { context: 'Product query generation', signal }
  );

  let queries = normalizeQueries(planned.object.queries, PRODUCT_CONFIG.MAX_QUERIES);
  if (queries.length === 0) {
    queries = [input.context.slice(0, 200)];
  }
  log.info(`Searching catalog with ${queries.length} queries`);

  const { matches, embeddingTokens } = await withRetry(
    () =>
      deps.index.search(queries, {
        topK: PRODUCT_CONFIG.TOP_K_PER_QUERY,
        minSimilarity: PRODUCT_CONFIG.MIN_SIMILARITY,
        limit: PRODUCT_CONFIG.MAX_DOCUMENTS,
        signal,
      }),
    { context: 'Product search', signal }
  );

  const findings: ProductFindings = { queries, documents: matches };
  const feedback =
    matches.length > 0
      ? `Found ${matches.length} products: ${matches.map((m) => m.title).join(', ')}`
      : 'No matching products found';
  log.info(feedback);

  return {
    role: 'product',
    payload: findings,
    feedback,
    tokenUsage: addTokenUsage(planned.usage, { input: embeddingTokens, output: 0 }),
    durationMs: clock.now() - startedAt,
  };
}

export function createProductAgent(deps: ProductDeps): AgentClient<ProductInput, ProductFindings> {
  return {
    role: 'product',
    run: (input, options) => runProductAgent(input, deps, options),
  };
}
