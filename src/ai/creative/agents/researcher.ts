/**
 * Researcher Agent
 *
 * Grounded web research for the research brief:
 * 1. The model plans a few search queries
 * 2. Each query runs through Tavily (plus one news search)
 * 3. The model distils the hits into web, entity and news findings
 *
 * Web and news findings whose URL did not appear in the hits are dropped.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { TavilySearchResponse, TavilyTopic } from '../../tools/tavily';
import { RESEARCHER_CONFIG } from '../config';
import type { LanguageModelClient } from '../llm';
import {
  formatSearchHits,
  getResearcherExtractionSystemPrompt,
  getResearcherExtractionUserPrompt,
  getResearcherQuerySystemPrompt,
  getResearcherQueryUserPrompt,
} from '../prompts/researcher';
import { withRetry } from '../retry';
import {
  addTokenUsage,
  systemClock,
  type AgentClient,
  type AgentRunOptions,
  type Clock,
  type ResearchFindings,
  type ResearchResult,
  type ResearcherInput,
} from '../types';

// ============================================================================
// Types
// ============================================================================

export interface SearchRequest {
  readonly topic: TavilyTopic;
  readonly maxResults: number;
  readonly signal?: AbortSignal;
}

/**
 * Web search function. Production binds `tavilySearch` to the API key.
 */
export type WebSearchFn = (query: string, request: SearchRequest) => Promise<TavilySearchResponse>;

export interface ResearcherDeps {
  readonly llm: LanguageModelClient;
  readonly search: WebSearchFn;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Optional temperature override (default: RESEARCHER_CONFIG.TEMPERATURE) */
  readonly temperature?: number;
}

// ============================================================================
// Zod Schemas
// ============================================================================

export const ResearchQueriesSchema = z.object({
  queries: z.array(z.string()).min(RESEARCHER_CONFIG.MIN_QUERIES),
});

export const ResearchExtractionSchema = z.object({
  web: z
    .array(z.object({ url: z.string(), name: z.string(), description: z.string() }))
    .default([]),
  entities: z.array(z.object({ name: z.string(), description: z.string() })).default([]),
  news: z
    .array(z.object({ url: z.string(), title: z.string(), description: z.string() }))
    .default([]),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Trims, drops blanks and case-insensitive duplicates, and caps the count.
 */
export function normalizeQueries(queries: readonly string[], max: number): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of queries) {
    const query = raw.trim();
    const key = query.toLowerCase();
    if (query.length === 0 || seen.has(key)) continue;
    seen.add(key);
    result.push(query);
    if (result.length >= max) break;
  }
  return result;
}

function collectUrls(responses: readonly TavilySearchResponse[]): Set<string> {
  const urls = new Set<string>();
  for (const response of responses) {
    for (const hit of response.results) {
      urls.add(hit.url);
    }
  }
  return urls;
}

function countHits(responses: readonly TavilySearchResponse[]): number {
  return responses.reduce((sum, response) => sum + response.results.length, 0);
}

export function summarizeFindings(findings: ResearchFindings): string {
  return (
    `Found ${findings.web.length} web results, ${findings.entities.length} entities ` +
    `and ${findings.news.length} news items from ${findings.queries.length} queries`
  );
}

// ============================================================================
// Main Researcher Function
// ============================================================================

/**
 * Runs the Researcher agent.
 *
 * Makes two model calls (query planning and extraction) and
 * `queries + 1` search calls. Extraction is skipped when search found nothing.
 */
export async function runResearcher(
  input: ResearcherInput,
  deps: ResearcherDeps,
  options: AgentRunOptions = {}
): Promise<ResearchResult> {
  const log = deps.logger ?? createPrefixedLogger('[Researcher]');
  const clock = deps.clock ?? systemClock;
  const temperature = deps.temperature ?? RESEARCHER_CONFIG.TEMPERATURE;
  const { signal } = options;
  const startedAt = clock.now();

  const planned = await withRetry(
    () =>
      deps.llm.generateObject({
        schema: ResearchQueriesSchema,
        schemaName: 'ResearchQueries',
        system: getResearcherQuerySystemPrompt(RESEARCHER_CONFIG.MAX_QUERIES),
        prompt: getResearcherQueryUserPrompt(input.context, input.feedback),
        temperature,
        signal,
      }),
    { context: 'Researcher query planning', signal }
  );
  let tokenUsage = planned.usage;

  let queries = normalizeQueries(planned.object.queries, RESEARCHER_CONFIG.MAX_QUERIES);
  if (queries.length === 0) {
    queries = [input.context.slice(0, 200)];
  }
  log.info(`Planned ${queries.length} queries: ${queries.join(' | ')}`);

  const webResponses: TavilySearchResponse[] = [];
  for (const query of queries) {
    const response = await withRetry(
      () => deps.search(query, { topic: 'general', maxResults: RESEARCHER_CONFIG.RESULTS_PER_QUERY, signal }),
      { context: `Researcher search "${query}"`, signal }
    );
    webResponses.push(response);
  }
  const newsResponse = await withRetry(
    () => deps.search(queries[0], { topic: 'news', maxResults: RESEARCHER_CONFIG.RESULTS_PER_QUERY, signal }),
    { context: 'Researcher news search', signal }
  );

  const totalHits = countHits(webResponses) + newsResponse.results.length;
  log.debug(`Search returned ${totalHits} hits`);

  let findings: ResearchFindings = { queries, web: [], entities: [], news: [] };

  if (totalHits > 0) {
    const extracted = await withRetry(
      () =>
        deps.llm.generateObject({
          schema: ResearchExtractionSchema,
          schemaName: 'ResearchFindings',
          system: getResearcherExtractionSystemPrompt(RESEARCHER_CONFIG.MAX_WEB_FINDINGS),
          prompt: getResearcherExtractionUserPrompt(
            input.context,
            formatSearchHits(webResponses, RESEARCHER_CONFIG.MAX_SNIPPET_LENGTH),
            formatSearchHits([newsResponse], RESEARCHER_CONFIG.MAX_SNIPPET_LENGTH)
          ),
          temperature,
          maxOutputTokens: RESEARCHER_CONFIG.MAX_OUTPUT_TOKENS,
          signal,
        }),
      { context: 'Researcher extraction', signal }
    );
    tokenUsage = addTokenUsage(tokenUsage, extracted.usage);

    const webUrls = collectUrls(webResponses);
    const newsUrls = collectUrls([newsResponse]);
    const web = extracted.object.web
      .filter((item) => webUrls.has(item.url) || newsUrls.has(item.url))
      .slice(0, RESEARCHER_CONFIG.MAX_WEB_FINDINGS);
    const news = extracted.object.news.filter((item) => newsUrls.has(item.url) || webUrls.has(item.url));

    const dropped = extracted.object.web.length + extracted.object.news.length - web.length - news.length;
    if (dropped > 0) {
      log.warn(`Dropped ${dropped} findings with URLs not present in search hits`);
    }

    findings = { queries, web, entities: extracted.object.entities, news };
  } else {
    log.warn('Search returned no hits; skipping extraction');
  }

  const feedback = summarizeFindings(findings);
  log.info(feedback);

  return {
    role: 'researcher',
    payload: findings,
    feedback,
    tokenUsage,
    durationMs: clock.now() - startedAt,
  };
}

/**
 * Wraps `runResearcher` in the uniform agent interface.
 */
export function createResearcherAgent(deps: ResearcherDeps): AgentClient<ResearcherInput, ResearchFindings> {
  return {
    role: 'researcher',
    run: (input, options) => runResearcher(input, deps, options),
  };
}
