/**
 * Researcher Agent Prompts
 *
 * Two calls: plan web search queries for the research brief, then distil the
 * search hits into structured findings.
 */

import type { TavilySearchResponse } from '../../tools/tavily';
import { feedbackSection, truncateForPrompt } from './shared';

export function getResearcherQuerySystemPrompt(maxQueries: number): string {
  return `You are a research assistant planning web searches.
Given a research brief, write between 1 and ${maxQueries} concise search engine queries that together cover it.
Prefer specific queries over broad ones. Do not repeat a query.`;
}

export function getResearcherQueryUserPrompt(context: string, feedback?: string): string {
  return `Research brief:\n${context}${feedbackSection('Feedback on earlier research', feedback)}`;
}

export function getResearcherExtractionSystemPrompt(maxWebFindings: number): string {
  return `You are a research assistant. You receive web search hits for a research brief.
Extract only what the hits support:
- web: up to ${maxWebFindings} relevant pages, each with its exact url, a short name and a one or two sentence description
- entities: notable people, places, products, or organisations mentioned, each with a one sentence description
- news: recent news items from the news hits, each with its exact url, title and a one sentence description

Use URLs exactly as they appear in the hits. Leave a list empty when nothing fits.`;
}

/**
 * Formats search responses as numbered hits for the extraction prompt.
 */
export function formatSearchHits(
  responses: readonly TavilySearchResponse[],
  maxSnippetLength: number
): string {
  const lines: string[] = [];
  let index = 1;
  for (const response of responses) {
    for (const hit of response.results) {
      const snippet = truncateForPrompt(hit.content ?? '', maxSnippetLength, 'snippet');
      const date = hit.publishedDate ? ` (${hit.publishedDate})` : '';
      lines.push(`[${index}] ${hit.title}${date}\nURL: ${hit.url}\n${snippet}`);
      index++;
    }
  }
  return lines.join('\n\n');
}

export function getResearcherExtractionUserPrompt(
  context: string,
  webHits: string,
  newsHits: string
): string {
  return `Research brief:\n${context}

WEB HITS:
${webHits || '(none)'}

NEWS HITS:
${newsHits || '(none)'}`;
}
