/**
 * Writer Agent Prompts
 *
 * The writer answers in one text block: the article, then a line containing
 * only the feedback separator, then notes for the editor.
 */

import type { ProductFindings, ResearchFindings } from '../types';
import { feedbackSection, truncateForPrompt } from './shared';

export interface WriterPromptContext {
  readonly research: ResearchFindings;
  readonly products: ProductFindings;
  readonly assignment: string;
  readonly feedback?: string;
  readonly maxResearchLength: number;
  readonly maxProductLength: number;
}

export function getWriterSystemPrompt(separator: string): string {
  return `You are a writer for an outdoor gear retailer's blog.
Write an engaging, accurate article that fulfils the assignment.
Ground every factual claim in the research provided and mention relevant products from the catalog by name.
Use Markdown headings and short paragraphs.

After the article, write a line containing only ${separator}
Below that line, write brief notes to your editor: what you focused on and anything you were unsure about.`;
}

/**
 * Serializes research findings into a compact prompt section.
 */
export function buildResearchSummary(research: ResearchFindings, maxLength: number): string {
  const parts: string[] = [];

  if (research.web.length > 0) {
    parts.push('Web:');
    for (const item of research.web) {
      parts.push(`- ${item.name} (${item.url}): ${item.description}`);
    }
  }
  if (research.entities.length > 0) {
    parts.push('Entities:');
    for (const item of research.entities) {
      parts.push(`- ${item.name}: ${item.description}`);
    }
  }
  if (research.news.length > 0) {
    parts.push('News:');
    for (const item of research.news) {
      parts.push(`- ${item.title} (${item.url}): ${item.description}`);
    }
  }

  const summary = parts.length > 0 ? parts.join('\n') : '(no research findings)';
  return truncateForPrompt(summary, maxLength, 'research');
}

export function buildProductSummary(products: ProductFindings, maxLength: number): string {
  if (products.documents.length === 0) {
    return '(no matching products)';
  }
  const summary = products.documents
    .map((doc) => `- ${doc.title}${doc.url ? ` (${doc.url})` : ''}: ${doc.content}`)
    .join('\n');
  return truncateForPrompt(summary, maxLength, 'products');
}

export function getWriterUserPrompt(ctx: WriterPromptContext): string {
  return `ASSIGNMENT:
${ctx.assignment}

RESEARCH:
${buildResearchSummary(ctx.research, ctx.maxResearchLength)}

PRODUCTS:
${buildProductSummary(ctx.products, ctx.maxProductLength)}${feedbackSection('EDITOR FEEDBACK ON YOUR LAST DRAFT (address all of it)', ctx.feedback)}`;
}
