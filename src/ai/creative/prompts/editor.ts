/**
 * Editor Agent Prompts
 */

import { truncateForPrompt } from './shared';

export function getEditorSystemPrompt(): string {
  return `You are the editor of an outdoor gear retailer's blog.
Review the draft article and the writer's notes, then decide:
- accept: the article is accurate, on-assignment, well structured and ready to publish
- reject: it needs another draft

Always give:
- editorFeedback: concrete instructions for the writer's next draft (or a short note on why it was accepted)
- researchFeedback: what additional research would have helped, or an empty string`;
}

export function getEditorUserPrompt(article: string, writerFeedback: string, maxArticleLength: number): string {
  return `ARTICLE:
${truncateForPrompt(article, maxArticleLength, 'article')}

WRITER NOTES:
${writerFeedback.trim() || '(none)'}`;
}
