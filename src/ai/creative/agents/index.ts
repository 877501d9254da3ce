/**
 * Agents Module
 *
 * The four agent clients and the factory that wires them to the real
 * model provider, search tool and product catalog.
 */

import { createEmbeddingClient, createLanguageModelClient } from '../../service';
import { tavilySearch } from '../../tools/tavily';
import { loadProductCatalog } from '../products/catalog';
import { InMemoryProductIndex } from '../products/product-index';
import type { CreativeWriterSettings } from '../settings';
import type { CreativeAgents } from '../types';
import { createEditorAgent } from './editor';
import { createProductAgent } from './product';
import { createResearcherAgent, type WebSearchFn } from './researcher';
import { createWriterAgent } from './writer';

export { createResearcherAgent, runResearcher, normalizeQueries } from './researcher';
export type { ResearcherDeps, WebSearchFn, SearchRequest } from './researcher';
export { createProductAgent, runProductAgent } from './product';
export type { ProductDeps } from './product';
export { createWriterAgent, runWriter, splitWriterOutput } from './writer';
export type { WriterDeps } from './writer';
export { createEditorAgent, runEditor } from './editor';
export type { EditorDeps } from './editor';

/**
 * Builds the production agents. The product index is shared so catalog
 * embeddings are computed once per set of agents.
 */
export function createDefaultAgents(settings: CreativeWriterSettings): CreativeAgents {
  const search: WebSearchFn = (query, request) =>
    tavilySearch(query, {
      apiKey: settings.tavilyApiKey,
      topic: request.topic,
      maxResults: request.maxResults,
      signal: request.signal,
    });

  const index = new InMemoryProductIndex({
    embeddings: createEmbeddingClient(settings),
    loadDocuments: () => loadProductCatalog(settings.productCatalogPath),
  });

  return {
    researcher: createResearcherAgent({ llm: createLanguageModelClient(settings, 'researcher'), search }),
    product: createProductAgent({ llm: createLanguageModelClient(settings, 'product'), index }),
    writer: createWriterAgent({ llm: createLanguageModelClient(settings, 'writer') }),
    editor: createEditorAgent({ llm: createLanguageModelClient(settings, 'editor') }),
  };
}
