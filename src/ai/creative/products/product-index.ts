/**
 * Product Index
 *
 * In-memory vector index over the product catalog. Catalog embeddings are
 * computed on the first search and cached for the life of the index; a failed
 * load is not cached, so the next search tries again.
 *
 * The index is shared by every run in the process. The catalog load belongs to
 * none of them: it runs without a request signal, and each search only stops
 * waiting for it when its own signal aborts.
 */

import { cosineSimilarity } from 'ai';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { EmbeddingClient } from '../llm';
import { abortable } from '../retry';
import type { ProductDocument, ProductMatch } from '../types';

export interface ProductSearchOptions {
  /** Nearest neighbours kept per query */
  readonly topK: number;
  /** Matches below this similarity are dropped */
  readonly minSimilarity: number;
  /** Cap on the merged, de-duplicated result */
  readonly limit: number;
  readonly signal?: AbortSignal;
}

export interface ProductSearchResult {
  /** Ranked by score, highest first, unique by id */
  readonly matches: readonly ProductMatch[];
  /** Embedding tokens spent by this search (catalog embedding included on first use) */
  readonly embeddingTokens: number;
}

export interface ProductIndex {
  search(queries: readonly string[], options: ProductSearchOptions): Promise<ProductSearchResult>;
}

export interface InMemoryProductIndexDeps {
  readonly embeddings: EmbeddingClient;
  readonly loadDocuments: () => Promise<readonly ProductDocument[]>;
  readonly logger?: Logger;
}

interface IndexedDocument {
  readonly document: ProductDocument;
  readonly vector: number[];
}

interface LoadedIndex {
  readonly entries: readonly IndexedDocument[];
  readonly tokens: number;
}

function documentText(doc: ProductDocument): string {
  return `${doc.title}\n${doc.content}`;
}

export class InMemoryProductIndex implements ProductIndex {
  private loading: Promise<LoadedIndex> | undefined;
  private readonly log: Logger;

  constructor(private readonly deps: InMemoryProductIndexDeps) {
    this.log = deps.logger ?? createPrefixedLogger('[ProductIndex]');
  }

  async search(queries: readonly string[], options: ProductSearchOptions): Promise<ProductSearchResult> {
    if (queries.length === 0) {
      return { matches: [], embeddingTokens: 0 };
    }

    const firstLoad = this.loading === undefined;
    const index = await abortable(this.ensureLoaded(), options.signal);
    if (index.entries.length === 0) {
      return { matches: [], embeddingTokens: firstLoad ? index.tokens : 0 };
    }

    const embedded = await this.deps.embeddings.embedMany(queries, options.signal);
    const best = new Map<string, ProductMatch>();

    for (const queryVector of embedded.embeddings) {
      const ranked = index.entries
        .map((entry) => ({ entry, score: cosineSimilarity(queryVector, entry.vector) }))
        .filter((item) => item.score >= options.minSimilarity)
        .sort((a, b) => b.score - a.score)
        .slice(0, options.topK);

      for (const { entry, score } of ranked) {
        const existing = best.get(entry.document.id);
        if (!existing || existing.score < score) {
          best.set(entry.document.id, { ...entry.document, score });
        }
      }
    }

    const matches = [...best.values()].sort((a, b) => b.score - a.score).slice(0, options.limit);

    return {
      matches,
      embeddingTokens: embedded.tokens + (firstLoad ? index.tokens : 0),
    };
  }

  private ensureLoaded(): Promise<LoadedIndex> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<LoadedIndex> {
    const documents = await this.deps.loadDocuments();
    if (documents.length === 0) {
      this.log.warn('Product catalog is empty');
      return { entries: [], tokens: 0 };
    }

    const { embeddings, tokens } = await this.deps.embeddings.embedMany(documents.map(documentText));
    if (embeddings.length !== documents.length) {
      throw new Error(
        `Embedding count mismatch: expected ${documents.length}, got ${embeddings.length}`
      );
    }

    this.log.info(`Indexed ${documents.length} products with ${this.deps.embeddings.modelId}`);
    return {
      entries: documents.map((document, i) => ({ document, vector: embeddings[i] })),
      tokens,
    };
  }
}
