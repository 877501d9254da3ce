import { describe, it, expect, vi } from 'vitest';

import type { EmbeddingClient } from '../../../src/ai/creative/llm';
import { InMemoryProductIndex } from '../../../src/ai/creative/products/product-index';
import type { ProductDocument } from '../../../src/ai/creative/types';
import { createMockLogger } from '../helpers';

const CATALOG: ProductDocument[] = [
  { id: 'tent', title: 'Ridgeline Tent', content: 'Two-person tent' },
  { id: 'hybrid', title: 'Bivy Shell', content: 'Half tent, half jacket' },
  { id: 'jacket', title: 'Stormshell Jacket', content: 'Waterproof shell' },
];

const VECTORS: Record<string, number[]> = {
  'Ridgeline Tent\nTwo-person tent': [1, 0, 0],
  'Bivy Shell\nHalf tent, half jacket': [0.6, 0.8, 0],
  'Stormshell Jacket\nWaterproof shell': [0, 1, 0],
  tent: [1, 0, 0],
  'rain jacket': [0, 1, 0],
  'sleeping bag': [0, 0, 1],
};

/**
 * Looks vectors up by text; one token per value.
 */
function createFakeEmbeddings(override?: (values: readonly string[]) => number[][]) {
  const embedMany = vi.fn(async (values: readonly string[]) => {
    const embeddings = override
      ? override(values)
      : values.map((value) => {
          const vector = VECTORS[value];
          if (!vector) throw new Error(`No test vector for "${value}"`);
          return vector;
        });
    return { embeddings, tokens: values.length };
  });
  const client: EmbeddingClient = { modelId: 'test-embedding', embedMany };
  return { client, embedMany };
}

const OPTIONS = { topK: 2, minSimilarity: 0.2, limit: 8 };

describe('InMemoryProductIndex', () => {
  it('does not embed the catalog until the first search', () => {
    const { client, embedMany } = createFakeEmbeddings();
    const loadDocuments = vi.fn(async () => CATALOG);

    new InMemoryProductIndex({ embeddings: client, loadDocuments, logger: createMockLogger() });

    expect(loadDocuments).not.toHaveBeenCalled();
    expect(embedMany).not.toHaveBeenCalled();
  });

  it('merges matches across queries, keeping the best score per product', async () => {
    const { client } = createFakeEmbeddings();
    const index = new InMemoryProductIndex({
      embeddings: client,
      loadDocuments: async () => CATALOG,
      logger: createMockLogger(),
    });

    const { matches } = await index.search(['tent', 'rain jacket'], OPTIONS);

    expect(matches.map((m) => m.id)).toEqual(['tent', 'jacket', 'hybrid']);
    expect(matches[0].score).toBeCloseTo(1);
    expect(matches[1].score).toBeCloseTo(1);
    expect(matches[2].score).toBeCloseTo(0.8);
    expect(matches[0]).toMatchObject({ title: 'Ridgeline Tent', content: 'Two-person tent' });
  });

  it('applies topK per query, minimum similarity and the overall limit', async () => {
    const { client } = createFakeEmbeddings();
    const index = new InMemoryProductIndex({
      embeddings: client,
      loadDocuments: async () => CATALOG,
      logger: createMockLogger(),
    });

    const topOne = await index.search(['rain jacket'], { ...OPTIONS, topK: 1 });
    expect(topOne.matches.map((m) => m.id)).toEqual(['jacket']);

    const strict = await index.search(['tent'], { ...OPTIONS, minSimilarity: 0.7 });
    expect(strict.matches.map((m) => m.id)).toEqual(['tent']);

    const limited = await index.search(['tent', 'rain jacket'], { ...OPTIONS, limit: 1 });
    expect(limited.matches.map((m) => m.id)).toEqual(['tent']);

    const none = await index.search(['sleeping bag'], OPTIONS);
    expect(none.matches).toEqual([]);
  });

  it('embeds the catalog once and counts its tokens only on the first search', async () => {
    const { client, embedMany } = createFakeEmbeddings();
    const loadDocuments = vi.fn(async () => CATALOG);
    const index = new InMemoryProductIndex({ embeddings: client, loadDocuments, logger: createMockLogger() });

    const first = await index.search(['tent', 'rain jacket'], OPTIONS);
    const second = await index.search(['tent'], OPTIONS);

    expect(first.embeddingTokens).toBe(5);
    expect(second.embeddingTokens).toBe(1);
    expect(loadDocuments).toHaveBeenCalledTimes(1);
    expect(embedMany).toHaveBeenCalledTimes(3);
    expect(embedMany.mock.calls[0][0]).toEqual([
      'Ridgeline Tent\nTwo-person tent',
      'Bivy Shell\nHalf tent, half jacket',
      'Stormshell Jacket\nWaterproof shell',
    ]);
  });

  it('returns nothing for an empty query list without loading', async () => {
    const loadDocuments = vi.fn(async () => CATALOG);
    const index = new InMemoryProductIndex({
      embeddings: createFakeEmbeddings().client,
      loadDocuments,
      logger: createMockLogger(),
    });

    await expect(index.search([], OPTIONS)).resolves.toEqual({ matches: [], embeddingTokens: 0 });
    expect(loadDocuments).not.toHaveBeenCalled();
  });

  it('returns nothing for an empty catalog', async () => {
    const logger = createMockLogger();
    const { client, embedMany } = createFakeEmbeddings();
    const index = new InMemoryProductIndex({ embeddings: client, loadDocuments: async () => [], logger });

    await expect(index.search(['tent'], OPTIONS)).resolves.toEqual({ matches: [], embeddingTokens: 0 });
    expect(embedMany).not.toHaveBeenCalled();
    expect(logger.lines).toContainEqual({ level: 'warn', message: 'Product catalog is empty' });
  });

  it('rejects a short embedding batch and retries the load on the next search', async () => {
    let calls = 0;
    const { client } = createFakeEmbeddings((values) => {
      calls++;
      if (calls === 1) return [[1, 0, 0]];
      return values.map((value) => VECTORS[value] ?? [0, 0, 0]);
    });
    const loadDocuments = vi.fn(async () => CATALOG);
    const index = new InMemoryProductIndex({ embeddings: client, loadDocuments, logger: createMockLogger() });

    await expect(index.search(['tent'], OPTIONS)).rejects.toThrow('Embedding count mismatch: expected 3, got 1');

    const retried = await index.search(['tent'], OPTIONS);
    expect(retried.matches[0].id).toBe('tent');
    expect(loadDocuments).toHaveBeenCalledTimes(2);
  });

  it('keeps loading the shared catalog when the search that started it is aborted', async () => {
    let releaseCatalog: () => void = () => undefined;
    const embedMany = vi.fn(async (values: readonly string[], signal?: AbortSignal) => {
      if (values.length === CATALOG.length) {
        await new Promise<void>((resolve, reject) => {
          releaseCatalog = resolve;
          signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
        });
      }
      if (signal?.aborted) throw signal.reason;
      return { embeddings: values.map((value) => VECTORS[value] ?? [0, 0, 0]), tokens: values.length };
    });
    const index = new InMemoryProductIndex({
      embeddings: { modelId: 'test-embedding', embedMany },
      loadDocuments: async () => CATALOG,
      logger: createMockLogger(),
    });

    const first = new AbortController();
    const firstSearch = index.search(['tent'], { ...OPTIONS, signal: first.signal });
    const secondSearch = index.search(['rain jacket'], { ...OPTIONS, signal: new AbortController().signal });
    await vi.waitFor(() => expect(embedMany).toHaveBeenCalledTimes(1));

    first.abort();
    expect(await firstSearch.catch((e: unknown) => e)).toBe(first.signal.reason);

    releaseCatalog();
    const { matches } = await secondSearch;

    expect(matches.map((m) => m.id)).toEqual(['jacket', 'hybrid']);
    expect(embedMany.mock.calls[0][1]).toBeUndefined();
  });
});
