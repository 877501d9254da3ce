/**
 * AI Service Integration Tests
 *
 * Real AI SDK clients against MSW-mocked OpenRouter and embeddings endpoints.
 */

import { describe, it, expect } from 'vitest';
import { http, HttpResponse, type PathParams } from 'msw';
import { z } from 'zod';

import { server } from '../../mocks/server';
import { chatCompletion, EMBEDDINGS_URL, MOCK_CHAT_TEXT, OPENROUTER_CHAT_URL } from '../../mocks/handlers';
import {
  createEmbeddingClient,
  createLanguageModelClient,
  getAIStatus,
} from '../../../src/ai/service';
import { loadCreativeWriterSettings } from '../../../src/ai/creative/settings';

const settings = loadCreativeWriterSettings({
  OPENROUTER_API_KEY: 'test-openrouter-key',
  EMBEDDING_API_KEY: 'test-embedding-key',
  AI_MODEL_WRITER: 'test/writer-model',
});

describe('createLanguageModelClient', () => {
  it('generates text with the role model and maps usage', async () => {
    let requestedModel: string | undefined;
    let auth: string | null = null;
    server.use(
      http.post<PathParams, { model?: string }>(OPENROUTER_CHAT_URL, async ({ request }) => {
        const body: { model?: string } = await request.json();
        requestedModel = body.model;
        auth = request.headers.get('authorization');
        return HttpResponse.json(chatCompletion(`  ${MOCK_CHAT_TEXT}\n`, body.model));
      })
    );

    const client = createLanguageModelClient(settings, 'writer');
    const result = await client.generateText({ system: 'You write.', prompt: 'Write.' });

    expect(client.modelId).toBe('test/writer-model');
    expect(requestedModel).toBe('test/writer-model');
    expect(auth).toBe('Bearer test-openrouter-key');
    expect(result).toEqual({ text: MOCK_CHAT_TEXT, usage: { input: 100, output: 200 } });
  });

  it('generates objects validated by the schema', async () => {
    server.use(
      http.post(OPENROUTER_CHAT_URL, () =>
        HttpResponse.json(chatCompletion(JSON.stringify({ decision: 'accept' })))
      )
    );
    const schema = z.object({ decision: z.enum(['accept', 'reject']), editorFeedback: z.string().default('') });

    const result = await createLanguageModelClient(settings, 'editor').generateObject({
      schema,
      schemaName: 'EditorReview',
      system: 'You edit.',
      prompt: 'Review.',
    });

    expect(result.object).toEqual({ decision: 'accept', editorFeedback: '' });
    expect(result.usage).toEqual({ input: 100, output: 200 });
  });

  it('surfaces provider errors', async () => {
    server.use(
      http.post(OPENROUTER_CHAT_URL, () =>
        HttpResponse.json({ error: { message: 'Invalid API key', code: 401 } }, { status: 401 })
      )
    );

    await expect(
      createLanguageModelClient(settings, 'writer').generateText({ system: 's', prompt: 'p' })
    ).rejects.toThrow();
  });
});

describe('createEmbeddingClient', () => {
  it('embeds a batch and reports tokens', async () => {
    let input: unknown;
    server.use(
      http.post<PathParams, { input?: unknown }>(EMBEDDINGS_URL, async ({ request }) => {
        const body: { input?: unknown } = await request.json();
        input = body.input;
        return HttpResponse.json({
          object: 'list',
          data: [
            { object: 'embedding', index: 0, embedding: [0.1, 0.2] },
            { object: 'embedding', index: 1, embedding: [0.3, 0.4] },
          ],
          model: 'text-embedding-3-small',
          usage: { prompt_tokens: 12, total_tokens: 12 },
        });
      })
    );

    const result = await createEmbeddingClient(settings).embedMany(['tent', 'jacket']);

    expect(input).toEqual(['tent', 'jacket']);
    expect(result).toEqual({ embeddings: [[0.1, 0.2], [0.3, 0.4]], tokens: 12 });
  });
});

describe('configuration status', () => {
  it('reports whether both providers are configured', () => {
    expect(getAIStatus(settings).configured).toBe(true);
    expect(getAIStatus(loadCreativeWriterSettings({ OPENROUTER_API_KEY: 'test-key' })).configured).toBe(false);
  });

  it('lists each role model', () => {
    const status = getAIStatus(settings);

    expect(status.configured).toBe(true);
    expect(status.searchConfigured).toBe(false);
    expect(status.tasks.writer).toMatchObject({ model: 'test/writer-model', envVar: 'AI_MODEL_WRITER' });
    expect(status.tasks.embedding).toMatchObject({ model: 'text-embedding-3-small', envVar: 'AI_MODEL_EMBEDDING' });
  });
});
