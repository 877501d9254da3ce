/**
 * AI Service
 *
 * Builds the model clients the creative writer agents run on: chat models
 * through OpenRouter and embeddings through an OpenAI-compatible endpoint.
 * Model identifiers and credentials come from CreativeWriterSettings.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { embedMany, generateObject, generateText } from 'ai';

import { AI_ENV_KEYS } from './config';
import type {
  EmbeddingClient,
  LanguageModelClient,
  ObjectGenerationRequest,
  TextGenerationRequest,
} from './creative/llm';
import {
  getCreativeWriterSettings,
  isModelProviderConfigured,
  isSearchConfigured,
  type CreativeWriterSettings,
  type ModelSettings,
} from './creative/settings';
import type { TokenUsage } from './creative/types';

/**
 * Chat-model roles that get their own client.
 */
export type ChatModelRole = Exclude<keyof ModelSettings, 'embedding'>;

interface SdkUsage {
  readonly inputTokens?: number;
  readonly outputTokens?: number;
}

function toTokenUsage(usage: SdkUsage | undefined): TokenUsage {
  return { input: usage?.inputTokens ?? 0, output: usage?.outputTokens ?? 0 };
}

/**
 * Creates a chat model client for one agent role.
 *
 * @param settings - Process settings (credentials, base URL, model ids)
 * @param role - Which agent's model to bind
 */
export function createLanguageModelClient(
  settings: CreativeWriterSettings,
  role: ChatModelRole
): LanguageModelClient {
  const openrouter = createOpenRouter({
    apiKey: settings.openrouter.apiKey,
    baseURL: settings.openrouter.baseUrl,
  });
  const modelId = settings.models[role];
  const model = openrouter.chat(modelId);

  return {
    modelId,

    async generateText(request: TextGenerationRequest) {
      const { text, usage } = await generateText({
        model,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        abortSignal: request.signal,
      });
      return { text: text.trim(), usage: toTokenUsage(usage) };
    },

    async generateObject<T>(request: ObjectGenerationRequest<T>) {
      const { object, usage } = await generateObject({
        model,
        schema: request.schema,
        schemaName: request.schemaName,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        abortSignal: request.signal,
      });
      // The SDK has already validated; parsing again pins the static type to T
      return { object: request.schema.parse(object), usage: toTokenUsage(usage) };
    },
  };
}

/**
 * Creates the embedding client used by the product index.
 */
export function createEmbeddingClient(settings: CreativeWriterSettings): EmbeddingClient {
  const provider = createOpenAI({
    apiKey: settings.embeddings.apiKey,
    baseURL: settings.embeddings.baseUrl,
  });
  const modelId = settings.models.embedding;
  const model = provider.textEmbeddingModel(modelId);

  return {
    modelId,

    async embedMany(values: readonly string[], signal?: AbortSignal) {
      const { embeddings, usage } = await embedMany({
        model,
        values: [...values],
        abortSignal: signal,
      });
      return { embeddings, tokens: usage.tokens };
    },
  };
}

/**
 * Get information about the current AI configuration
 * Shows active models (resolved from environment or defaults)
 */
export function getAIStatus(settings: CreativeWriterSettings = getCreativeWriterSettings()) {
  const describe = (task: keyof typeof AI_ENV_KEYS, model: string) => ({
    model,
    envVar: AI_ENV_KEYS[task],
    isOverridden: Boolean(process.env[AI_ENV_KEYS[task]]),
  });

  return {
    configured: isModelProviderConfigured(settings),
    searchConfigured: isSearchConfigured(settings),
    maxEditorRetries: settings.maxEditorRetries,
    evaluationEnabled: settings.evaluationEnabled,
    tasks: {
      researcher: describe('RESEARCHER', settings.models.researcher),
      product: describe('PRODUCT', settings.models.product),
      writer: describe('WRITER', settings.models.writer),
      editor: describe('EDITOR', settings.models.editor),
      evaluator: describe('EVALUATOR', settings.models.evaluator),
      embedding: describe('EMBEDDING', settings.models.embedding),
    },
  };
}
