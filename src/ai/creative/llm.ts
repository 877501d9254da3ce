/**
 * Model Client Ports
 *
 * The narrow surface the agents and evaluators call into. Production
 * implementations live in `src/ai/service.ts` (Vercel AI SDK over OpenRouter
 * and an OpenAI-compatible embeddings endpoint); tests pass plain objects.
 */

import type { z } from 'zod';

import type { TokenUsage } from './types';

export interface TextGenerationRequest {
  readonly system: string;
  readonly prompt: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
  readonly signal?: AbortSignal;
}

export interface TextGenerationResult {
  readonly text: string;
  readonly usage: TokenUsage;
}

export interface ObjectGenerationRequest<T> extends TextGenerationRequest {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Optional name passed to providers that support named JSON schemas */
  readonly schemaName?: string;
}

export interface ObjectGenerationResult<T> {
  readonly object: T;
  readonly usage: TokenUsage;
}

/**
 * A chat model bound to one model identifier.
 */
export interface LanguageModelClient {
  readonly modelId: string;
  generateText(request: TextGenerationRequest): Promise<TextGenerationResult>;
  generateObject<T>(request: ObjectGenerationRequest<T>): Promise<ObjectGenerationResult<T>>;
}

export interface EmbeddingResult {
  readonly embeddings: number[][];
  readonly tokens: number;
}

/**
 * An embedding model bound to one model identifier.
 */
export interface EmbeddingClient {
  readonly modelId: string;
  embedMany(values: readonly string[], signal?: AbortSignal): Promise<EmbeddingResult>;
}
