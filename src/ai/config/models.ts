/**
 * AI Configuration Utilities
 * 
 * Centralized configuration for AI models and environment variables.
 * Change default models here - no need to modify individual agents.
 */

/**
 * Environment variable names for each AI task
 * Set these env vars to override the default models
 */
export const AI_ENV_KEYS = {
  RESEARCHER: 'AI_MODEL_RESEARCHER',
  PRODUCT: 'AI_MODEL_PRODUCT',
  WRITER: 'AI_MODEL_WRITER',
  EDITOR: 'AI_MODEL_EDITOR',
  EVALUATOR: 'AI_MODEL_EVALUATOR',
  EMBEDDING: 'AI_MODEL_EMBEDDING',
} as const;

/**
 * Default models for each AI task
 * 
 * Change these values to switch models globally.
 * Environment variables (AI_ENV_KEYS) take precedence over these defaults.
 * 
 * Chat models are OpenRouter identifiers. The embedding model is served by the
 * OpenAI-compatible embeddings endpoint (EMBEDDING_BASE_URL).
 */
export const AI_DEFAULT_MODELS = {
  RESEARCHER: 'openai/gpt-4o-mini',
  PRODUCT: 'openai/gpt-4o-mini',
  WRITER: 'anthropic/claude-sonnet-4',
  EDITOR: 'openai/gpt-4o',
  EVALUATOR: 'openai/gpt-4o-mini',
  EMBEDDING: 'text-embedding-3-small',
} as const;

export type AITaskKey = keyof typeof AI_ENV_KEYS;
export type AIEnvKey = typeof AI_ENV_KEYS[keyof typeof AI_ENV_KEYS];

/**
 * Get the model for a specific AI task
 * Checks environment variable first, falls back to default model
 * 
 * @param taskKey - The AI task key (e.g., 'WRITER')
 * @param env - Environment to read (defaults to process.env)
 * @returns The model identifier string
 * 
 * @example
 * const model = getModel('WRITER');
 * // Returns env var AI_MODEL_WRITER if set, otherwise 'anthropic/claude-sonnet-4'
 */
export function getModel(taskKey: AITaskKey, env: NodeJS.ProcessEnv = process.env): string {
  const envKey = AI_ENV_KEYS[taskKey];
  const defaultModel = AI_DEFAULT_MODELS[taskKey];
  return env[envKey] || defaultModel;
}
