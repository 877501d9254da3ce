/**
 * Runtime Settings
 *
 * Process-wide configuration read once from the environment: credentials,
 * endpoints, model identifiers and workflow limits. The result is frozen and
 * passed explicitly into the workflow; nothing downstream reads process.env.
 */

import path from 'path';
import { z } from 'zod';

import { getModel } from '../config';
import { WORKFLOW_CONFIG } from './config';

export class SettingsError extends Error {
  constructor(message: string) {
    super(`Invalid creative writer settings: ${message}`);
    this.name = 'SettingsError';
  }
}

const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_EMBEDDING_BASE_URL = 'https://api.openai.com/v1';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().trim().optional(),
  OPENROUTER_BASE_URL: z.string().url().default(DEFAULT_OPENROUTER_BASE_URL),
  EMBEDDING_API_KEY: z.string().trim().optional(),
  OPENAI_API_KEY: z.string().trim().optional(),
  EMBEDDING_BASE_URL: z.string().url().default(DEFAULT_EMBEDDING_BASE_URL),
  TAVILY_API_KEY: z.string().trim().optional(),
  MAX_EDITOR_RETRIES: z.coerce.number().int().min(0).max(10).default(WORKFLOW_CONFIG.MAX_EDITOR_RETRIES),
  WORKFLOW_TIMEOUT_MS: z.coerce.number().int().min(0).default(WORKFLOW_CONFIG.DEFAULT_TIMEOUT_MS),
  EVALUATION_ENABLED: booleanFlag.default('true'),
  PRODUCT_CATALOG_PATH: z.string().min(1).optional(),
});

export interface ModelSettings {
  readonly researcher: string;
  readonly product: string;
  readonly writer: string;
  readonly editor: string;
  readonly evaluator: string;
  readonly embedding: string;
}

export interface CreativeWriterSettings {
  readonly openrouter: { readonly apiKey: string; readonly baseUrl: string };
  readonly embeddings: { readonly apiKey: string; readonly baseUrl: string };
  readonly tavilyApiKey: string;
  readonly models: ModelSettings;
  readonly maxEditorRetries: number;
  readonly timeoutMs: number;
  readonly evaluationEnabled: boolean;
  readonly productCatalogPath: string;
}

function blankToEmpty(value: string | undefined): string {
  return value && value.length > 0 ? value : '';
}

/**
 * Parses the environment into frozen settings.
 *
 * Missing API keys are not an error here: `isModelProviderConfigured` lets the
 * HTTP layer answer 400 before a stream opens.
 *
 * @throws SettingsError when a value is present but malformed
 */
export function loadCreativeWriterSettings(env: NodeJS.ProcessEnv = process.env): CreativeWriterSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SettingsError(details);
  }

  const values = parsed.data;
  const embeddingKey = blankToEmpty(values.EMBEDDING_API_KEY) || blankToEmpty(values.OPENAI_API_KEY);

  return Object.freeze({
    openrouter: Object.freeze({
      apiKey: blankToEmpty(values.OPENROUTER_API_KEY),
      baseUrl: values.OPENROUTER_BASE_URL,
    }),
    embeddings: Object.freeze({
      apiKey: embeddingKey,
      baseUrl: values.EMBEDDING_BASE_URL,
    }),
    tavilyApiKey: blankToEmpty(values.TAVILY_API_KEY),
    models: Object.freeze({
      researcher: getModel('RESEARCHER', env),
      product: getModel('PRODUCT', env),
      writer: getModel('WRITER', env),
      editor: getModel('EDITOR', env),
      evaluator: getModel('EVALUATOR', env),
      embedding: getModel('EMBEDDING', env),
    }),
    maxEditorRetries: values.MAX_EDITOR_RETRIES,
    timeoutMs: values.WORKFLOW_TIMEOUT_MS,
    evaluationEnabled: values.EVALUATION_ENABLED,
    productCatalogPath:
      values.PRODUCT_CATALOG_PATH ?? path.join(process.cwd(), 'data', 'products.json'),
  });
}

export function isModelProviderConfigured(settings: CreativeWriterSettings): boolean {
  return settings.openrouter.apiKey.length > 0 && settings.embeddings.apiKey.length > 0;
}

export function isSearchConfigured(settings: CreativeWriterSettings): boolean {
  return settings.tavilyApiKey.length > 0;
}

let cachedSettings: CreativeWriterSettings | undefined;

/**
 * Settings for this process, loaded on first use.
 */
export function getCreativeWriterSettings(): CreativeWriterSettings {
  if (!cachedSettings) {
    cachedSettings = loadCreativeWriterSettings();
  }
  return cachedSettings;
}

/**
 * Drops the cached settings so the next call re-reads the environment. Used by tests.
 */
export function resetCreativeWriterSettings(): void {
  cachedSettings = undefined;
}
