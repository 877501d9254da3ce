/**
 * Creative Writer Module
 *
 * Multi-agent article writing: researcher, product, writer and editor agents
 * run by a streaming orchestrator, with LLM-judged evaluation afterwards.
 *
 * @example
 * const settings = getCreativeWriterSettings();
 * const agents = createDefaultAgents(settings);
 * for await (const event of runCreativeWorkflow(context, { agents }, { maxEditorRetries: 2 })) {
 *   console.log(event.role, event.status);
 * }
 */

export * from './types';
export { CONFIG, ConfigValidationError } from './config';
export {
  loadCreativeWriterSettings,
  getCreativeWriterSettings,
  resetCreativeWriterSettings,
  isModelProviderConfigured,
  isSearchConfigured,
  SettingsError,
} from './settings';
export type { CreativeWriterSettings, ModelSettings } from './settings';
export type { LanguageModelClient, EmbeddingClient } from './llm';
export { withRetry, isRetryableError, RetryAbortedError } from './retry';
export { createDefaultAgents, splitWriterOutput } from './agents';
export { InMemoryProductIndex } from './products/product-index';
export type { ProductIndex } from './products/product-index';
export { loadProductCatalog } from './products/catalog';
export { runCreativeWorkflow, validateWorkflowContext } from './orchestrator';
export type { WorkflowDeps, WorkflowOptions } from './orchestrator';
export { createDefaultEvaluators } from './evaluation/evaluators';
export type { Evaluator, EvaluationInput } from './evaluation/evaluators';
export { runEvaluation, scheduleEvaluation, buildEvaluationInput } from './evaluation/runner';
export type { EvaluationDeps } from './evaluation/runner';
export {
  InMemoryEvaluationStore,
  getEvaluationStore,
  setEvaluationStore,
} from './evaluation/store';
export type { EvaluationStore } from './evaluation/store';
