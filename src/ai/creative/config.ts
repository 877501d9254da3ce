/**
 * Creative Writer Configuration
 *
 * Centralized tuning for all agents, the workflow loop and the evaluators.
 * All magic numbers and tuning parameters should be defined here.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Creative writer config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates that a MIN value is less than or equal to MAX value.
 */
function validateMinMax(
  minValue: number,
  maxValue: number,
  minName: string,
  maxName: string
): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

/**
 * Validates that a value is positive.
 */
function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

/**
 * Validates that a value is non-negative.
 */
function validateNonNegative(value: number, name: string): void {
  if (value < 0) {
    throw new ConfigValidationError(`${name} cannot be negative (got ${value})`);
  }
}

/**
 * Validates temperature is in valid range (0-2).
 */
function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Request Constraints
// ============================================================================

/**
 * Limits on the three caller-supplied briefs.
 * Used by the request schema and by workflow context validation.
 */
export const CONTEXT_CONSTRAINTS = {
  MIN_LENGTH: 1,
  MAX_LENGTH: 5000,
} as const;

// ============================================================================
// Researcher Agent Configuration
// ============================================================================

export const RESEARCHER_CONFIG = {
  /**
   * Temperature for query planning and findings extraction.
   *
   * Low (0.2): findings must stay faithful to the search hits.
   */
  TEMPERATURE: 0.2,
  /** Queries the model may plan for one research brief */
  MIN_QUERIES: 1,
  MAX_QUERIES: 4,
  /** Results requested from the search tool per query */
  RESULTS_PER_QUERY: 5,
  /** Characters of each search hit passed to the extraction prompt */
  MAX_SNIPPET_LENGTH: 600,
  /** Upper bound on web findings kept */
  MAX_WEB_FINDINGS: 10,
  /** Output token cap for the extraction call */
  MAX_OUTPUT_TOKENS: 2000,
} as const;

// ============================================================================
// Product Agent Configuration
// ============================================================================

export const PRODUCT_CONFIG = {
  /** Temperature for query generation */
  TEMPERATURE: 0.3,
  /** Queries the model may produce for one product brief */
  MIN_QUERIES: 1,
  MAX_QUERIES: 5,
  /** Nearest neighbours returned per query */
  TOP_K_PER_QUERY: 3,
  /** Results below this cosine similarity are dropped */
  MIN_SIMILARITY: 0.2,
  /** Upper bound on de-duplicated product documents returned */
  MAX_DOCUMENTS: 8,
} as const;

// ============================================================================
// Writer Agent Configuration
// ============================================================================

export const WRITER_CONFIG = {
  /**
   * Temperature for article prose.
   *
   * Higher (0.7): the writer should sound engaging, research and product
   * context constrain the facts.
   */
  TEMPERATURE: 0.7,
  /** Output token cap for a full article plus feedback */
  MAX_OUTPUT_TOKENS: 3000,
  /** Characters of serialized research passed to the prompt */
  MAX_RESEARCH_CONTEXT_LENGTH: 8000,
  /** Characters of serialized product documents passed to the prompt */
  MAX_PRODUCT_CONTEXT_LENGTH: 6000,
  /** Line that separates the article from the writer's feedback */
  FEEDBACK_SEPARATOR: '---',
} as const;

// ============================================================================
// Editor Agent Configuration
// ============================================================================

export const EDITOR_CONFIG = {
  /**
   * Temperature for the accept/reject decision.
   *
   * Low (0.2) so the same article gets the same verdict.
   */
  TEMPERATURE: 0.2,
  /** Output token cap for the decision object */
  MAX_OUTPUT_TOKENS: 1200,
  /** Maximum article length included in the critique prompt (chars) */
  MAX_ARTICLE_CONTENT_LENGTH: 30000,
} as const;

// ============================================================================
// Workflow Configuration
// ============================================================================

export const WORKFLOW_CONFIG = {
  /**
   * Maximum editor rejections that send the article back to the writer.
   * One more rejection ends the run with RETRY_EXHAUSTED.
   */
  MAX_EDITOR_RETRIES: 2,
  /** Overall run timeout (ms) - 0 means no timeout */
  DEFAULT_TIMEOUT_MS: 0,
  /** Feedback text used when a role has nothing to say */
  NO_FEEDBACK: 'No Feedback',
} as const;

// ============================================================================
// Streaming Configuration
// ============================================================================

export const STREAM_CONFIG = {
  /** Interval between keep-alive comments on SSE connections (ms) */
  HEARTBEAT_INTERVAL_MS: 15000,
} as const;

// ============================================================================
// Evaluation Configuration
// ============================================================================

export const EVALUATION_CONFIG = {
  /** Temperature for judge calls */
  TEMPERATURE: 0,
  /** Lowest and highest quality score a judge may return */
  MIN_SCORE: 1,
  MAX_SCORE: 5,
  /** Highest harm severity a safety judge may return */
  MAX_SEVERITY: 7,
  /** Characters of article text sent to a judge */
  MAX_RESPONSE_LENGTH: 20000,
  /** Characters of grounding context sent to a judge */
  MAX_CONTEXT_LENGTH: 12000,
  /** Output token cap for one judge call */
  MAX_OUTPUT_TOKENS: 400,
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_CONFIG = {
  /** Maximum number of retry attempts */
  MAX_RETRIES: 3,
  /** Initial delay in milliseconds before first retry */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay in milliseconds between retries */
  MAX_DELAY_MS: 10000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// Unified Config Export
// ============================================================================

/**
 * All creative writer configuration in a single namespace.
 *
 * @example
 * import { CONFIG } from './config';
 * const temp = CONFIG.writer.TEMPERATURE;
 */
export const CONFIG = {
  context: CONTEXT_CONSTRAINTS,
  researcher: RESEARCHER_CONFIG,
  product: PRODUCT_CONFIG,
  writer: WRITER_CONFIG,
  editor: EDITOR_CONFIG,
  workflow: WORKFLOW_CONFIG,
  stream: STREAM_CONFIG,
  evaluation: EVALUATION_CONFIG,
  retry: RETRY_CONFIG,
} as const;

// ============================================================================
// Runtime Configuration Validation
// ============================================================================

/**
 * Validates all configuration values at module load time.
 * Throws ConfigValidationError if any values are inconsistent.
 */
function validateConfiguration(): void {
  validateMinMax(
    CONTEXT_CONSTRAINTS.MIN_LENGTH,
    CONTEXT_CONSTRAINTS.MAX_LENGTH,
    'CONTEXT_CONSTRAINTS.MIN_LENGTH',
    'CONTEXT_CONSTRAINTS.MAX_LENGTH'
  );

  // Researcher
  validateTemperature(RESEARCHER_CONFIG.TEMPERATURE, 'RESEARCHER_CONFIG.TEMPERATURE');
  validateMinMax(
    RESEARCHER_CONFIG.MIN_QUERIES,
    RESEARCHER_CONFIG.MAX_QUERIES,
    'RESEARCHER_CONFIG.MIN_QUERIES',
    'RESEARCHER_CONFIG.MAX_QUERIES'
  );
  validatePositive(RESEARCHER_CONFIG.RESULTS_PER_QUERY, 'RESEARCHER_CONFIG.RESULTS_PER_QUERY');
  validatePositive(RESEARCHER_CONFIG.MAX_SNIPPET_LENGTH, 'RESEARCHER_CONFIG.MAX_SNIPPET_LENGTH');
  validatePositive(RESEARCHER_CONFIG.MAX_WEB_FINDINGS, 'RESEARCHER_CONFIG.MAX_WEB_FINDINGS');

  // Product
  validateTemperature(PRODUCT_CONFIG.TEMPERATURE, 'PRODUCT_CONFIG.TEMPERATURE');
  validateMinMax(
    PRODUCT_CONFIG.MIN_QUERIES,
    PRODUCT_CONFIG.MAX_QUERIES,
    'PRODUCT_CONFIG.MIN_QUERIES',
    'PRODUCT_CONFIG.MAX_QUERIES'
  );
  validatePositive(PRODUCT_CONFIG.TOP_K_PER_QUERY, 'PRODUCT_CONFIG.TOP_K_PER_QUERY');
  validatePositive(PRODUCT_CONFIG.MAX_DOCUMENTS, 'PRODUCT_CONFIG.MAX_DOCUMENTS');
  if (PRODUCT_CONFIG.MIN_SIMILARITY < -1 || PRODUCT_CONFIG.MIN_SIMILARITY > 1) {
    throw new ConfigValidationError(
      `PRODUCT_CONFIG.MIN_SIMILARITY must be between -1 and 1 (got ${PRODUCT_CONFIG.MIN_SIMILARITY})`
    );
  }

  // Writer
  validateTemperature(WRITER_CONFIG.TEMPERATURE, 'WRITER_CONFIG.TEMPERATURE');
  validatePositive(WRITER_CONFIG.MAX_OUTPUT_TOKENS, 'WRITER_CONFIG.MAX_OUTPUT_TOKENS');
  validatePositive(WRITER_CONFIG.MAX_RESEARCH_CONTEXT_LENGTH, 'WRITER_CONFIG.MAX_RESEARCH_CONTEXT_LENGTH');
  validatePositive(WRITER_CONFIG.MAX_PRODUCT_CONTEXT_LENGTH, 'WRITER_CONFIG.MAX_PRODUCT_CONTEXT_LENGTH');

  // Editor
  validateTemperature(EDITOR_CONFIG.TEMPERATURE, 'EDITOR_CONFIG.TEMPERATURE');
  validatePositive(EDITOR_CONFIG.MAX_OUTPUT_TOKENS, 'EDITOR_CONFIG.MAX_OUTPUT_TOKENS');
  validatePositive(EDITOR_CONFIG.MAX_ARTICLE_CONTENT_LENGTH, 'EDITOR_CONFIG.MAX_ARTICLE_CONTENT_LENGTH');

  // Workflow
  validateNonNegative(WORKFLOW_CONFIG.MAX_EDITOR_RETRIES, 'WORKFLOW_CONFIG.MAX_EDITOR_RETRIES');
  validateNonNegative(WORKFLOW_CONFIG.DEFAULT_TIMEOUT_MS, 'WORKFLOW_CONFIG.DEFAULT_TIMEOUT_MS');
  validatePositive(STREAM_CONFIG.HEARTBEAT_INTERVAL_MS, 'STREAM_CONFIG.HEARTBEAT_INTERVAL_MS');

  // Evaluation
  validateTemperature(EVALUATION_CONFIG.TEMPERATURE, 'EVALUATION_CONFIG.TEMPERATURE');
  validateMinMax(
    EVALUATION_CONFIG.MIN_SCORE,
    EVALUATION_CONFIG.MAX_SCORE,
    'EVALUATION_CONFIG.MIN_SCORE',
    'EVALUATION_CONFIG.MAX_SCORE'
  );
  validatePositive(EVALUATION_CONFIG.MAX_SEVERITY, 'EVALUATION_CONFIG.MAX_SEVERITY');

  // Retry
  validatePositive(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  validatePositive(RETRY_CONFIG.BACKOFF_MULTIPLIER, 'RETRY_CONFIG.BACKOFF_MULTIPLIER');
}

// Run validation at module load time
validateConfiguration();
