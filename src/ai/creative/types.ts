/**
 * Creative Writer Types
 *
 * Shared types for the agent clients, the workflow orchestrator, the
 * streaming transport and the background evaluation runner.
 */

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for workflow failures.
 */
export type WorkflowErrorCode =
  | 'CONFIG_ERROR'
  | 'CONTEXT_INVALID'
  | 'RESEARCHER_FAILED'
  | 'PRODUCT_FAILED'
  | 'WRITER_FAILED'
  | 'EDITOR_FAILED'
  | 'RETRY_EXHAUSTED'
  | 'TIMEOUT'
  | 'CANCELLED';

/**
 * Custom error class for workflow failures.
 * Provides structured error information for programmatic handling.
 *
 * @example
 * try {
 *   await researcher.run(input);
 * } catch (error) {
 *   if (error instanceof WorkflowError && error.code === 'CANCELLED') {
 *     // client went away
 *   }
 * }
 */
export class WorkflowError extends Error {
  readonly name = 'WorkflowError';

  constructor(
    readonly code: WorkflowErrorCode,
    message: string,
    readonly cause?: Error
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorkflowError);
    }
  }
}

/**
 * Type guard to check if an error is a WorkflowError.
 */
export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

// ============================================================================
// Token Usage
// ============================================================================

/**
 * Token usage for one or more LLM calls.
 */
export interface TokenUsage {
  readonly input: number;
  readonly output: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return { input: 0, output: 0 };
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return { input: a.input + b.input, output: a.output + b.output };
}

// ============================================================================
// Workflow Context
// ============================================================================

/**
 * The three free-form briefs supplied by the caller.
 * Immutable inputs to one orchestration run.
 */
export interface WorkflowContext {
  /** What the researcher should look up on the web */
  readonly research: string;
  /** What the product agent should look up in the catalog */
  readonly products: string;
  /** The writing assignment */
  readonly assignment: string;
}

// ============================================================================
// Agent Results
// ============================================================================

export type AgentRole = 'researcher' | 'product' | 'writer' | 'editor';

/**
 * Every role that can appear on a workflow event.
 * `workflow` marks the orchestrator's own terminal events.
 */
export type EventRole = AgentRole | 'workflow';

/**
 * Output of one agent call. Never mutated after creation;
 * a retry produces a new result.
 */
export interface AgentResult<TPayload> {
  readonly role: AgentRole;
  readonly payload: TPayload;
  /** Feedback directed at another agent (downstream or upstream) */
  readonly feedback?: string;
  readonly tokenUsage: TokenUsage;
  readonly durationMs: number;
}

export interface WebFinding {
  readonly url: string;
  readonly name: string;
  readonly description: string;
}

export interface EntityFinding {
  readonly name: string;
  readonly description: string;
}

export interface NewsFinding {
  readonly url: string;
  readonly title: string;
  readonly description: string;
}

/**
 * Structured findings from grounded web research.
 */
export interface ResearchFindings {
  readonly queries: readonly string[];
  readonly web: readonly WebFinding[];
  readonly entities: readonly EntityFinding[];
  readonly news: readonly NewsFinding[];
}

/**
 * A catalog product as stored in the product index.
 */
export interface ProductDocument {
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly url?: string;
}

/**
 * A product returned by similarity search.
 */
export interface ProductMatch extends ProductDocument {
  /** Cosine similarity to the best matching query */
  readonly score: number;
}

export interface ProductFindings {
  readonly queries: readonly string[];
  readonly documents: readonly ProductMatch[];
}

export interface WriterDraft {
  readonly article: string;
  readonly feedback: string;
}

export type EditorDecision = 'accept' | 'reject';

export interface EditorReview {
  readonly decision: EditorDecision;
  /** Critique directed at the researcher (kept for inspection, not acted on) */
  readonly researchFeedback: string;
  /** Critique directed at the writer, fed into the next draft */
  readonly editorFeedback: string;
}

// ============================================================================
// Agent Clients
// ============================================================================

export interface AgentRunOptions {
  /** Aborts in-flight retries and remote calls that accept a signal */
  readonly signal?: AbortSignal;
}

/**
 * Uniform surface of the four agents. The orchestrator only sees this.
 */
export interface AgentClient<TInput, TPayload> {
  readonly role: AgentRole;
  run(input: TInput, options?: AgentRunOptions): Promise<AgentResult<TPayload>>;
}

export interface ResearcherInput {
  readonly context: string;
  readonly feedback?: string;
}

export interface ProductInput {
  readonly context: string;
}

export interface WriterInput {
  readonly research: ResearchFindings;
  readonly products: ProductFindings;
  readonly assignment: string;
  /** Editor feedback from the previous cycle */
  readonly feedback?: string;
}

export interface EditorInput {
  readonly article: string;
  /** The writer's notes on the draft */
  readonly feedback: string;
}

export type ResearchResult = AgentResult<ResearchFindings>;
export type ProductResult = AgentResult<ProductFindings>;
export type WriterResult = AgentResult<WriterDraft>;
export type EditorResult = AgentResult<EditorReview>;

export interface CreativeAgents {
  readonly researcher: AgentClient<ResearcherInput, ResearchFindings>;
  readonly product: AgentClient<ProductInput, ProductFindings>;
  readonly writer: AgentClient<WriterInput, WriterDraft>;
  readonly editor: AgentClient<EditorInput, EditorReview>;
}

// ============================================================================
// Article
// ============================================================================

/**
 * Output of a successful run: the writer draft the editor accepted.
 */
export interface Article {
  readonly runId: string;
  /** First Markdown heading of the article, when it has one */
  readonly title?: string;
  readonly content: string;
  /** The writer's own notes on the accepted draft */
  readonly feedback: string;
  /** Editor rejections consumed before acceptance */
  readonly retries: number;
  readonly editorReview: EditorReview;
  readonly research: ResearchFindings;
  readonly products: ProductFindings;
  readonly tokenUsage: TokenUsage;
  readonly totalDurationMs: number;
  readonly generatedAt: string;
}

// ============================================================================
// Workflow Events
// ============================================================================

export type WorkflowEventStatus = 'start' | 'complete' | 'error';

export interface WorkflowErrorPayload {
  readonly code: WorkflowErrorCode;
  readonly message: string;
}

/**
 * A unit of progress streamed to the caller. Consumed exactly once,
 * never persisted.
 */
export type WorkflowEvent =
  | { readonly role: AgentRole; readonly status: 'start'; readonly payload?: unknown }
  | { readonly role: 'researcher'; readonly status: 'complete'; readonly payload: ResearchResult }
  | { readonly role: 'product'; readonly status: 'complete'; readonly payload: ProductResult }
  | { readonly role: 'writer'; readonly status: 'complete'; readonly payload: WriterResult }
  | { readonly role: 'editor'; readonly status: 'complete'; readonly payload: EditorResult }
  | { readonly role: 'workflow'; readonly status: 'complete'; readonly payload: Article }
  | { readonly role: EventRole; readonly status: 'error'; readonly payload: WorkflowErrorPayload };

/**
 * Terminal events end a run: the final article or any error.
 */
export function isTerminalEvent(event: WorkflowEvent): boolean {
  return event.status === 'error' || event.role === 'workflow';
}

export type ArticleEvent = Extract<WorkflowEvent, { role: 'workflow'; status: 'complete' }>;

/**
 * True for the successful terminal event carrying the Article.
 */
export function isArticleEvent(event: WorkflowEvent): event is ArticleEvent {
  return event.role === 'workflow' && event.status === 'complete';
}

// ============================================================================
// Evaluation
// ============================================================================

export type EvaluatorName =
  | 'relevance'
  | 'groundedness'
  | 'fluency'
  | 'coherence'
  | 'safety'
  | 'friendliness';

export interface EvaluationScore {
  readonly evaluator: EvaluatorName;
  /** 1-5, higher is better */
  readonly score: number;
  readonly reason: string;
  readonly details?: Readonly<Record<string, number>>;
}

export interface EvaluationFailure {
  readonly evaluator: EvaluatorName;
  readonly message: string;
}

/**
 * Scores for one completed article. Append-only.
 */
export interface EvaluationRecord {
  readonly runId: string;
  readonly scores: readonly EvaluationScore[];
  readonly failures: readonly EvaluationFailure[];
  readonly startedAt: string;
  readonly completedAt: string;
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-related operations.
 * Enables deterministic testing by allowing time to be mocked.
 *
 * @example
 * const mockClock: Clock = { now: () => 1234567890000 };
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

/**
 * Default clock implementation using system time.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};
