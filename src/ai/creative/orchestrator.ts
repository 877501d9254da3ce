/**
 * Creative Workflow Orchestrator
 *
 * Runs researcher → product → (writer → editor) × k and yields a
 * WorkflowEvent at every step. Exactly one terminal event ends the stream:
 * the accepted Article (`role: 'workflow'`) or an error.
 *
 * The orchestrator never retries an agent. Agent clients retry their own
 * transient failures; anything that escapes them ends the run.
 */

import { createContextualLogger, generateCorrelationId, type Logger } from '../../utils/logger';
import { CONTEXT_CONSTRAINTS, WORKFLOW_CONFIG } from './config';
import {
  addTokenUsage,
  createEmptyTokenUsage,
  isWorkflowError,
  systemClock,
  WorkflowError,
  type AgentResult,
  type AgentRole,
  type Article,
  type Clock,
  type CreativeAgents,
  type EditorResult,
  type EventRole,
  type ProductResult,
  type ResearchResult,
  type TokenUsage,
  type WorkflowContext,
  type WorkflowErrorCode,
  type WorkflowEvent,
  type WriterResult,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface WorkflowDeps {
  readonly agents: CreativeAgents;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export interface WorkflowOptions {
  /** Identifier carried on the Article and in logs (default: generated) */
  readonly runId?: string;
  /** Rejections sent back to the writer before RETRY_EXHAUSTED (default: 2) */
  readonly maxEditorRetries?: number;
  /** Overall budget in ms; 0 means none */
  readonly timeoutMs?: number;
  /** Aborting ends the run with CANCELLED */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Context Validation
// ============================================================================

/**
 * Returns a list of problems with the caller's briefs (empty when valid).
 */
export function validateWorkflowContext(context: WorkflowContext): string[] {
  const issues: string[] = [];
  const fields: Array<keyof WorkflowContext> = ['research', 'products', 'assignment'];
  for (const field of fields) {
    const value = context[field];
    if (typeof value !== 'string' || value.trim().length < CONTEXT_CONSTRAINTS.MIN_LENGTH) {
      issues.push(`${field} must not be empty`);
    } else if (value.length > CONTEXT_CONSTRAINTS.MAX_LENGTH) {
      issues.push(`${field} must be at most ${CONTEXT_CONSTRAINTS.MAX_LENGTH} characters`);
    }
  }
  return issues;
}

/**
 * First Markdown heading text, if any.
 */
export function extractTitle(markdown: string): string | undefined {
  const match = /^#{1,6}\s+(.+?)\s*#*\s*$/m.exec(markdown);
  return match ? match[1].trim() : undefined;
}

// ============================================================================
// Phase Execution
// ============================================================================

interface PhaseRuntime {
  readonly runId: string;
  readonly startTime: number;
  readonly timeoutMs: number;
  readonly clock: Clock;
  /** Run-scoped controller; aborted on cancellation, timeout and close */
  readonly controller: AbortController;
  readonly userSignal: AbortSignal | undefined;
  /** Set before the controller aborts, so an agent rejecting on that abort is not blamed */
  stopReason?: WorkflowError;
}

/**
 * Records why the run is stopping, then aborts the agents' signal.
 */
function stopRun(runtime: PhaseRuntime, reason: WorkflowError): void {
  if (!runtime.stopReason) {
    runtime.stopReason = reason;
  }
  runtime.controller.abort();
}

function assertCanProceed(runtime: PhaseRuntime, role: AgentRole): void {
  if (runtime.userSignal?.aborted) {
    throw new WorkflowError('CANCELLED', `Run ${runtime.runId} was cancelled before ${role}`);
  }
  if (runtime.timeoutMs > 0 && runtime.clock.now() - runtime.startTime >= runtime.timeoutMs) {
    throw new WorkflowError('TIMEOUT', `Run ${runtime.runId} timed out after ${runtime.timeoutMs}ms`);
  }
}

/**
 * Races `promise` against the user's signal and the remaining run budget.
 * The losing agent call is left to settle on its own; its result is ignored.
 */
async function withTimeoutAndCancellation<T>(
  promise: Promise<T>,
  runtime: PhaseRuntime,
  role: AgentRole
): Promise<T> {
  const { userSignal, timeoutMs } = runtime;
  if (!userSignal && timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let abortHandler: (() => void) | undefined;

  const cancellation = new Promise<never>((_, reject) => {
    if (userSignal) {
      abortHandler = () => {
        const reason = new WorkflowError('CANCELLED', `Run ${runtime.runId} was cancelled during ${role}`);
        stopRun(runtime, reason);
        reject(reason);
      };
      userSignal.addEventListener('abort', abortHandler, { once: true });
    }
    if (timeoutMs > 0) {
      const remaining = Math.max(0, timeoutMs - (runtime.clock.now() - runtime.startTime));
      timeoutId = setTimeout(() => {
        const reason = new WorkflowError('TIMEOUT', `Run ${runtime.runId} timed out during ${role} after ${timeoutMs}ms`);
        stopRun(runtime, reason);
        reject(reason);
      }, remaining);
    }
  });

  try {
    return await Promise.race([promise, cancellation]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (abortHandler && userSignal) {
      userSignal.removeEventListener('abort', abortHandler);
    }
  }
}

const PHASE_ERROR_CODES: Record<AgentRole, WorkflowErrorCode> = {
  researcher: 'RESEARCHER_FAILED',
  product: 'PRODUCT_FAILED',
  writer: 'WRITER_FAILED',
  editor: 'EDITOR_FAILED',
};

/**
 * Runs one agent call with timeout/cancellation and maps failures to the
 * role's error code.
 */
async function runPhase<T>(
  role: AgentRole,
  fn: (signal: AbortSignal) => Promise<AgentResult<T>>,
  runtime: PhaseRuntime
): Promise<AgentResult<T>> {
  assertCanProceed(runtime, role);

  try {
    return await withTimeoutAndCancellation(fn(runtime.controller.signal), runtime, role);
  } catch (error) {
    if (runtime.stopReason) {
      throw runtime.stopReason;
    }
    throw new WorkflowError(
      PHASE_ERROR_CODES[role],
      `${role} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

function errorEvent(role: EventRole, code: WorkflowErrorCode, message: string): WorkflowEvent {
  return { role, status: 'error', payload: { code, message } };
}

// ============================================================================
// Workflow
// ============================================================================

/**
 * Runs the creative writing workflow as a stream of events.
 *
 * Closing the generator early (`return()`) aborts the run's signal, so agent
 * retries stop; a remote call already in flight still completes.
 *
 * @example
 * for await (const event of runCreativeWorkflow(context, { agents })) {
 *   console.log(event.role, event.status);
 * }
 */
export async function* runCreativeWorkflow(
  context: WorkflowContext,
  deps: WorkflowDeps,
  options: WorkflowOptions = {}
): AsyncGenerator<WorkflowEvent, void, undefined> {
  const runId = options.runId ?? generateCorrelationId();
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? createContextualLogger('[Workflow]', { correlationId: runId });
  const maxEditorRetries = options.maxEditorRetries ?? WORKFLOW_CONFIG.MAX_EDITOR_RETRIES;
  const { agents } = deps;

  const contextIssues = validateWorkflowContext(context);
  if (contextIssues.length > 0) {
    log.warn(`Invalid context: ${contextIssues.join('; ')}`);
    yield errorEvent('workflow', 'CONTEXT_INVALID', `Invalid workflow context: ${contextIssues.join('; ')}`);
    return;
  }

  let tokenUsage: TokenUsage = createEmptyTokenUsage();
  let currentRole: AgentRole = 'researcher';

  const controller = new AbortController();
  const runtime: PhaseRuntime = {
    runId,
    startTime: clock.now(),
    timeoutMs: options.timeoutMs ?? WORKFLOW_CONFIG.DEFAULT_TIMEOUT_MS,
    clock,
    controller,
    userSignal: options.signal,
  };
  const onUserAbort = () =>
    stopRun(runtime, new WorkflowError('CANCELLED', `Run ${runId} was cancelled during ${currentRole}`));
  options.signal?.addEventListener('abort', onUserAbort, { once: true });

  log.info(`Starting run (max editor retries: ${maxEditorRetries})`);

  try {
    // Research
    currentRole = 'researcher';
    yield { role: 'researcher', status: 'start' };
    const research: ResearchResult = await runPhase(
      'researcher',
      (signal) => agents.researcher.run({ context: context.research }, { signal }),
      runtime
    );
    tokenUsage = addTokenUsage(tokenUsage, research.tokenUsage);
    yield { role: 'researcher', status: 'complete', payload: research };

    // Products
    currentRole = 'product';
    yield { role: 'product', status: 'start' };
    const products: ProductResult = await runPhase(
      'product',
      (signal) => agents.product.run({ context: context.products }, { signal }),
      runtime
    );
    tokenUsage = addTokenUsage(tokenUsage, products.tokenUsage);
    yield { role: 'product', status: 'complete', payload: products };

    // Writer / editor loop
    let retries = 0;
    let editorFeedback: string | undefined;

    for (;;) {
      currentRole = 'writer';
      yield { role: 'writer', status: 'start', payload: { cycle: retries + 1 } };
      const draft: WriterResult = await runPhase(
        'writer',
        (signal) =>
          agents.writer.run(
            {
              research: research.payload,
              products: products.payload,
              assignment: context.assignment,
              feedback: editorFeedback,
            },
            { signal }
          ),
        runtime
      );
      tokenUsage = addTokenUsage(tokenUsage, draft.tokenUsage);
      yield { role: 'writer', status: 'complete', payload: draft };

      currentRole = 'editor';
      yield { role: 'editor', status: 'start', payload: { cycle: retries + 1 } };
      const review: EditorResult = await runPhase(
        'editor',
        (signal) => agents.editor.run({ article: draft.payload.article, feedback: draft.payload.feedback }, { signal }),
        runtime
      );
      tokenUsage = addTokenUsage(tokenUsage, review.tokenUsage);
      yield { role: 'editor', status: 'complete', payload: review };

      if (review.payload.decision === 'accept') {
        const totalDurationMs = clock.now() - runtime.startTime;
        const article: Article = {
          runId,
          title: extractTitle(draft.payload.article),
          content: draft.payload.article,
          feedback: draft.payload.feedback,
          retries,
          editorReview: review.payload,
          research: research.payload,
          products: products.payload,
          tokenUsage,
          totalDurationMs,
          generatedAt: new Date(clock.now()).toISOString(),
        };
        log.info(
          `Article accepted after ${retries} retries in ${totalDurationMs}ms ` +
            `(tokens: ${tokenUsage.input} in / ${tokenUsage.output} out)`
        );
        yield { role: 'workflow', status: 'complete', payload: article };
        return;
      }

      retries++;
      if (retries > maxEditorRetries) {
        log.warn(`Editor rejected ${retries} drafts; giving up`);
        yield errorEvent(
          'workflow',
          'RETRY_EXHAUSTED',
          `Editor rejected ${retries} drafts (max editor retries: ${maxEditorRetries})`
        );
        return;
      }

      editorFeedback = review.payload.editorFeedback || WORKFLOW_CONFIG.NO_FEEDBACK;
      log.info(`Draft rejected (retry ${retries}/${maxEditorRetries})`);
    }
  } catch (error) {
    const wfError = isWorkflowError(error)
      ? error
      : new WorkflowError(
          PHASE_ERROR_CODES[currentRole],
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined
        );
    log.error(`Run failed [${wfError.code}]: ${wfError.message}`);
    yield errorEvent(currentRole, wfError.code, wfError.message);
  } finally {
    options.signal?.removeEventListener('abort', onUserAbort);
    controller.abort();
  }
}
