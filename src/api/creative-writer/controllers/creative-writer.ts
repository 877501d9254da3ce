import { createDefaultAgents } from '../../../ai/creative/agents';
import { createDefaultEvaluators, type Evaluator } from '../../../ai/creative/evaluation/evaluators';
import { buildEvaluationInput, scheduleEvaluation } from '../../../ai/creative/evaluation/runner';
import { getEvaluationStore, type EvaluationStore } from '../../../ai/creative/evaluation/store';
import { runCreativeWorkflow } from '../../../ai/creative/orchestrator';
import {
  getCreativeWriterSettings,
  isModelProviderConfigured,
  type CreativeWriterSettings,
} from '../../../ai/creative/settings';
import { isArticleEvent, type CreativeAgents } from '../../../ai/creative/types';
import { createLanguageModelClient, getAIStatus } from '../../../ai/service';
import { createContextualLogger, createPrefixedLogger, generateCorrelationId } from '../../../utils/logger';
import {
  articleBodySchema,
  CORRELATION_HEADER,
  isValidRunId,
  type ControllerContext,
} from '../types';
import { negotiateStreamFormat, pipeWorkflowEvents, streamHeaders } from '../utils/event-stream';

export interface CreativeWriterControllerDeps {
  getSettings(): CreativeWriterSettings;
  getAgents(settings: CreativeWriterSettings): CreativeAgents;
  getEvaluators(settings: CreativeWriterSettings): readonly Evaluator[];
  getStore(): EvaluationStore;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves settings or answers 500 with the configuration problem.
 */
function settingsOrFail(ctx: ControllerContext, deps: CreativeWriterControllerDeps): CreativeWriterSettings | undefined {
  try {
    return deps.getSettings();
  } catch (error) {
    createPrefixedLogger('[CreativeWriter]').error(`Settings error: ${errorMessage(error)}`);
    ctx.status = 500;
    ctx.body = { error: errorMessage(error) };
    return undefined;
  }
}

export function createCreativeWriterController(deps: CreativeWriterControllerDeps) {
  return {
    /**
     * Run the creative writer workflow, streaming events as they happen.
     * POST /api/creative-writer/article
     * Header: Accept: text/event-stream for SSE (NDJSON otherwise)
     * Header: x-correlation-id: <run id> (optional)
     * Body: { research: string, products: string, assignment: string }
     *
     * Streams WorkflowEvents; the last one is the Article or an error.
     */
    async article(ctx: ControllerContext) {
      const settings = settingsOrFail(ctx, deps);
      if (!settings) return;

      if (!isModelProviderConfigured(settings)) {
        ctx.status = 400;
        ctx.body = {
          error: 'AI is not configured. Set OPENROUTER_API_KEY and EMBEDDING_API_KEY (or OPENAI_API_KEY).',
        };
        return;
      }

      const parsed = articleBodySchema.safeParse(ctx.request?.body ?? {});
      if (!parsed.success) {
        ctx.status = 400;
        ctx.body = { error: 'Invalid request body', issues: parsed.error.issues };
        return;
      }

      let agents: CreativeAgents;
      try {
        agents = deps.getAgents(settings);
      } catch (error) {
        ctx.status = 500;
        ctx.body = { error: `Failed to initialize agents: ${errorMessage(error)}` };
        return;
      }

      const header = ctx.request.headers[CORRELATION_HEADER];
      const runId = typeof header === 'string' && isValidRunId(header) ? header : generateCorrelationId();
      const log = createContextualLogger('[CreativeWriter]', { correlationId: runId });
      const format = negotiateStreamFormat(ctx.request.headers.accept);

      // Tell Koa not to handle the response - we're handling it directly
      ctx.respond = false;
      const res = ctx.res;
      res.writeHead(200, { ...streamHeaders(format), 'X-Correlation-Id': runId });

      const abortController = new AbortController();
      const events = runCreativeWorkflow(
        parsed.data,
        { agents },
        {
          runId,
          maxEditorRetries: settings.maxEditorRetries,
          timeoutMs: settings.timeoutMs,
          signal: abortController.signal,
        }
      );

      const result = await pipeWorkflowEvents(events, res, { format, abortController, logger: log });
      log.info(`Stream finished: ${result.eventsWritten} events${result.disconnected ? ' (client disconnected)' : ''}`);

      if (result.terminal && isArticleEvent(result.terminal) && settings.evaluationEnabled) {
        // Fire-and-forget: the response has already ended
        void scheduleEvaluation(buildEvaluationInput(parsed.data, result.terminal.payload), {
          evaluators: deps.getEvaluators(settings),
          store: deps.getStore(),
          logger: log,
        });
      }
    },

    /**
     * Stored evaluation records for one run.
     * GET /api/creative-writer/evaluations/:runId
     */
    async evaluations(ctx: ControllerContext) {
      const runId = ctx.params.runId;
      if (!runId || !isValidRunId(runId)) {
        ctx.status = 400;
        ctx.body = { error: 'Invalid run id' };
        return;
      }

      const records = await deps.getStore().findByRunId(runId);
      if (records.length === 0) {
        ctx.status = 404;
        ctx.body = { error: `No evaluations found for run ${runId}` };
        return;
      }

      ctx.status = 200;
      ctx.body = { data: records };
    },

    /**
     * Active models and whether credentials are configured.
     * GET /api/creative-writer/status
     */
    async status(ctx: ControllerContext) {
      const settings = settingsOrFail(ctx, deps);
      if (!settings) return;

      ctx.status = 200;
      ctx.body = { data: getAIStatus(settings) };
    },
  };
}

let defaultAgents: CreativeAgents | undefined;
let defaultEvaluators: readonly Evaluator[] | undefined;

/**
 * Agents and evaluators are built once per process so the product index
 * embeds the catalog only once.
 */
const defaultDeps: CreativeWriterControllerDeps = {
  getSettings: getCreativeWriterSettings,
  getAgents(settings) {
    if (!defaultAgents) {
      defaultAgents = createDefaultAgents(settings);
    }
    return defaultAgents;
  },
  getEvaluators(settings) {
    if (!defaultEvaluators) {
      defaultEvaluators = createDefaultEvaluators(createLanguageModelClient(settings, 'evaluator'));
    }
    return defaultEvaluators;
  },
  getStore: getEvaluationStore,
};

export default () => createCreativeWriterController(defaultDeps);
