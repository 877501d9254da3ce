import { describe, it, expect } from 'vitest';

import {
  extractTitle,
  runCreativeWorkflow,
  validateWorkflowContext,
  type WorkflowOptions,
} from '../../../src/ai/creative/orchestrator';
import { isArticleEvent, isTerminalEvent, type AgentRole, type CreativeAgents } from '../../../src/ai/creative/types';
import {
  collectEvents,
  createFakeAgents,
  createMockLogger,
  describeEvents,
  review,
  TEST_CONTEXT,
  TEST_PRODUCTS,
  TEST_RESEARCH,
} from '../helpers';

const fixedClock = { now: () => 1000 };

function run(agents: CreativeAgents, options: WorkflowOptions = {}) {
  return runCreativeWorkflow(TEST_CONTEXT, { agents, logger: createMockLogger(), clock: fixedClock }, {
    runId: 'run-1',
    ...options,
  });
}

/**
 * A researcher that never answers and records the signal it was given.
 */
function createHangingResearcher() {
  const signals: AbortSignal[] = [];
  const researcher: CreativeAgents['researcher'] = {
    role: 'researcher',
    run: (_input, options) => {
      if (options?.signal) signals.push(options.signal);
      return new Promise<never>(() => undefined);
    },
  };
  return { researcher, signals };
}

/**
 * An agent that only settles by rejecting once its signal aborts, the way the
 * SDK clients do.
 */
function createAbortAwareAgent(role: AgentRole) {
  return {
    role,
    run: (_input: unknown, options?: { signal?: AbortSignal }) =>
      new Promise<never>((_, reject) => {
        options?.signal?.addEventListener(
          'abort',
          () => reject(new DOMException('This operation was aborted', 'AbortError')),
          { once: true }
        );
      }),
  };
}

describe('validateWorkflowContext', () => {
  it('accepts three non-empty briefs', () => {
    expect(validateWorkflowContext(TEST_CONTEXT)).toEqual([]);
  });

  it('reports empty and oversized briefs', () => {
    expect(
      validateWorkflowContext({ research: '   ', products: 'x'.repeat(5001), assignment: 'x'.repeat(5000) })
    ).toEqual(['research must not be empty', 'products must be at most 5000 characters']);
  });
});

describe('extractTitle', () => {
  it('returns the first heading', () => {
    expect(extractTitle('Intro\n## Best Trails ##\n# Later')).toBe('Best Trails');
  });

  it('returns undefined without a heading', () => {
    expect(extractTitle('Just text\n#hashtag')).toBeUndefined();
  });
});

describe('runCreativeWorkflow', () => {
  it('streams every phase and ends with the accepted article', async () => {
    const events = await collectEvents(run(createFakeAgents()));

    expect(describeEvents(events)).toEqual([
      'researcher:start',
      'researcher:complete',
      'product:start',
      'product:complete',
      'writer:start',
      'writer:complete',
      'editor:start',
      'editor:complete',
      'workflow:complete',
    ]);
    expect(events.filter(isTerminalEvent)).toHaveLength(1);

    const last = events[events.length - 1];
    expect(isArticleEvent(last)).toBe(true);
    if (!isArticleEvent(last)) return;
    expect(last.payload).toEqual({
      runId: 'run-1',
      title: 'Autumn Hikes',
      content: '# Autumn Hikes\n\nDraft 1',
      feedback: 'No Feedback',
      retries: 0,
      editorReview: review('accept'),
      research: TEST_RESEARCH,
      products: TEST_PRODUCTS,
      tokenUsage: { input: 40, output: 20 },
      totalDurationMs: 0,
      generatedAt: '1970-01-01T00:00:01.000Z',
    });
  });

  it('numbers writer and editor cycles', async () => {
    const events = await collectEvents(run(createFakeAgents({ decisions: [review('reject', 'Fix it'), review('accept')] })));

    const starts = events.filter((e) => e.status === 'start' && (e.role === 'writer' || e.role === 'editor'));
    expect(starts.map((e) => [e.role, e.payload])).toEqual([
      ['writer', { cycle: 1 }],
      ['editor', { cycle: 1 }],
      ['writer', { cycle: 2 }],
      ['editor', { cycle: 2 }],
    ]);
  });

  it('sends editor feedback back to the writer until the editor accepts', async () => {
    const agents = createFakeAgents({
      decisions: [review('reject', 'Add a packing list'), review('reject', ''), review('accept')],
    });

    const events = await collectEvents(run(agents, { maxEditorRetries: 2 }));

    expect(events).toHaveLength(17);
    expect(agents.writerFeedback).toEqual([undefined, 'Add a packing list', 'No Feedback']);
    const last = events[events.length - 1];
    expect(isArticleEvent(last) && last.payload.retries).toBe(2);
    expect(isArticleEvent(last) && last.payload.content).toBe('# Autumn Hikes\n\nDraft 3');
  });

  it('ends with RETRY_EXHAUSTED after too many rejections', async () => {
    const agents = createFakeAgents({
      decisions: [review('reject', 'a'), review('reject', 'b'), review('reject', 'c')],
    });

    const events = await collectEvents(run(agents, { maxEditorRetries: 2 }));

    expect(events[events.length - 1]).toEqual({
      role: 'workflow',
      status: 'error',
      payload: { code: 'RETRY_EXHAUSTED', message: 'Editor rejected 3 drafts (max editor retries: 2)' },
    });
    expect(events.filter((e) => e.role === 'writer' && e.status === 'complete')).toHaveLength(3);
    expect(events.some(isArticleEvent)).toBe(false);
  });

  it('gives up after the first rejection when retries are disabled', async () => {
    const events = await collectEvents(run(createFakeAgents({ decisions: [review('reject')] }), { maxEditorRetries: 0 }));

    expect(events[events.length - 1]).toMatchObject({ status: 'error', payload: { code: 'RETRY_EXHAUSTED' } });
    expect(events.filter((e) => e.role === 'editor' && e.status === 'complete')).toHaveLength(1);
  });

  it('ends with a single error event when an agent fails', async () => {
    const events = await collectEvents(run(createFakeAgents({ failRole: 'writer' })));

    expect(describeEvents(events)).toEqual([
      'researcher:start',
      'researcher:complete',
      'product:start',
      'product:complete',
      'writer:start',
      'writer:error',
    ]);
    expect(events[5].payload).toEqual({ code: 'WRITER_FAILED', message: 'writer failed: Invalid API key' });
  });

  it('maps each role to its failure code', async () => {
    const researcher = await collectEvents(run(createFakeAgents({ failRole: 'researcher' })));
    const product = await collectEvents(run(createFakeAgents({ failRole: 'product' })));
    const editor = await collectEvents(run(createFakeAgents({ failRole: 'editor' })));

    expect(researcher[researcher.length - 1]).toMatchObject({ role: 'researcher', payload: { code: 'RESEARCHER_FAILED' } });
    expect(product[product.length - 1]).toMatchObject({ role: 'product', payload: { code: 'PRODUCT_FAILED' } });
    expect(editor[editor.length - 1]).toMatchObject({ role: 'editor', payload: { code: 'EDITOR_FAILED' } });
  });

  it('rejects an invalid context before any agent runs', async () => {
    const events = await collectEvents(
      runCreativeWorkflow(
        { ...TEST_CONTEXT, research: '' },
        { agents: createFakeAgents({ failRole: 'researcher' }), logger: createMockLogger() }
      )
    );

    expect(events).toEqual([
      {
        role: 'workflow',
        status: 'error',
        payload: { code: 'CONTEXT_INVALID', message: 'Invalid workflow context: research must not be empty' },
      },
    ]);
  });

  it('ends with CANCELLED when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const events = await collectEvents(run(createFakeAgents(), { signal: controller.signal }));

    expect(events).toEqual([
      { role: 'researcher', status: 'start' },
      {
        role: 'researcher',
        status: 'error',
        payload: { code: 'CANCELLED', message: 'Run run-1 was cancelled before researcher' },
      },
    ]);
  });

  it('ends with CANCELLED when aborted mid-phase and aborts the agent signal', async () => {
    const controller = new AbortController();
    const { researcher, signals } = createHangingResearcher();
    const workflow = run({ ...createFakeAgents(), researcher }, { signal: controller.signal });

    expect((await workflow.next()).value).toEqual({ role: 'researcher', status: 'start' });
    const pending = workflow.next();
    controller.abort();

    expect((await pending).value).toEqual({
      role: 'researcher',
      status: 'error',
      payload: { code: 'CANCELLED', message: 'Run run-1 was cancelled during researcher' },
    });
    expect((await workflow.next()).done).toBe(true);
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('ends with TIMEOUT when the run exceeds its budget', async () => {
    const { researcher, signals } = createHangingResearcher();

    const events = await collectEvents(
      runCreativeWorkflow(
        TEST_CONTEXT,
        { agents: { ...createFakeAgents(), researcher }, logger: createMockLogger() },
        { runId: 'run-1', timeoutMs: 20 }
      )
    );

    expect(events[events.length - 1]).toEqual({
      role: 'researcher',
      status: 'error',
      payload: { code: 'TIMEOUT', message: 'Run run-1 timed out during researcher after 20ms' },
    });
    expect(signals[0].aborted).toBe(true);
  });

  it('reports TIMEOUT when the agent rejects on the aborted signal', async () => {
    const researcher = createAbortAwareAgent('researcher');

    const events = await collectEvents(
      runCreativeWorkflow(
        TEST_CONTEXT,
        { agents: { ...createFakeAgents(), researcher }, logger: createMockLogger() },
        { runId: 'run-1', timeoutMs: 20 }
      )
    );

    expect(events).toEqual([
      { role: 'researcher', status: 'start' },
      {
        role: 'researcher',
        status: 'error',
        payload: { code: 'TIMEOUT', message: 'Run run-1 timed out during researcher after 20ms' },
      },
    ]);
  });

  it('reports CANCELLED when the agent rejects on the aborted signal', async () => {
    const controller = new AbortController();
    const researcher = createAbortAwareAgent('researcher');
    const workflow = run({ ...createFakeAgents(), researcher }, { signal: controller.signal });

    await workflow.next();
    const pending = workflow.next();
    controller.abort();

    expect((await pending).value).toEqual({
      role: 'researcher',
      status: 'error',
      payload: { code: 'CANCELLED', message: 'Run run-1 was cancelled during researcher' },
    });
  });

  it('names the phase that was running when a later cancellation lands', async () => {
    const controller = new AbortController();
    const writer = createAbortAwareAgent('writer');
    const workflow = run({ ...createFakeAgents(), writer }, { signal: controller.signal });

    const seen: string[] = [];
    for (;;) {
      const { value } = await workflow.next();
      if (!value) break;
      seen.push(`${value.role}:${value.status}`);
      if (value.role === 'writer' && value.status === 'start') break;
    }
    const pending = workflow.next();
    controller.abort();

    expect(seen).toEqual([
      'researcher:start',
      'researcher:complete',
      'product:start',
      'product:complete',
      'writer:start',
    ]);
    expect((await pending).value).toEqual({
      role: 'writer',
      status: 'error',
      payload: { code: 'CANCELLED', message: 'Run run-1 was cancelled during writer' },
    });
  });

  it('aborts the run signal when the consumer stops early', async () => {
    const signals: AbortSignal[] = [];
    const base = createFakeAgents();
    const agents: CreativeAgents = {
      ...base,
      researcher: {
        role: 'researcher',
        run: (input, options) => {
          if (options?.signal) signals.push(options.signal);
          return base.researcher.run(input, options);
        },
      },
    };

    for await (const event of run(agents)) {
      if (event.role === 'researcher' && event.status === 'complete') break;
    }

    expect(signals[0].aborted).toBe(true);
  });
});
