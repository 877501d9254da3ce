/**
 * Shared fakes for creative writer tests.
 */

import { Writable } from 'stream';

import type {
  LanguageModelClient,
  ObjectGenerationRequest,
  ObjectGenerationResult,
  TextGenerationRequest,
  TextGenerationResult,
} from '../../src/ai/creative/llm';
import type {
  AgentClient,
  AgentResult,
  AgentRole,
  CreativeAgents,
  EditorDecision,
  EditorReview,
  ProductFindings,
  ResearchFindings,
  TokenUsage,
  WorkflowContext,
  WorkflowEvent,
  WriterDraft,
} from '../../src/ai/creative/types';
import type { Logger } from '../../src/utils/logger';

// ============================================================================
// Logger
// ============================================================================

export interface RecordingLogger extends Logger {
  readonly lines: Array<{ level: 'info' | 'warn' | 'error' | 'debug'; message: string }>;
}

export function createMockLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = [];
  return {
    lines,
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
    debug: (message) => lines.push({ level: 'debug', message }),
  };
}

// ============================================================================
// Language Model
// ============================================================================

export const TEST_USAGE: TokenUsage = { input: 10, output: 5 };

export interface ScriptedLlm extends LanguageModelClient {
  readonly textRequests: TextGenerationRequest[];
  readonly objectRequests: Array<Omit<ObjectGenerationRequest<unknown>, 'schema'>>;
}

/**
 * A model client that answers from queues. Objects are run through the
 * request's schema so defaults apply the way the real client applies them.
 * Queue entries that are Errors are thrown instead.
 */
export function createScriptedLlm(script: {
  texts?: Array<string | Error>;
  objects?: unknown[];
  usage?: TokenUsage;
}): ScriptedLlm {
  const texts = [...(script.texts ?? [])];
  const objects = [...(script.objects ?? [])];
  const usage = script.usage ?? TEST_USAGE;
  const textRequests: TextGenerationRequest[] = [];
  const objectRequests: Array<Omit<ObjectGenerationRequest<unknown>, 'schema'>> = [];

  return {
    modelId: 'test/model',
    textRequests,
    objectRequests,
    async generateText(request: TextGenerationRequest): Promise<TextGenerationResult> {
      textRequests.push(request);
      const next = texts.shift();
      if (next === undefined) throw new Error('No scripted text left');
      if (next instanceof Error) throw next;
      return { text: next, usage };
    },
    async generateObject<T>(request: ObjectGenerationRequest<T>): Promise<ObjectGenerationResult<T>> {
      const { schema: _schema, ...rest } = request;
      objectRequests.push(rest);
      if (objects.length === 0) throw new Error('No scripted object left');
      const next = objects.shift();
      if (next instanceof Error) throw next;
      return { object: request.schema.parse(next), usage };
    },
  };
}

// ============================================================================
// Agents
// ============================================================================

export const TEST_CONTEXT: WorkflowContext = {
  research: 'Best autumn hiking trails near the coast',
  products: 'Waterproof jackets and lightweight tents',
  assignment: 'Write a fun autumn hiking guide that mentions our gear',
};

export const TEST_RESEARCH: ResearchFindings = {
  queries: ['autumn coastal hikes'],
  web: [{ url: 'https://trails.example.com/autumn', name: 'Autumn trail guide', description: 'Ten trails' }],
  entities: [{ name: 'Cliff Path', description: 'A coastal trail' }],
  news: [],
};

export const TEST_PRODUCTS: ProductFindings = {
  queries: ['waterproof jacket'],
  documents: [
    {
      id: 'jacket-stormshell',
      title: 'Stormshell Jacket',
      content: 'Three-layer waterproof shell.',
      url: 'https://shop.example.com/products/jacket-stormshell',
      score: 0.82,
    },
  ],
};

export function agentResult<T>(role: AgentRole, payload: T, feedback?: string): AgentResult<T> {
  return { role, payload, feedback, tokenUsage: TEST_USAGE, durationMs: 1 };
}

export function review(decision: EditorDecision, editorFeedback = ''): EditorReview {
  return { decision, researchFeedback: '', editorFeedback };
}

/**
 * Agents that answer instantly. The writer numbers its drafts and the editor
 * returns the scripted decisions in order (accepting once they run out).
 */
export function createFakeAgents(options: {
  decisions?: EditorReview[];
  failRole?: AgentRole;
  failMessage?: string;
} = {}): CreativeAgents & { writerFeedback: Array<string | undefined> } {
  const decisions = [...(options.decisions ?? [review('accept')])];
  const writerFeedback: Array<string | undefined> = [];
  let drafts = 0;

  const maybeFail = (role: AgentRole) => {
    if (options.failRole === role) {
      throw new Error(options.failMessage ?? 'Invalid API key');
    }
  };

  const researcher: AgentClient<{ context: string }, ResearchFindings> = {
    role: 'researcher',
    run: async () => {
      maybeFail('researcher');
      return agentResult('researcher', TEST_RESEARCH, 'Found 1 web results');
    },
  };
  const product: AgentClient<{ context: string }, ProductFindings> = {
    role: 'product',
    run: async () => {
      maybeFail('product');
      return agentResult('product', TEST_PRODUCTS, 'Found 1 products: Stormshell Jacket');
    },
  };
  const writer: CreativeAgents['writer'] = {
    role: 'writer',
    run: async (input) => {
      maybeFail('writer');
      writerFeedback.push(input.feedback);
      drafts++;
      const draft: WriterDraft = { article: `# Autumn Hikes\n\nDraft ${drafts}`, feedback: 'No Feedback' };
      return agentResult('writer', draft);
    },
  };
  const editor: CreativeAgents['editor'] = {
    role: 'editor',
    run: async () => {
      maybeFail('editor');
      const next = decisions.shift() ?? review('accept');
      return agentResult('editor', next, next.editorFeedback);
    },
  };

  return { researcher, product, writer, editor, writerFeedback };
}

// ============================================================================
// Streams
// ============================================================================

export async function collectEvents(events: AsyncIterable<WorkflowEvent>): Promise<WorkflowEvent[]> {
  const collected: WorkflowEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

export function describeEvents(events: readonly WorkflowEvent[]): string[] {
  return events.map((event) => `${event.role}:${event.status}`);
}

/**
 * A Writable that records chunks and the head written by the controller.
 */
export class RecordingResponse extends Writable {
  readonly chunks: string[] = [];
  statusCode = 0;
  headers: Record<string, string> = {};

  constructor(options: { highWaterMark?: number } = {}) {
    super({ highWaterMark: options.highWaterMark ?? 16 * 1024 });
  }

  writeHead(status: number, headers: Record<string, string>): this {
    this.statusCode = status;
    this.headers = headers;
    return this;
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/**
 * Resolves once the stream has finished or closed.
 */
export function settled(stream: Writable): Promise<void> {
  return new Promise((resolve) => {
    if (stream.writableFinished || stream.destroyed) {
      resolve();
      return;
    }
    stream.once('finish', () => resolve());
    stream.once('close', () => resolve());
  });
}
