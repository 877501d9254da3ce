/**
 * Runs one creative writer workflow from the command line and prints the
 * events as they arrive, then scores the article.
 *
 * Run with: npx tsx scripts/run-creative-workflow.ts [research] [products] [assignment]
 *
 * Requires OPENROUTER_API_KEY, EMBEDDING_API_KEY (or OPENAI_API_KEY) and
 * TAVILY_API_KEY in .env.
 */

import { config } from 'dotenv';
config();

import {
  buildEvaluationInput,
  createDefaultAgents,
  createDefaultEvaluators,
  getCreativeWriterSettings,
  InMemoryEvaluationStore,
  isArticleEvent,
  isModelProviderConfigured,
  runCreativeWorkflow,
  runEvaluation,
  type WorkflowContext,
} from '../src/ai/creative';
import { createLanguageModelClient } from '../src/ai/service';

const DEFAULT_CONTEXT: WorkflowContext = {
  research: 'Beginner-friendly autumn hiking trails and what weather to expect in October',
  products: 'Waterproof jackets, hiking boots and lightweight daypacks',
  assignment: 'Write a short, friendly guide to planning a first autumn day hike, recommending gear from our catalog.',
};

async function main(): Promise<void> {
  const [research, products, assignment] = process.argv.slice(2);
  const context: WorkflowContext = {
    research: research ?? DEFAULT_CONTEXT.research,
    products: products ?? DEFAULT_CONTEXT.products,
    assignment: assignment ?? DEFAULT_CONTEXT.assignment,
  };

  const settings = getCreativeWriterSettings();
  if (!isModelProviderConfigured(settings)) {
    console.error('❌ Set OPENROUTER_API_KEY and EMBEDDING_API_KEY (or OPENAI_API_KEY) first');
    process.exitCode = 1;
    return;
  }

  const agents = createDefaultAgents(settings);
  const start = Date.now();

  for await (const event of runCreativeWorkflow(context, { agents }, {
    maxEditorRetries: settings.maxEditorRetries,
    timeoutMs: settings.timeoutMs,
  })) {
    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    console.log(`[${elapsed}s] ${event.role} ${event.status}`);

    if (event.status === 'error') {
      console.error(`   ❌ ${JSON.stringify(event.payload)}`);
      process.exitCode = 1;
      return;
    }

    if (isArticleEvent(event)) {
      const article = event.payload;
      console.log(`\n${article.content}\n`);
      console.log(`   Retries: ${article.retries}`);
      console.log(`   Tokens: ${article.tokenUsage.input} in / ${article.tokenUsage.output} out`);

      console.log('\n📊 Evaluating...');
      const record = await runEvaluation(buildEvaluationInput(context, article), {
        evaluators: createDefaultEvaluators(createLanguageModelClient(settings, 'evaluator')),
        store: new InMemoryEvaluationStore(),
      });
      for (const score of record.scores) {
        console.log(`   ${score.evaluator}: ${score.score}/5 - ${score.reason}`);
      }
      for (const failure of record.failures) {
        console.log(`   ${failure.evaluator}: failed (${failure.message})`);
      }
    }
  }
}

main().catch((error: unknown) => {
  console.error('❌ Workflow script failed:', error);
  process.exitCode = 1;
});
