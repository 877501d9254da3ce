import { describe, it, expect } from 'vitest';

import { createEditorAgent, runEditor } from '../../../src/ai/creative/agents/editor';
import { getEditorUserPrompt } from '../../../src/ai/creative/prompts/editor';
import { createMockLogger, createScriptedLlm } from '../helpers';

describe('runEditor', () => {
  it('returns the decision with trimmed feedback', async () => {
    const llm = createScriptedLlm({
      objects: [{ decision: 'reject', researchFeedback: ' Check tide times ', editorFeedback: '  Cut the intro.  ' }],
    });

    const result = await runEditor({ article: '# Draft', feedback: 'Notes' }, { llm, logger: createMockLogger() });

    expect(result).toMatchObject({
      role: 'editor',
      payload: { decision: 'reject', researchFeedback: 'Check tide times', editorFeedback: 'Cut the intro.' },
      feedback: 'Cut the intro.',
      tokenUsage: { input: 10, output: 5 },
    });
  });

  it('defaults missing feedback to empty strings', async () => {
    const llm = createScriptedLlm({ objects: [{ decision: 'accept' }] });

    const result = await runEditor({ article: '# Draft', feedback: '' }, { llm, logger: createMockLogger() });

    expect(result.payload).toEqual({ decision: 'accept', researchFeedback: '', editorFeedback: '' });
  });

  it('sends the article and writer notes', async () => {
    const llm = createScriptedLlm({ objects: [{ decision: 'accept' }] });

    await createEditorAgent({ llm, logger: createMockLogger() }).run({ article: '# Draft', feedback: 'Short' });

    expect(llm.objectRequests[0]).toMatchObject({
      schemaName: 'EditorReview',
      prompt: 'ARTICLE:\n# Draft\n\nWRITER NOTES:\nShort',
      temperature: 0.2,
      maxOutputTokens: 1200,
    });
  });

  it('rejects an unknown decision', async () => {
    const llm = createScriptedLlm({ objects: [{ decision: 'maybe' }] });

    await expect(runEditor({ article: '# Draft', feedback: '' }, { llm, logger: createMockLogger() })).rejects.toThrow();
  });
});

describe('getEditorUserPrompt', () => {
  it('marks missing writer notes', () => {
    expect(getEditorUserPrompt('Body', '  ', 100)).toBe('ARTICLE:\nBody\n\nWRITER NOTES:\n(none)');
  });
});
