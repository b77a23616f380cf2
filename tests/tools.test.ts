import { describe, expect, it } from 'vitest';

import type { FinalConfiguration } from '../src/config/types.js';
import { extractQueryFromInput } from '../src/lib/tool-helpers.js';
import { buildRefineResponse } from '../src/tools/refine-prompt/output.js';
import { describeAdjustments } from '../src/tools/validate-parameters.js';

const configuration: FinalConfiguration = {
  role: 'Teacher',
  taskType: 'explanation',
  technique: 'socratic',
  template: 'Answer clearly: {query}',
  parameters: { temperature: 0.5, num_ctx: 2048, num_predict: 1280 },
  finalPrompt: 'Answer clearly: Why is the sky blue?',
  iterationsUsed: 2,
  finalQuality: 0.92,
  reasoning: 'More focused',
  state: 'CONVERGED',
  metadata: {
    originalQuery: 'why sky blue',
    validationPerformed: true,
    generatedAt: '2026-01-15T10:00:00.000Z',
  },
};

describe('buildRefineResponse', () => {
  it('renders the configuration as markdown', () => {
    const response = buildRefineResponse(configuration, {
      target: 'ollama',
      model: 'test-model',
    });

    expect(response.content[0]?.text).toBe(
      [
        '# Prompt Refinement',
        '- Model: test-model (ollama)',
        '- Role: Teacher',
        '- Task type: explanation',
        '- Technique: socratic',
        '- Passes: 2 (CONVERGED)',
        '- Final quality: 0.92',
        '',
        '## Final Prompt',
        '```',
        'Answer clearly: Why is the sky blue?',
        '```',
        '',
        '## Template',
        '```',
        'Answer clearly: {query}',
        '```',
        '',
        '## Parameters',
        '- temperature: 0.5',
        '- num_ctx: 2048',
        '- num_predict: 1280',
        '',
        '## Reasoning',
        'More focused',
      ].join('\n')
    );
    expect(response.structuredContent).toEqual({
      ok: true,
      configuration,
      target: 'ollama',
      model: 'test-model',
    });
  });
});

describe('describeAdjustments', () => {
  it('lists only values that changed', () => {
    expect(
      describeAdjustments(
        { temperature: '0.5', num_ctx: 100000 },
        { temperature: 0.5, num_ctx: 8192, num_predict: 1024 }
      )
    ).toEqual(['num_ctx: 100000 -> 8192']);
  });
});

describe('extractQueryFromInput', () => {
  it('reads a string query field', () => {
    expect(extractQueryFromInput({ query: 'hi' })).toBe('hi');
    expect(extractQueryFromInput({ query: 3 })).toBeUndefined();
    expect(extractQueryFromInput(null)).toBeUndefined();
  });
});
