import { describe, expect, it } from 'vitest';

import {
  containsMathActionVerb,
  createTemplateCatalog,
  finalizeConfiguration,
  normalizeWhitespace,
  stripNudge,
  TECHNIQUE_TEMPLATES,
} from '../src/lib/refinement.js';

const now = (): Date => new Date('2026-03-01T08:30:00.000Z');

describe('finalizeConfiguration', () => {
  it('fills every missing field', () => {
    expect(finalizeConfiguration({}, 'Hello   there', { now })).toEqual({
      role: 'Assistant',
      taskType: 'default',
      technique: null,
      template: '{query}',
      parameters: { temperature: 0.7, num_ctx: 2048, num_predict: 1024 },
      iterationsUsed: 0,
      finalQuality: 0,
      finalPrompt: 'Hello there',
      metadata: {
        originalQuery: 'Hello   there',
        validationPerformed: true,
        generatedAt: '2026-03-01T08:30:00.000Z',
      },
    });
  });

  it('clamps parameters to delivery bounds', () => {
    const result = finalizeConfiguration(
      { parameters: { temperature: 0, num_ctx: 512, num_predict: 64 } },
      'q',
      { now }
    );
    expect(result.parameters).toEqual({ temperature: 0.1, num_ctx: 1024, num_predict: 512 });
  });

  it('clamps default parameters from an injected catalog', () => {
    const catalog = createTemplateCatalog({
      roleTemplates: { Assistant: '{query}' },
      techniqueTemplates: TECHNIQUE_TEMPLATES,
      taskParameters: {
        default: { temperature: 0.05, num_ctx: 600, num_predict: 100 },
      },
    });

    expect(finalizeConfiguration({}, 'hi', { catalog, now }).parameters).toEqual({
      temperature: 0.1,
      num_ctx: 1024,
      num_predict: 512,
    });
    expect(
      finalizeConfiguration(
        { parameters: { temperature: 0.6, num_predict: 'abc' } },
        'hi',
        { catalog, now }
      ).parameters
    ).toEqual({ temperature: 0.6, num_ctx: 1024, num_predict: 512 });
  });

  it('clamps counters and quality', () => {
    const high = finalizeConfiguration({ iterationsUsed: 3.7, finalQuality: 1.4 }, 'q', { now });
    expect(high.iterationsUsed).toBe(3);
    expect(high.finalQuality).toBe(1);

    const low = finalizeConfiguration({ iterationsUsed: -2, finalQuality: -0.2 }, 'q', { now });
    expect(low.iterationsUsed).toBe(0);
    expect(low.finalQuality).toBe(0);
  });

  it('replaces a template without the query placeholder', () => {
    expect(finalizeConfiguration({ template: 'Answer now.' }, 'q', { now }).template).toBe(
      '{query}'
    );
  });

  it('keeps provided metadata', () => {
    const metadata = {
      originalQuery: 'earlier',
      validationPerformed: true,
      generatedAt: '2025-12-31T00:00:00.000Z',
    };
    expect(finalizeConfiguration({ metadata }, 'q', { now }).metadata).toEqual(metadata);
  });

  it('uses the original query for math prompts that restate the calculation', () => {
    const result = finalizeConfiguration(
      { taskType: 'math', finalPrompt: 'Solve 2 + 2 step by step' },
      '  2 + 2  ',
      { now }
    );
    expect(result.finalPrompt).toBe('2 + 2');
  });

  it('leaves action verbs alone outside math tasks', () => {
    const result = finalizeConfiguration(
      { taskType: 'coding', finalPrompt: 'Compute the hash of a file' },
      'hash a file',
      { now }
    );
    expect(result.finalPrompt).toBe('Compute the hash of a file');
  });

  it('accepts a custom recursion guard', () => {
    const result = finalizeConfiguration(
      { taskType: 'math', finalPrompt: 'Solve for x' },
      'x + 1 = 2',
      { now, isRecursiveMathPrompt: () => false }
    );
    expect(result.finalPrompt).toBe('Solve for x');
  });

  it('strips nudges and normalizes whitespace', () => {
    const result = finalizeConfiguration(
      {
        finalPrompt:
          'Tell me\na story (Please refine this further) (Please refine this further)',
      },
      'story',
      { now }
    );
    expect(result.finalPrompt).toBe('Tell me a story');
  });

  it('falls back to the query when the prompt still holds a placeholder', () => {
    const result = finalizeConfiguration(
      { finalPrompt: 'Answer: {query}' },
      'What  is rain?',
      { now }
    );
    expect(result.finalPrompt).toBe('What is rain?');
  });

  it('falls back to the query when the prompt is blank', () => {
    expect(finalizeConfiguration({ finalPrompt: '   ' }, 'rain', { now }).finalPrompt).toBe(
      'rain'
    );
  });

  it('returns the raw query when cleanup throws', () => {
    const result = finalizeConfiguration(
      { taskType: 'math', finalPrompt: 'Solve it' },
      ' 2 + 2 ',
      {
        now,
        isRecursiveMathPrompt: () => {
          throw new Error('guard failed');
        },
      }
    );
    expect(result.finalPrompt).toBe(' 2 + 2 ');
    expect(result.taskType).toBe('math');
  });
});

describe('containsMathActionVerb', () => {
  it('matches action verbs case-insensitively', () => {
    expect(containsMathActionVerb('EVALUATE the integral')).toBe(true);
    expect(containsMathActionVerb('What is 2 + 2?')).toBe(false);
  });
});

describe('stripNudge', () => {
  it('removes every nudge marker', () => {
    expect(stripNudge('a (Please refine this further) b (Please refine this further)')).toBe(
      'a  b '
    );
  });
});

describe('normalizeWhitespace', () => {
  it('collapses runs and trims', () => {
    expect(normalizeWhitespace('  a\t\tb \n c ')).toBe('a b c');
  });
});
