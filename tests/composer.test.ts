import { describe, expect, it } from 'vitest';

import {
  composeTemplate,
  createTemplateCatalog,
  ensureQueryPlaceholder,
  formatTemplate,
  getDefaultCatalog,
  renderPrompt,
  TECHNIQUE_TEMPLATES,
  TemplateFormatError,
} from '../src/lib/refinement.js';

const catalog = createTemplateCatalog({
  roleTemplates: {
    Mathematician: 'Solve step-by-step: {query}',
    Assistant: '{query}',
  },
  techniqueTemplates: {
    ...TECHNIQUE_TEMPLATES,
    broken: 'Use {missing} for {query}',
    no_query: 'Just answer.',
  },
  taskParameters: {
    default: { temperature: 0.7, num_ctx: 2048, num_predict: 1024 },
    math: { temperature: 0.2, num_ctx: 2048, num_predict: 1024 },
  },
});

describe('formatTemplate', () => {
  it('substitutes named placeholders', () => {
    expect(formatTemplate('{role}: {query}', { role: 'Poet', query: 'rain' })).toBe(
      'Poet: rain'
    );
  });

  it('does not re-scan substituted values', () => {
    expect(formatTemplate('A {query} B', { query: '{query}' })).toBe('A {query} B');
  });

  it('throws on a placeholder without a value', () => {
    expect(() => formatTemplate('{other}', { query: 'x' })).toThrow(
      TemplateFormatError
    );
  });

  it('treats doubled braces as literal braces', () => {
    expect(formatTemplate('Return {{"a":1}} for {query}', { query: 'Better' })).toBe(
      'Return {"a":1} for Better'
    );
    expect(formatTemplate('{{query}} is {query}', { query: 'x' })).toBe('{query} is x');
  });

  it('ignores inherited object keys', () => {
    expect(() => formatTemplate('{constructor}', {})).toThrow(TemplateFormatError);
  });
});

describe('composeTemplate', () => {
  it('nests the role template inside the technique template', () => {
    expect(composeTemplate('Mathematician', 'chain_of_thought', catalog)).toBe(
      "Think through this step-by-step: Solve step-by-step: {query}\n\nLet's break this down into parts and solve methodically."
    );
  });

  it('fills the role name for role playing', () => {
    expect(composeTemplate('Mathematician', 'role_playing', catalog)).toBe(
      'You are an expert Mathematician. Solve step-by-step: {query}'
    );
  });

  it('uses the role template alone when no technique is given', () => {
    expect(composeTemplate('Mathematician', null, catalog)).toBe(
      'Solve step-by-step: {query}'
    );
  });

  it('falls back to the role template when composition fails', () => {
    expect(composeTemplate('Mathematician', 'broken', catalog)).toBe(
      'Solve step-by-step: {query}'
    );
  });

  it('returns the identity template when the result lost its placeholder', () => {
    expect(composeTemplate('Mathematician', 'no_query', catalog)).toBe('{query}');
  });

  it('treats unknown roles and techniques as identity', () => {
    expect(composeTemplate('Astronaut', 'unknown', catalog)).toBe('{query}');
  });

  it('always contains the query placeholder for every catalog pairing', () => {
    const defaults = getDefaultCatalog();
    for (const role of defaults.roles()) {
      for (const technique of defaults.techniques()) {
        expect(composeTemplate(role, technique, defaults)).toContain('{query}');
      }
    }
  });
});

describe('ensureQueryPlaceholder', () => {
  it('keeps templates that contain the placeholder', () => {
    expect(ensureQueryPlaceholder('Q: {query}')).toBe('Q: {query}');
  });

  it('replaces templates without it', () => {
    expect(ensureQueryPlaceholder('Q:')).toBe('{query}');
  });

  it('does not count an escaped placeholder', () => {
    expect(ensureQueryPlaceholder('Show {{query}} literally')).toBe('{query}');
  });
});

describe('renderPrompt', () => {
  it('renders query and role', () => {
    expect(renderPrompt('You are an expert {role}. {query}', 'Add 2 and 2', 'Mathematician')).toBe(
      'You are an expert Mathematician. Add 2 and 2'
    );
  });
});
