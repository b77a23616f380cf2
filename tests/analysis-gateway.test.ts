import { describe, expect, it } from 'vitest';

import { STRICT_JSON_PREAMBLE } from '../src/lib/prompt-policy.js';
import {
  AnalysisGateway,
  buildAnalysisPrompt,
  DEFAULT_ANALYSIS,
  parseAnalysisResponse,
  sendPrompt,
} from '../src/lib/refinement.js';
import { ScriptedModelClient } from './helpers/scripted-client.js';

describe('sendPrompt', () => {
  it('returns the model text with elapsed seconds', async () => {
    const client = new ScriptedModelClient(['hello']);
    const result = await sendPrompt(client, 'hi', {
      temperature: 0.5,
      num_ctx: 2048,
      num_predict: 256,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.text).toBe('hello');
    expect(result.elapsedSeconds).toBeGreaterThanOrEqual(0);
  });

  it('reports transport failures as a value with elapsed -1', async () => {
    const client = new ScriptedModelClient([new Error('connection refused')]);
    const result = await sendPrompt(client, 'hi', {
      temperature: 0.5,
      num_ctx: 2048,
      num_predict: 256,
    });

    expect(result).toEqual({
      ok: false,
      elapsedSeconds: -1,
      error: 'connection refused',
    });
  });
});

describe('AnalysisGateway.analyze', () => {
  it('prefixes the strict JSON preamble and uses analysis defaults', async () => {
    const client = new ScriptedModelClient(['{}']);
    await new AnalysisGateway(client).analyze('Rate this');

    expect(client.calls[0]?.prompt).toBe(`${STRICT_JSON_PREAMBLE}\n\nRate this`);
    expect(client.calls[0]?.params).toEqual({
      temperature: 0.2,
      num_ctx: 2048,
      num_predict: 512,
    });
  });

  it('overlays caller parameters key by key', async () => {
    const client = new ScriptedModelClient(['{}']);
    await new AnalysisGateway(client).analyze('Rate this', { temperature: 0.6 });

    expect(client.calls[0]?.params).toEqual({
      temperature: 0.6,
      num_ctx: 2048,
      num_predict: 512,
    });
  });

  it('forwards the abort signal to the transport', async () => {
    const client = new ScriptedModelClient(['{}']);
    const controller = new AbortController();
    await new AnalysisGateway(client).analyze('Rate this', undefined, {
      signal: controller.signal,
    });

    expect(client.calls[0]?.options?.signal).toBe(controller.signal);
  });
});

describe('buildAnalysisPrompt', () => {
  it('embeds the candidate as a JSON string and lists the configuration', () => {
    const prompt = buildAnalysisPrompt({
      candidate: 'Say "hi"',
      configuration: { role: 'Teacher', taskType: 'explanation', technique: null },
    });

    expect(prompt).toContain('"Say \\"hi\\""');
    expect(prompt).toContain('- Role: Teacher');
    expect(prompt).toContain('- Technique: none');
    expect(prompt).toContain('- Task Type: explanation');
  });
});

describe('parseAnalysisResponse', () => {
  it('maps snake_case fields onto the suggestion', () => {
    const result = parseAnalysisResponse(
      JSON.stringify({
        quality_score: 0.85,
        improved_prompt: ' Explain Rayleigh scattering ',
        role: 'Physicist',
        technique: 'socratic',
        task_type: 'explanation',
        template: 'Explain: {query}',
        parameters: { temperature: 0.4, num_ctx: 4096, top_p: 0.9 },
        reasoning: 'More specific',
      })
    );

    expect(result).toEqual({
      usedDefaults: false,
      qualityScore: 0.85,
      improvedPrompt: 'Explain Rayleigh scattering',
      role: 'Physicist',
      technique: 'socratic',
      taskType: 'explanation',
      template: 'Explain: {query}',
      parameters: { temperature: 0.4, num_ctx: 4096 },
      reasoning: 'More specific',
    });
  });

  it('accepts fenced JSON with a string score', () => {
    const result = parseAnalysisResponse(
      '```json\n{"quality_score": "0.5", "reasoning": "ok"}\n```'
    );

    expect(result).toEqual({ usedDefaults: false, qualityScore: 0.5, reasoning: 'ok' });
  });

  it('clamps out-of-range scores and drops a null technique', () => {
    const result = parseAnalysisResponse('{"quality_score": 7, "technique": "null"}');

    expect(result.qualityScore).toBe(1);
    expect(result.technique).toBeUndefined();
  });

  it('repairs raw line breaks inside string values', () => {
    const result = parseAnalysisResponse(
      'Sure: {"quality_score": 0.9, "improved_prompt": "Line one\nLine two"}'
    );

    expect(result.usedDefaults).toBe(false);
    expect(result.improvedPrompt).toBe('Line one\nLine two');
  });

  it('returns the default result for unparsable text', () => {
    const result = parseAnalysisResponse('I cannot answer that.');

    expect(result.usedDefaults).toBe(true);
    expect(result.qualityScore).toBe(DEFAULT_ANALYSIS.qualityScore);
    expect(result.role).toBe('Mathematician');
    expect(result.template).toBe(
      'Calculate the following mathematical expression step-by-step: {query}'
    );
    expect(result.improvedPrompt).toBeUndefined();
  });

  it('returns the default result for an empty reply', () => {
    const result = parseAnalysisResponse('   ');

    expect(result.usedDefaults).toBe(true);
    if (!result.usedDefaults) return;
    expect(result.defaultReason).toBe('empty response');
  });
});
