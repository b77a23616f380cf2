import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import {
  analyzeResults,
  renderReport,
  runFullEvaluation,
  writeResearchArtifacts,
} from '../src/research.js';
import { mean, sampleStdDev } from '../src/research/analysis.js';
import { parameterSetKey } from '../src/research/cases.js';
import type { ExperimentPlan, ExperimentResult } from '../src/research/framework.js';
import { analysisReply, ScriptedModelClient } from './helpers/scripted-client.js';

const plan: ExperimentPlan = {
  cases: [
    {
      query: 'Explain why the sky is blue',
      category: 'explanation',
      expectedRole: 'Teacher',
      expectedTechnique: 'socratic',
      description: 'Explanation',
    },
    {
      query: 'Hello there',
      category: 'chat',
      expectedRole: 'Physicist',
      expectedTechnique: 'zero_shot',
      description: 'Greeting',
    },
  ],
  techniques: ['socratic'],
  parameterSets: [{ temperature: 0.5, num_ctx: 2048, num_predict: 1024 }],
};

function result(overrides: Partial<ExperimentResult>): ExperimentResult {
  return {
    query: 'Explain why the sky is blue',
    technique: 'socratic',
    parameters: { temperature: 0.5, num_ctx: 2048, num_predict: 1024 },
    qualityScore: 0.8,
    iterationsUsed: 2,
    elapsedSeconds: 1,
    finalPrompt: 'Explain Rayleigh scattering',
    roleUsed: 'Teacher',
    reasoning: '',
    ...overrides,
  };
}

describe('statistics', () => {
  it('computes mean and sample standard deviation', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(mean(values)).toBe(5);
    expect(sampleStdDev(values)).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it('returns zero for too few samples', () => {
    expect(mean([])).toBe(0);
    expect(sampleStdDev([0.4])).toBe(0);
  });
});

describe('analyzeResults', () => {
  it('aggregates by technique, parameter set and role', () => {
    const analysis = analyzeResults(
      [
        result({ qualityScore: 0.6, iterationsUsed: 1, elapsedSeconds: 2 }),
        result({
          qualityScore: 1,
          iterationsUsed: 3,
          elapsedSeconds: 4,
          query: 'Hello there',
          roleUsed: 'Assistant',
        }),
      ],
      plan
    );

    expect(analysis.totalExperiments).toBe(2);
    expect(analysis.techniquePerformance.socratic).toEqual({
      avgQuality: 0.8,
      stdQuality: sampleStdDev([0.6, 1]),
      avgIterations: 2,
      samples: 2,
    });
    expect(analysis.parameterImpact).toEqual({
      [parameterSetKey({ temperature: 0.5, num_ctx: 2048, num_predict: 1024 })]: {
        avgQuality: 0.8,
        avgSeconds: 3,
        samples: 2,
      },
    });
    expect(analysis.roleAccuracy).toBe(0.5);
  });

  it('reports zero accuracy without results', () => {
    expect(analyzeResults([], plan)).toEqual({
      totalExperiments: 0,
      techniquePerformance: {},
      parameterImpact: {},
      roleAccuracy: 0,
    });
  });
});

describe('runFullEvaluation', () => {
  it('runs every combination and keeps plan order', async () => {
    const client = new ScriptedModelClient([
      analysisReply({ quality_score: 0.95, improved_prompt: 'A sharper prompt' }),
    ]);
    const progress: number[] = [];

    const results = await runFullEvaluation(
      {
        client,
        concurrency: 2,
        maxIterations: 1,
        onResult: (_result, completed) => {
          progress.push(completed);
        },
      },
      plan
    );

    expect(results.map((item) => [item.query, item.roleUsed, item.qualityScore])).toEqual([
      ['Explain why the sky is blue', 'Teacher', 0.95],
      ['Hello there', 'Assistant', 0.95],
    ]);
    expect(results.every((item) => item.iterationsUsed === 1)).toBe(true);
    expect(progress.sort()).toEqual([1, 2]);
    expect(client.calls).toHaveLength(2);
  });

  it('skips experiments that fail', async () => {
    const client = new ScriptedModelClient(['{}']);
    const results = await runFullEvaluation(
      { client, minIterations: 5, maxIterations: 1 },
      plan
    );

    expect(results).toEqual([]);
    expect(client.calls).toHaveLength(0);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runFullEvaluation(
        { client: new ScriptedModelClient(['{}']), signal: controller.signal },
        plan
      )
    ).rejects.toThrow();
  });
});

describe('research artifacts', () => {
  let outputDir: string | undefined;

  afterEach(async () => {
    if (outputDir) await rm(outputDir, { recursive: true, force: true });
    outputDir = undefined;
  });

  it('renders technique rows and role accuracy', () => {
    const analysis = analyzeResults([result({ qualityScore: 0.75 })], plan);
    const report = renderReport(analysis, plan);

    expect(report.split('\n')).toContain('| socratic | 0.75 | 0.00 | 2.00 | 1 |');
    expect(report.split('\n')).toContain('| temp_0.5_ctx_2048 | 0.75 | 1.00 | 1 |');
    expect(report.split('\n')).toContain('Role accuracy: 100.0%');
  });

  it('writes raw results, analysis and report', async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), 'refinery-research-'));
    const results = [result({})];
    const analysis = analyzeResults(results, plan);

    const artifacts = await writeResearchArtifacts(outputDir, results, analysis, plan);

    expect(artifacts.rawResultsPath).toBe(path.join(outputDir, 'raw_results.json'));
    const raw: unknown = JSON.parse(await readFile(artifacts.rawResultsPath, 'utf8'));
    expect(raw).toEqual(results);
    const summary: unknown = JSON.parse(await readFile(artifacts.analysisPath, 'utf8'));
    expect(summary).toEqual(analysis);
    expect(await readFile(artifacts.reportPath, 'utf8')).toBe(renderReport(analysis, plan));
  });
});
