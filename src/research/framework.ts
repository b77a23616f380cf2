import { performance } from 'node:perf_hooks';

import { REFINEMENT_DEFAULTS } from '../config/constants.js';
import type {
  GenerationParameters,
  ModelClient,
  PromptTechnique,
} from '../config/types.js';
import { getErrorMessage, logger } from '../lib/errors.js';
import { refine, type TemplateCatalog } from '../lib/refinement.js';
import {
  RESEARCH_PARAMETER_SETS,
  RESEARCH_TECHNIQUES,
  type ResearchCase,
  STANDARD_CASES,
} from './cases.js';

export interface ExperimentResult {
  query: string;
  technique: PromptTechnique;
  parameters: GenerationParameters;
  qualityScore: number;
  iterationsUsed: number;
  elapsedSeconds: number;
  finalPrompt: string;
  roleUsed: string;
  reasoning: string;
}

export interface ExperimentPlan {
  cases: readonly ResearchCase[];
  techniques: readonly PromptTechnique[];
  parameterSets: readonly GenerationParameters[];
}

export interface ResearchOptions {
  client: ModelClient;
  catalog?: TemplateCatalog;
  concurrency?: number;
  minIterations?: number;
  maxIterations?: number;
  qualityThreshold?: number;
  signal?: AbortSignal;
  onResult?: (
    result: ExperimentResult,
    completed: number,
    total: number
  ) => void;
}

interface ExperimentJob {
  testCase: ResearchCase;
  technique: PromptTechnique;
  parameters: GenerationParameters;
}

export const DEFAULT_CONCURRENCY = 2;

export const STANDARD_PLAN: ExperimentPlan = {
  cases: STANDARD_CASES,
  techniques: RESEARCH_TECHNIQUES,
  parameterSets: RESEARCH_PARAMETER_SETS,
};

export async function runExperiment(
  testCase: ResearchCase,
  technique: PromptTechnique,
  parameters: GenerationParameters,
  options: ResearchOptions
): Promise<ExperimentResult> {
  const start = performance.now();
  const maxIterations =
    options.maxIterations ?? REFINEMENT_DEFAULTS.maxIterations;
  const result = await refine(testCase.query, {
    client: options.client,
    technique,
    parameters,
    minIterations: options.minIterations ?? Math.min(3, maxIterations),
    maxIterations,
    qualityThreshold: options.qualityThreshold ?? 0.9,
    catalog: options.catalog,
    signal: options.signal,
  });

  return {
    query: testCase.query,
    technique,
    parameters,
    qualityScore: result.finalQuality,
    iterationsUsed: result.iterationsUsed,
    elapsedSeconds: (performance.now() - start) / 1000,
    finalPrompt: result.finalPrompt,
    roleUsed: result.role,
    reasoning: result.reasoning ?? '',
  };
}

function expandJobs(plan: ExperimentPlan): ExperimentJob[] {
  return plan.cases.flatMap((testCase) =>
    plan.techniques.flatMap((technique) =>
      plan.parameterSets.map((parameters) => ({
        testCase,
        technique,
        parameters,
      }))
    )
  );
}

/**
 * Runs every case x technique x parameter-set combination with at most
 * `concurrency` refinements in flight. Results keep plan order; failed
 * experiments are logged and left out.
 */
export async function runFullEvaluation(
  options: ResearchOptions,
  plan: ExperimentPlan = STANDARD_PLAN
): Promise<ExperimentResult[]> {
  const jobs = expandJobs(plan);
  const slots: (ExperimentResult | null)[] = new Array<ExperimentResult | null>(
    jobs.length
  ).fill(null);
  const workerCount = Math.max(
    1,
    Math.min(options.concurrency ?? DEFAULT_CONCURRENCY, jobs.length)
  );
  let nextIndex = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    for (let index = nextIndex++; index < jobs.length; index = nextIndex++) {
      const job = jobs[index];
      if (!job) continue;
      options.signal?.throwIfAborted();
      try {
        const result = await runExperiment(
          job.testCase,
          job.technique,
          job.parameters,
          options
        );
        slots[index] = result;
        completed += 1;
        options.onResult?.(result, completed, jobs.length);
      } catch (error) {
        if (options.signal?.aborted) throw error;
        completed += 1;
        logger.error(
          {
            query: job.testCase.query,
            technique: job.technique,
            reason: getErrorMessage(error),
          },
          'Experiment failed'
        );
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return slots.filter((result): result is ExperimentResult => result !== null);
}
