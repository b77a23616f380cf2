import path from 'node:path';

import { logger } from './lib/errors.js';
import { getModelClient } from './lib/llm-client.js';
import { analyzeResults } from './research/analysis.js';
import {
  type ExperimentPlan,
  runFullEvaluation,
  STANDARD_PLAN,
} from './research/framework.js';
import {
  type ResearchArtifacts,
  writeResearchArtifacts,
} from './research/report.js';

export interface ResearchRunOptions {
  outputDir?: string;
  concurrency?: number;
  signal?: AbortSignal;
  plan?: ExperimentPlan;
}

export const DEFAULT_OUTPUT_DIR = 'research-output';

export async function runResearch(
  options: ResearchRunOptions = {}
): Promise<ResearchArtifacts> {
  const plan = options.plan ?? STANDARD_PLAN;
  const client = await getModelClient();
  const results = await runFullEvaluation(
    {
      client,
      concurrency: options.concurrency,
      signal: options.signal,
      onResult: (result, completed, total) => {
        logger.info(
          {
            technique: result.technique,
            quality: result.qualityScore,
            passes: result.iterationsUsed,
          },
          `Experiment ${completed}/${total} done`
        );
      },
    },
    plan
  );

  const analysis = analyzeResults(results, plan);
  return writeResearchArtifacts(
    path.resolve(options.outputDir ?? DEFAULT_OUTPUT_DIR),
    results,
    analysis,
    plan
  );
}

export { analyzeResults } from './research/analysis.js';
export { renderReport, writeResearchArtifacts } from './research/report.js';
export {
  runExperiment,
  runFullEvaluation,
  STANDARD_PLAN,
} from './research/framework.js';
