import type { PromptTechnique } from '../config/types.js';
import { parameterSetKey } from './cases.js';
import type { ExperimentPlan, ExperimentResult } from './framework.js';

export interface TechniquePerformance {
  avgQuality: number;
  stdQuality: number;
  avgIterations: number;
  samples: number;
}

export interface ParameterImpact {
  avgQuality: number;
  avgSeconds: number;
  samples: number;
}

export interface ResearchAnalysis {
  totalExperiments: number;
  techniquePerformance: Partial<Record<PromptTechnique, TechniquePerformance>>;
  parameterImpact: Record<string, ParameterImpact>;
  roleAccuracy: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// Sample standard deviation; 0 below two samples.
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function analyzeResults(
  results: readonly ExperimentResult[],
  plan: ExperimentPlan
): ResearchAnalysis {
  const techniquePerformance: ResearchAnalysis['techniquePerformance'] = {};
  for (const technique of plan.techniques) {
    const matching = results.filter((result) => result.technique === technique);
    if (matching.length === 0) continue;
    const qualities = matching.map((result) => result.qualityScore);
    techniquePerformance[technique] = {
      avgQuality: mean(qualities),
      stdQuality: sampleStdDev(qualities),
      avgIterations: mean(matching.map((result) => result.iterationsUsed)),
      samples: matching.length,
    };
  }

  const parameterImpact: Record<string, ParameterImpact> = {};
  for (const params of plan.parameterSets) {
    const matching = results.filter(
      (result) =>
        result.parameters.temperature === params.temperature &&
        result.parameters.num_ctx === params.num_ctx
    );
    if (matching.length === 0) continue;
    parameterImpact[parameterSetKey(params)] = {
      avgQuality: mean(matching.map((result) => result.qualityScore)),
      avgSeconds: mean(matching.map((result) => result.elapsedSeconds)),
      samples: matching.length,
    };
  }

  const expectedRoles = new Map(
    plan.cases.map((testCase) => [testCase.query, testCase.expectedRole])
  );
  const roleMatches = results.filter(
    (result) => expectedRoles.get(result.query) === result.roleUsed
  ).length;

  return {
    totalExperiments: results.length,
    techniquePerformance,
    parameterImpact,
    roleAccuracy: results.length === 0 ? 0 : roleMatches / results.length,
  };
}
