import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { logger } from '../lib/errors.js';
import type { ResearchAnalysis } from './analysis.js';
import type { ExperimentPlan, ExperimentResult } from './framework.js';

export interface ResearchArtifacts {
  rawResultsPath: string;
  analysisPath: string;
  reportPath: string;
}

function formatNumber(value: number): string {
  return value.toFixed(2);
}

export function renderReport(
  analysis: ResearchAnalysis,
  plan: ExperimentPlan
): string {
  const lines: string[] = [
    '# Automated Prompt Configuration: Experimental Results',
    '',
    '## Overview',
    `We tested ${plan.techniques.length} techniques across ${plan.cases.length} test cases, with ${plan.parameterSets.length} parameter variations for each combination (${analysis.totalExperiments} completed experiments).`,
    '',
    '## Technique Performance',
    '',
    '| Technique | Avg quality | Std dev | Avg passes | Runs |',
    '| --- | --- | --- | --- | --- |',
  ];

  for (const technique of plan.techniques) {
    const stats = analysis.techniquePerformance[technique];
    if (!stats) continue;
    lines.push(
      `| ${technique} | ${formatNumber(stats.avgQuality)} | ${formatNumber(stats.stdQuality)} | ${formatNumber(stats.avgIterations)} | ${stats.samples} |`
    );
  }

  lines.push(
    '',
    '## Parameter Impact',
    '',
    '| Parameter set | Avg quality | Avg seconds | Runs |',
    '| --- | --- | --- | --- |'
  );
  for (const [key, impact] of Object.entries(analysis.parameterImpact)) {
    lines.push(
      `| ${key} | ${formatNumber(impact.avgQuality)} | ${formatNumber(impact.avgSeconds)} | ${impact.samples} |`
    );
  }

  lines.push(
    '',
    '## Role Selection',
    '',
    `Role accuracy: ${(analysis.roleAccuracy * 100).toFixed(1)}%`,
    ''
  );

  return lines.join('\n');
}

export async function writeResearchArtifacts(
  outputDir: string,
  results: readonly ExperimentResult[],
  analysis: ResearchAnalysis,
  plan: ExperimentPlan
): Promise<ResearchArtifacts> {
  await mkdir(outputDir, { recursive: true });

  const artifacts: ResearchArtifacts = {
    rawResultsPath: path.join(outputDir, 'raw_results.json'),
    analysisPath: path.join(outputDir, 'analysis_summary.json'),
    reportPath: path.join(outputDir, 'research_report.md'),
  };

  await Promise.all([
    writeFile(
      artifacts.rawResultsPath,
      JSON.stringify(results, null, 2),
      'utf8'
    ),
    writeFile(
      artifacts.analysisPath,
      JSON.stringify(analysis, null, 2),
      'utf8'
    ),
    writeFile(artifacts.reportPath, renderReport(analysis, plan), 'utf8'),
  ]);

  logger.info({ outputDir }, 'Research artifacts written');
  return artifacts;
}
