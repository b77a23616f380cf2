import type { FinalConfiguration, ModelInfo } from '../../config/types.js';
import { createSuccessResponse } from '../../lib/errors.js';
import {
  asCodeBlock,
  buildOutput,
  formatModelLine,
  formatParameterLines,
} from '../../lib/tool-formatters.js';

function buildRefineOutput(
  result: FinalConfiguration,
  model: ModelInfo
): string {
  const meta = [
    formatModelLine(model),
    `Role: ${result.role}`,
    `Task type: ${result.taskType}`,
    `Technique: ${result.technique ?? 'none'}`,
    `Passes: ${result.iterationsUsed} (${result.state ?? 'finalized'})`,
    `Final quality: ${result.finalQuality.toFixed(2)}`,
  ];

  const sections = [
    { title: 'Final Prompt', lines: asCodeBlock(result.finalPrompt) },
    { title: 'Template', lines: asCodeBlock(result.template) },
    { title: 'Parameters', lines: formatParameterLines(result.parameters) },
  ];
  if (result.reasoning) {
    sections.push({ title: 'Reasoning', lines: [result.reasoning] });
  }

  return buildOutput('Prompt Refinement', meta, sections);
}

export function buildRefineResponse(
  result: FinalConfiguration,
  model: ModelInfo
): ReturnType<typeof createSuccessResponse> {
  return createSuccessResponse(buildRefineOutput(result, model), {
    ok: true,
    configuration: result,
    target: model.target,
    model: model.model,
  });
}
