import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { REFINEMENT_DEFAULTS } from '../config/constants.js';
import type { ErrorResponse } from '../config/types.js';
import { createErrorResponse, ErrorCode } from '../lib/errors.js';
import type { createSuccessResponse } from '../lib/errors.js';
import { getModelClient } from '../lib/llm-client.js';
import { type IterationProgress, refine } from '../lib/refinement.js';
import {
  extractQueryFromInput,
  sendProgress,
  type ToolExtra,
} from '../lib/tool-helpers.js';
import {
  type RefinePromptInput,
  RefinePromptInputSchema,
} from '../schemas/index.js';
import { buildRefineResponse } from './refine-prompt/output.js';

const TOOL_NAME = 'refine_prompt' as const;

const REFINE_PROMPT_TOOL = {
  title: 'Refine Prompt',
  description:
    'Iteratively grade and improve a query with the configured model, then return the best role, technique, template, generation parameters and final prompt. Use when a query should be turned into a ready-to-send prompt configuration.',
  inputSchema: RefinePromptInputSchema.shape,
  annotations: {
    readOnlyHint: true,
    idempotentHint: false,
    openWorldHint: true,
  },
};

// A caller lowering maxIterations below the default minimum should not be
// rejected.
function resolveIterationLimits(input: {
  minIterations?: number | undefined;
  maxIterations?: number | undefined;
}): { minIterations: number; maxIterations: number } {
  const maxIterations =
    input.maxIterations ?? REFINEMENT_DEFAULTS.maxIterations;
  const minIterations =
    input.minIterations ??
    Math.min(REFINEMENT_DEFAULTS.minIterations, maxIterations);
  return { minIterations, maxIterations };
}

function formatProgress(progress: IterationProgress): string {
  const quality = progress.quality.toFixed(2);
  return `Pass ${progress.iteration}/${progress.maxIterations}: quality ${quality} (${progress.state})`;
}

async function handleRefinePrompt(
  input: RefinePromptInput,
  extra: ToolExtra
): Promise<ReturnType<typeof createSuccessResponse> | ErrorResponse> {
  try {
    const parsed = RefinePromptInputSchema.parse(input);
    const client = await getModelClient();
    const result = await refine(parsed.query, {
      client,
      ...resolveIterationLimits(parsed),
      qualityThreshold: parsed.qualityThreshold,
      technique: parsed.technique,
      parameters: parsed.parameters,
      signal: extra.signal,
      onIteration: (progress) =>
        sendProgress(
          extra,
          progress.iteration,
          progress.maxIterations,
          formatProgress(progress)
        ),
    });
    return buildRefineResponse(result, {
      target: client.getTarget(),
      model: client.getModel(),
    });
  } catch (error) {
    return createErrorResponse(
      error,
      ErrorCode.E_LLM_FAILED,
      extractQueryFromInput(input)
    );
  }
}

export function registerRefinePromptTool(server: McpServer): void {
  server.registerTool(TOOL_NAME, REFINE_PROMPT_TOOL, handleRefinePrompt);
}
