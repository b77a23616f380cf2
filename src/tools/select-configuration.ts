import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ErrorResponse, PromptConfiguration } from '../config/types.js';
import {
  createErrorResponse,
  createSuccessResponse,
  ErrorCode,
} from '../lib/errors.js';
import {
  getDefaultCatalog,
  renderPrompt,
  selectConfiguration,
} from '../lib/refinement.js';
import {
  asCodeBlock,
  buildOutput,
  formatParameterLines,
} from '../lib/tool-formatters.js';
import { extractQueryFromInput } from '../lib/tool-helpers.js';
import {
  type SelectConfigurationInput,
  SelectConfigurationInputSchema,
} from '../schemas/index.js';

const TOOL_NAME = 'select_configuration' as const;

const SELECT_CONFIGURATION_TOOL = {
  title: 'Select Configuration',
  description:
    'Classify a query by keyword patterns and return the matching role, task type, technique, composed template and parameter preset. Runs locally without calling a model.',
  inputSchema: SelectConfigurationInputSchema.shape,
  annotations: {
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },
};

function buildSelectionOutput(
  configuration: PromptConfiguration,
  prompt: string
): string {
  return buildOutput(
    'Configuration Selection',
    [
      `Role: ${configuration.role}`,
      `Task type: ${configuration.taskType}`,
      `Technique: ${configuration.technique ?? 'none'}`,
    ],
    [
      { title: 'Template', lines: asCodeBlock(configuration.template) },
      { title: 'Rendered Prompt', lines: asCodeBlock(prompt) },
      {
        title: 'Parameters',
        lines: formatParameterLines(configuration.parameters),
      },
    ]
  );
}

function handleSelectConfiguration(
  input: SelectConfigurationInput
): ReturnType<typeof createSuccessResponse> | ErrorResponse {
  try {
    const parsed = SelectConfigurationInputSchema.parse(input);
    const configuration = selectConfiguration(
      parsed.query,
      getDefaultCatalog(),
      { technique: parsed.technique }
    );
    const prompt = renderPrompt(
      configuration.template,
      parsed.query,
      configuration.role
    );
    return createSuccessResponse(buildSelectionOutput(configuration, prompt), {
      ok: true,
      configuration,
      prompt,
    });
  } catch (error) {
    return createErrorResponse(
      error,
      ErrorCode.E_INVALID_INPUT,
      extractQueryFromInput(input)
    );
  }
}

export function registerSelectConfigurationTool(server: McpServer): void {
  server.registerTool(
    TOOL_NAME,
    SELECT_CONFIGURATION_TOOL,
    handleSelectConfiguration
  );
}
