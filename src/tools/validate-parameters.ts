import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import {
  ANALYSIS_BOUNDS,
  DELIVERY_BOUNDS,
  PARAMETER_DEFAULTS,
} from '../config/constants.js';
import type {
  ErrorResponse,
  GenerationParameters,
  ParameterInput,
  ParameterName,
} from '../config/types.js';
import {
  createErrorResponse,
  createSuccessResponse,
  ErrorCode,
} from '../lib/errors.js';
import { mergeParameters, PARAMETER_PRESETS } from '../lib/refinement.js';
import {
  asBulletList,
  buildOutput,
  formatParameterLines,
} from '../lib/tool-formatters.js';
import {
  type ValidateParametersInput,
  ValidateParametersInputSchema,
} from '../schemas/index.js';

const TOOL_NAME = 'validate_parameters' as const;

const VALIDATE_PARAMETERS_TOOL = {
  title: 'Validate Parameters',
  description:
    'Coerce and clamp generation parameters (temperature, num_ctx, num_predict) into safe bounds, optionally on top of a named preset. Unparsable values fall back to defaults.',
  inputSchema: ValidateParametersInputSchema.shape,
  annotations: {
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },
};

const PARAMETER_NAMES: readonly ParameterName[] = [
  'temperature',
  'num_ctx',
  'num_predict',
];

export function describeAdjustments(
  requested: ParameterInput,
  validated: GenerationParameters
): string[] {
  const adjustments: string[] = [];
  for (const name of PARAMETER_NAMES) {
    const value = requested[name];
    if (value === undefined) continue;
    if (Number(value) !== validated[name]) {
      adjustments.push(`${name}: ${String(value)} -> ${validated[name]}`);
    }
  }
  return adjustments;
}

function handleValidateParameters(
  input: ValidateParametersInput
): ReturnType<typeof createSuccessResponse> | ErrorResponse {
  try {
    const parsed = ValidateParametersInputSchema.parse(input);
    const base = parsed.preset
      ? PARAMETER_PRESETS[parsed.preset]
      : PARAMETER_DEFAULTS;
    const bounds =
      parsed.bounds === 'delivery' ? DELIVERY_BOUNDS : ANALYSIS_BOUNDS;
    const parameters = mergeParameters(base, parsed.parameters, bounds);
    const adjustments = describeAdjustments(parsed.parameters, parameters);

    const output = buildOutput(
      'Parameter Validation',
      [`Bounds: ${parsed.bounds}`, `Preset: ${parsed.preset ?? 'none'}`],
      [
        { title: 'Parameters', lines: formatParameterLines(parameters) },
        {
          title: 'Adjustments',
          lines: adjustments.length ? asBulletList(adjustments) : ['- (none)'],
        },
      ]
    );
    return createSuccessResponse(output, {
      ok: true,
      parameters,
      adjustments,
      bounds: parsed.bounds,
    });
  } catch (error) {
    return createErrorResponse(error, ErrorCode.E_INVALID_INPUT);
  }
}

export function registerValidateParametersTool(server: McpServer): void {
  server.registerTool(
    TOOL_NAME,
    VALIDATE_PARAMETERS_TOOL,
    handleValidateParameters
  );
}
