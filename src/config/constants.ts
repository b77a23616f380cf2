import { readFileSync } from 'node:fs';

import { config } from './env.js';
import type { BackendTarget, GenerationParameters } from './types.js';

export { SERVER_INSTRUCTIONS } from './instructions.js';

function readPackageVersion(): string {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), {
    encoding: 'utf8',
  });
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return '0.0.0';
}

export const SERVER_NAME = 'prompt-refinery-mcp';
export const SERVER_VERSION = readPackageVersion();

export const MAX_PROMPT_LENGTH = config.MAX_PROMPT_LENGTH;

export const LLM_TIMEOUT_MS = config.LLM_TIMEOUT_MS;
export const LLM_MAX_RESPONSE_LENGTH = 500_000;
export const LLM_ERROR_PREVIEW_CHARS = 500;

export const DEFAULT_BASE_URLS: Record<BackendTarget, string> = {
  ollama: 'http://localhost:11434',
  'open-webui': 'http://localhost:3000/api',
};

export const QUERY_PLACEHOLDER = '{query}';
export const IDENTITY_TEMPLATE = QUERY_PLACEHOLDER;
export const NUDGE_SUFFIX = ' (Please refine this further)';

export const REFINEMENT_DEFAULTS = {
  minIterations: config.REFINE_MIN_ITERATIONS,
  maxIterations: config.REFINE_MAX_ITERATIONS,
  qualityThreshold: 0.9,
} as const;

export const ANALYSIS_PARAMETERS: GenerationParameters = {
  temperature: 0.2,
  num_ctx: 2048,
  num_predict: 512,
};

export const PARAMETER_DEFAULTS: GenerationParameters = {
  temperature: 0.7,
  num_ctx: 2048,
  num_predict: 1024,
};

export interface NumericBounds {
  min: number;
  max: number;
}

export type ParameterBounds = Record<keyof GenerationParameters, NumericBounds>;

// Bounds for meta-analysis calls.
export const ANALYSIS_BOUNDS: ParameterBounds = {
  temperature: { min: 0, max: 1 },
  num_ctx: { min: 512, max: 8192 },
  num_predict: { min: 64, max: 4096 },
};

// Stricter bounds for a configuration about to be used for real generation.
export const DELIVERY_BOUNDS: ParameterBounds = {
  temperature: { min: 0.1, max: 1 },
  num_ctx: { min: 1024, max: 8192 },
  num_predict: { min: 512, max: 4096 },
};

export const FALLBACK_CONFIGURATION = {
  role: 'Mathematician',
  taskType: 'math',
  template: 'Calculate the following mathematical expression step-by-step: {query}',
  parameters: { temperature: 0.2, num_ctx: 2048, num_predict: 1024 },
  reasoning: 'Default configuration for mathematical calculation',
} as const;
