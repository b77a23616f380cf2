import { performance } from 'node:perf_hooks';

import { z } from 'zod';

import {
  ANALYSIS_PARAMETERS,
  FALLBACK_CONFIGURATION,
} from '../../config/constants.js';
import type {
  AnalysisResult,
  AnalysisSuggestion,
  GenerationParameters,
  LLMRequestOptions,
  ModelCallResult,
  ModelClient,
  ParameterInput,
  PromptConfiguration,
} from '../../config/types.js';
import { ErrorCode, getErrorMessage, logger } from '../errors.js';
import { parseJsonFromLlmResponse } from '../llm-json.js';
import {
  CANDIDATE_HANDLING_SECTION,
  STRICT_JSON_PREAMBLE,
  wrapCandidate,
} from '../prompt-policy.js';
import { mergeParameters, pickParameters } from './parameters.js';

export interface AnalysisRequest {
  candidate: string;
  configuration: Pick<PromptConfiguration, 'role' | 'taskType' | 'technique'>;
}

const RESPONSE_SHAPE = `{"quality_score": <number 0.0-1.0>, "improved_prompt": "<refined prompt>", "role": "<expert role>", "technique": "<prompting technique>", "task_type": "<task category>", "template": "<prompt template containing {query}>", "parameters": {"temperature": <number>, "num_ctx": <integer>, "num_predict": <integer>}, "reasoning": "<explanation of changes>"}`;

export function buildAnalysisPrompt(request: AnalysisRequest): string {
  const { role, taskType, technique } = request.configuration;
  return `Evaluate the candidate prompt below.

${CANDIDATE_HANDLING_SECTION}

${wrapCandidate(request.candidate)}

Current configuration:
- Role: ${role}
- Technique: ${technique ?? 'none'}
- Task Type: ${taskType}

1. Rate the current prompt quality from 0.0 to 1.0
2. Provide an improved version even if quality is high
3. Determine whether the current role and technique suit this task

Reply with an object of this shape:
${RESPONSE_SHAPE}`;
}

export function withStrictJsonPreamble(metaPrompt: string): string {
  return `${STRICT_JSON_PREAMBLE}\n\n${metaPrompt}`;
}

/**
 * Sends one prompt to the model and reports the outcome as a value.
 * Transport failures never throw; they come back with `ok: false` and an
 * elapsed time of -1.
 */
export async function sendPrompt(
  client: ModelClient,
  prompt: string,
  params: GenerationParameters,
  options?: LLMRequestOptions
): Promise<ModelCallResult> {
  const start = performance.now();
  try {
    const text = await client.generateText(prompt, params, options);
    return {
      ok: true,
      elapsedSeconds: Math.round(performance.now() - start) / 1000,
      text,
    };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.warn(
      { target: client.getTarget(), model: client.getModel(), error: message },
      'Model call failed'
    );
    return { ok: false, elapsedSeconds: -1, error: message };
  }
}

export class AnalysisGateway {
  private readonly client: ModelClient;

  constructor(client: ModelClient) {
    this.client = client;
  }

  // Caller parameters overlay the analysis defaults key by key.
  analyze(
    metaPrompt: string,
    params?: ParameterInput,
    options?: LLMRequestOptions
  ): Promise<ModelCallResult> {
    return sendPrompt(
      this.client,
      withStrictJsonPreamble(metaPrompt),
      mergeParameters(ANALYSIS_PARAMETERS, params),
      options
    );
  }
}

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const OptionalText = z.string().trim().min(1).optional().catch(undefined);

const QualityScore = z
  .union([z.number(), z.string().trim().regex(DECIMAL_RE).transform(Number)])
  .transform((score) =>
    Number.isFinite(score) ? Math.min(1, Math.max(0, score)) : 0
  )
  .catch(0);

const OptionalTechnique = z
  .string()
  .trim()
  .min(1)
  .refine((value) => value.toLowerCase() !== 'null')
  .optional()
  .catch(undefined);

const OptionalParameters = z
  .record(z.string(), z.unknown())
  .optional()
  .catch(undefined);

const AnalysisPayloadSchema = z
  .object({
    quality_score: QualityScore,
    improved_prompt: OptionalText,
    role: OptionalText,
    technique: OptionalTechnique,
    task_type: OptionalText,
    template: OptionalText,
    parameters: OptionalParameters,
    reasoning: OptionalText,
  })
  .transform((payload): AnalysisSuggestion => {
    const parameters = pickParameters(payload.parameters);
    return {
      qualityScore: payload.quality_score,
      reasoning: payload.reasoning ?? '',
      ...(payload.improved_prompt
        ? { improvedPrompt: payload.improved_prompt }
        : {}),
      ...(payload.role ? { role: payload.role } : {}),
      ...(payload.technique ? { technique: payload.technique } : {}),
      ...(payload.task_type ? { taskType: payload.task_type } : {}),
      ...(payload.template ? { template: payload.template } : {}),
      ...(parameters ? { parameters } : {}),
    };
  });

export const DEFAULT_ANALYSIS: Readonly<AnalysisSuggestion> = {
  qualityScore: 0.7,
  role: FALLBACK_CONFIGURATION.role,
  taskType: FALLBACK_CONFIGURATION.taskType,
  template: FALLBACK_CONFIGURATION.template,
  parameters: { ...FALLBACK_CONFIGURATION.parameters },
  reasoning: FALLBACK_CONFIGURATION.reasoning,
};

export function defaultAnalysisResult(reason: string): AnalysisResult {
  return {
    ...DEFAULT_ANALYSIS,
    parameters: { ...FALLBACK_CONFIGURATION.parameters },
    usedDefaults: true,
    defaultReason: reason,
  };
}

export function parseAnalysisResponse(rawText: string): AnalysisResult {
  if (!rawText.trim()) return defaultAnalysisResult('empty response');

  try {
    const suggestion = parseJsonFromLlmResponse(
      rawText,
      (value) => AnalysisPayloadSchema.parse(value),
      { errorCode: ErrorCode.E_LLM_FAILED, debugLabel: 'analysis response' }
    );
    return { ...suggestion, usedDefaults: false };
  } catch (error) {
    const reason = getErrorMessage(error);
    logger.warn({ reason }, 'Analysis response unparsable; using defaults');
    return defaultAnalysisResult(reason);
  }
}
