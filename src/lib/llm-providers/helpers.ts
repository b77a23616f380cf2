import type OpenAI from 'openai';

import { LLM_TIMEOUT_MS } from '../../config/constants.js';
import type {
  GenerationParameters,
  LLMRequestOptions,
} from '../../config/types.js';

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options: GenerationParameters;
}

export interface OllamaGenerateResponse {
  model?: string;
  response?: string;
  done?: boolean;
}

export function trimText(value: string | null | undefined): string {
  return value?.trim() ?? '';
}

export function buildTimeoutOptions(options?: LLMRequestOptions): {
  timeout: number;
  signal?: AbortSignal;
} {
  return {
    timeout: options?.timeoutMs ?? LLM_TIMEOUT_MS,
    ...(options?.signal ? { signal: options.signal } : {}),
  };
}

export function buildOllamaRequest(
  model: string,
  prompt: string,
  params: GenerationParameters
): OllamaGenerateRequest {
  return {
    model,
    prompt,
    stream: false,
    options: {
      temperature: params.temperature,
      num_ctx: params.num_ctx,
      num_predict: params.num_predict,
    },
  };
}

export function extractOllamaText(response: OllamaGenerateResponse): string {
  return trimText(response.response);
}

// The OpenAI-compatible surface has no context-size knob, so num_ctx is
// dropped.
export function buildOpenWebUIRequest(
  model: string,
  prompt: string,
  params: GenerationParameters
): OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming {
  return {
    model,
    messages: [{ role: 'user', content: prompt }],
    temperature: params.temperature,
    max_tokens: params.num_predict,
  };
}

export function extractOpenWebUIText(
  response: OpenAI.Chat.Completions.ChatCompletion
): string {
  const choice = response.choices[0];
  if (!choice) return '';
  return trimText(choice.message.content);
}
