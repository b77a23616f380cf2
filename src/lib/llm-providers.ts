import axios from 'axios';
import OpenAI from 'openai';

import type {
  BackendTarget,
  GenerationParameters,
  LLMRequestOptions,
  ModelClient,
} from '../config/types.js';
import {
  buildOllamaRequest,
  buildOpenWebUIRequest,
  buildTimeoutOptions,
  extractOllamaText,
  extractOpenWebUIText,
  type OllamaGenerateResponse,
} from './llm-providers/helpers.js';
import { runGeneration } from './llm-runtime.js';

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

class OllamaClient implements ModelClient {
  private readonly endpoint: string;
  private readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly target: BackendTarget = 'ollama';

  constructor(baseUrl: string, model: string, apiKey?: string) {
    this.endpoint = `${trimTrailingSlash(baseUrl)}/api/generate`;
    this.model = model;
    this.apiKey = apiKey;
  }

  generateText(
    prompt: string,
    params: GenerationParameters,
    options?: LLMRequestOptions
  ): Promise<string> {
    return runGeneration(
      this.target,
      this.model,
      () => this.requestCompletion(prompt, params, options),
      options?.signal
    );
  }

  private async requestCompletion(
    prompt: string,
    params: GenerationParameters,
    options?: LLMRequestOptions
  ): Promise<string> {
    const response = await axios.post<OllamaGenerateResponse>(
      this.endpoint,
      buildOllamaRequest(this.model, prompt, params),
      {
        ...buildTimeoutOptions(options),
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
      }
    );
    return extractOllamaText(response.data);
  }

  getTarget(): BackendTarget {
    return this.target;
  }

  getModel(): string {
    return this.model;
  }
}

class OpenWebUIClient implements ModelClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly target: BackendTarget = 'open-webui';

  constructor(baseUrl: string, model: string, apiKey: string) {
    // Retries are handled by runGeneration.
    this.client = new OpenAI({
      apiKey,
      baseURL: trimTrailingSlash(baseUrl),
      maxRetries: 0,
    });
    this.model = model;
  }

  generateText(
    prompt: string,
    params: GenerationParameters,
    options?: LLMRequestOptions
  ): Promise<string> {
    const request = buildOpenWebUIRequest(this.model, prompt, params);
    return runGeneration(
      this.target,
      this.model,
      async () => {
        const response = await this.client.chat.completions.create(
          request,
          buildTimeoutOptions(options)
        );
        return extractOpenWebUIText(response);
      },
      options?.signal
    );
  }

  getTarget(): BackendTarget {
    return this.target;
  }

  getModel(): string {
    return this.model;
  }
}

export { OllamaClient, OpenWebUIClient };
