import axios, { AxiosError } from 'axios';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { ErrorCode } from '../src/lib/errors.js';
import { createModelClient } from '../src/lib/llm-client.js';
import { buildOpenWebUIRequest } from '../src/lib/llm-providers/helpers.js';
import { ollamaResponse, requestConfig } from './helpers/axios-responses.js';

const params = { temperature: 0.2, num_ctx: 2048, num_predict: 512 };

describe('createModelClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires an API key for open-webui', () => {
    expect(() => createModelClient('open-webui', 'test-model')).toThrow(
      'Missing LLM_API_KEY environment variable for target: open-webui'
    );
  });

  it('posts a non-streaming generate request to ollama', async () => {
    const post = vi.spyOn(axios, 'post').mockResolvedValue(ollamaResponse('  graded  '));
    const client = createModelClient('ollama', 'test-model', {
      baseUrl: 'http://localhost:11434/',
      apiKey: 'test-secret',
    });

    await expect(client.generateText('Rate this', params, { timeoutMs: 5000 })).resolves.toBe(
      'graded'
    );
    expect(post).toHaveBeenCalledWith(
      'http://localhost:11434/api/generate',
      { model: 'test-model', prompt: 'Rate this', stream: false, options: params },
      {
        timeout: 5000,
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
        },
      }
    );
    expect(client.getTarget()).toBe('ollama');
    expect(client.getModel()).toBe('test-model');
  });

  it('classifies HTTP failures from ollama', async () => {
    const config = requestConfig();
    const post = vi
      .spyOn(axios, 'post')
      .mockRejectedValue(
        new AxiosError('Unauthorized', 'ERR_BAD_REQUEST', config, undefined, {
          ...ollamaResponse('', 401),
          config,
        })
      );
    const client = createModelClient('ollama', 'test-model');

    await expect(client.generateText('Rate this', params)).rejects.toMatchObject({
      code: ErrorCode.E_LLM_AUTH_FAILED,
      message: 'Authentication failed for ollama (HTTP 401)',
    });
    expect(post).toHaveBeenCalledTimes(1);
  });
});

describe('buildOpenWebUIRequest', () => {
  it('maps num_predict to max_tokens and drops num_ctx', () => {
    expect(buildOpenWebUIRequest('test-model', 'Rate this', params)).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'Rate this' }],
      temperature: 0.2,
      max_tokens: 512,
    });
  });
});
