import { DEFAULT_BASE_URLS } from '../config/constants.js';
import { config } from '../config/env.js';
import type { BackendTarget, ModelClient } from '../config/types.js';
import { ErrorCode, logger, McpError } from './errors.js';
import { OllamaClient, OpenWebUIClient } from './llm-providers.js';

interface ClientSettings {
  baseUrl?: string;
  apiKey?: string;
}

const TARGET_CONFIG = {
  ollama: {
    requiresApiKey: false,
    create: (baseUrl: string, model: string, apiKey?: string): ModelClient =>
      new OllamaClient(baseUrl, model, apiKey),
  },
  'open-webui': {
    requiresApiKey: true,
    create: (baseUrl: string, model: string, apiKey?: string): ModelClient =>
      new OpenWebUIClient(baseUrl, model, apiKey ?? ''),
  },
} as const;

let modelClientPromise: Promise<ModelClient> | null = null;

export function createModelClient(
  target: BackendTarget,
  model: string,
  settings: ClientSettings = {}
): ModelClient {
  const targetConfig = TARGET_CONFIG[target];
  if (targetConfig.requiresApiKey && !settings.apiKey) {
    throw new McpError(
      ErrorCode.E_INVALID_INPUT,
      `Missing LLM_API_KEY environment variable for target: ${target}`
    );
  }
  return targetConfig.create(
    settings.baseUrl ?? DEFAULT_BASE_URLS[target],
    model,
    settings.apiKey
  );
}

function createConfiguredClient(): ModelClient {
  return createModelClient(config.LLM_TARGET, config.LLM_MODEL, {
    ...(config.LLM_BASE_URL ? { baseUrl: config.LLM_BASE_URL } : {}),
    ...(config.LLM_API_KEY ? { apiKey: config.LLM_API_KEY } : {}),
  });
}

export async function getModelClient(): Promise<ModelClient> {
  modelClientPromise ??= Promise.resolve()
    .then(() => {
      const client = createConfiguredClient();
      logger.info(
        `Model client initialized: ${client.getTarget()} (${client.getModel()})`
      );
      return client;
    })
    .catch((error: unknown) => {
      modelClientPromise = null;
      throw error;
    });

  return modelClientPromise;
}
