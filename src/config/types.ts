import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export type ToolRegistrar = (server: McpServer) => void;

export type ContentBlock = { type: 'text'; text: string };

export interface ErrorResponse {
  [key: string]: unknown;
  content: ContentBlock[];
  structuredContent: {
    ok: false;
    error: {
      code: string;
      message: string;
      context?: string;
      details?: Record<string, unknown>;
      recoveryHint?: string;
    };
  };
  isError: true;
}

export interface SuccessResponse<T extends Record<string, unknown>> {
  [key: string]: unknown;
  content: ContentBlock[];
  structuredContent: T;
}

export const BACKEND_TARGETS = ['ollama', 'open-webui'] as const;

export type BackendTarget = (typeof BACKEND_TARGETS)[number];

export interface GenerationParameters {
  temperature: number;
  num_ctx: number;
  num_predict: number;
}

export type ParameterName = keyof GenerationParameters;

// Values arrive from model output and tool callers, so any JSON scalar is
// possible.
export type ParameterInput = Partial<Record<ParameterName, unknown>>;

export interface SafeErrorDetails {
  status?: number;
  code?: string;
}

export interface LLMRequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ModelClient {
  generateText(
    prompt: string,
    params: GenerationParameters,
    options?: LLMRequestOptions
  ): Promise<string>;
  getTarget(): BackendTarget;
  getModel(): string;
}

export interface ModelInfo {
  target: BackendTarget;
  model: string;
}

export interface McpErrorOptions {
  context?: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
}

export const ErrorCode = {
  E_INVALID_INPUT: 'E_INVALID_INPUT',
  E_LLM_FAILED: 'E_LLM_FAILED',
  E_LLM_RATE_LIMITED: 'E_LLM_RATE_LIMITED',
  E_LLM_AUTH_FAILED: 'E_LLM_AUTH_FAILED',
  E_TIMEOUT: 'E_TIMEOUT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const PROMPT_TECHNIQUES = [
  'zero_shot',
  'few_shot',
  'chain_of_thought',
  'self_consistency',
  'tree_of_thought',
  'role_playing',
  'structured_output',
  'socratic',
  'guided_conversation',
] as const;

export type PromptTechnique = (typeof PROMPT_TECHNIQUES)[number];

export interface ConfigurationSelection {
  role: string;
  taskType: string;
  technique: string | null;
}

export interface PromptConfiguration extends ConfigurationSelection {
  template: string;
  parameters: GenerationParameters;
}

export interface ConfigurationMetadata {
  originalQuery: string;
  validationPerformed: boolean;
  generatedAt: string;
}

export const REFINEMENT_STATES = ['RUNNING', 'CONVERGED', 'EXHAUSTED'] as const;

export type RefinementState = (typeof REFINEMENT_STATES)[number];

export type TerminalState = Exclude<RefinementState, 'RUNNING'>;

export interface FinalConfiguration extends PromptConfiguration {
  finalPrompt: string;
  iterationsUsed: number;
  finalQuality: number;
  reasoning?: string;
  state?: TerminalState;
  metadata: ConfigurationMetadata;
}

// Loose shape fed to the finalizer; any field may be missing.
export interface DraftConfiguration {
  role?: string;
  taskType?: string;
  technique?: string | null;
  template?: string;
  parameters?: ParameterInput;
  finalPrompt?: string;
  iterationsUsed?: number;
  finalQuality?: number;
  reasoning?: string;
  state?: TerminalState;
  metadata?: ConfigurationMetadata;
}

export interface AnalysisSuggestion {
  qualityScore: number;
  improvedPrompt?: string;
  role?: string;
  taskType?: string;
  technique?: string;
  template?: string;
  parameters?: ParameterInput;
  reasoning: string;
}

export type AnalysisResult =
  | ({ usedDefaults: false } & AnalysisSuggestion)
  | ({ usedDefaults: true; defaultReason: string } & AnalysisSuggestion);

export type ModelCallResult =
  | { ok: true; elapsedSeconds: number; text: string }
  | { ok: false; elapsedSeconds: -1; error: string };
