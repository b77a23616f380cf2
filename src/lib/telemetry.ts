import diagnosticsChannel from 'node:diagnostics_channel';

import type {
  BackendTarget,
  ErrorCodeType,
  RefinementState,
} from '../config/types.js';

const LLM_REQUEST_CHANNEL = 'prompt-refinery:llm.request';
const REFINEMENT_ITERATION_CHANNEL = 'prompt-refinery:refinement.iteration';

export interface LlmRequestEvent {
  target: BackendTarget;
  model: string;
  attempts: number;
  durationMs: number;
  ok: boolean;
  errorCode?: ErrorCodeType;
  status?: number;
}

export interface RefinementIterationEvent {
  iteration: number;
  quality: number;
  state: RefinementState;
  improved: boolean;
}

const llmRequestChannel = diagnosticsChannel.channel(LLM_REQUEST_CHANNEL);
const iterationChannel = diagnosticsChannel.channel(
  REFINEMENT_ITERATION_CHANNEL
);

type PrimitiveType = 'string' | 'number' | 'boolean';

const LLM_REQUEST_FIELD_TYPES: Record<string, PrimitiveType> = {
  target: 'string',
  model: 'string',
  attempts: 'number',
  durationMs: 'number',
  ok: 'boolean',
};

const ITERATION_FIELD_TYPES: Record<string, PrimitiveType> = {
  iteration: 'number',
  quality: 'number',
  state: 'string',
  improved: 'boolean',
};

function safePublish(
  channel: diagnosticsChannel.Channel,
  message: unknown
): void {
  if (!channel.hasSubscribers) return;
  try {
    channel.publish(message);
  } catch (error) {
    // A broken subscriber must not fail the request that published.
    const reason = error instanceof Error ? error.message : String(error);
    process.emitWarning(`Telemetry subscriber threw: ${reason}`);
  }
}

function hasFieldTypes(
  message: unknown,
  fields: Record<string, PrimitiveType>
): boolean {
  if (typeof message !== 'object' || message === null) return false;
  const record = new Map<string, unknown>(Object.entries(message));
  return Object.entries(fields).every(
    ([key, type]) => typeof record.get(key) === type
  );
}

function isLlmRequestEvent(message: unknown): message is LlmRequestEvent {
  return hasFieldTypes(message, LLM_REQUEST_FIELD_TYPES);
}

function isRefinementIterationEvent(
  message: unknown
): message is RefinementIterationEvent {
  return hasFieldTypes(message, ITERATION_FIELD_TYPES);
}

export function publishLlmRequest(event: LlmRequestEvent): void {
  safePublish(llmRequestChannel, event);
}

export function publishRefinementIteration(
  event: RefinementIterationEvent
): void {
  safePublish(iterationChannel, event);
}

function subscribe<T>(
  name: string,
  guard: (message: unknown) => message is T,
  handler: (event: T) => void
): () => void {
  const wrapped = (message: unknown): void => {
    if (!guard(message)) return;
    handler(message);
  };
  diagnosticsChannel.subscribe(name, wrapped);
  return () => {
    diagnosticsChannel.unsubscribe(name, wrapped);
  };
}

export function subscribeLlmRequests(
  handler: (event: LlmRequestEvent) => void
): () => void {
  return subscribe(LLM_REQUEST_CHANNEL, isLlmRequestEvent, handler);
}

export function subscribeRefinementIterations(
  handler: (event: RefinementIterationEvent) => void
): () => void {
  return subscribe(
    REFINEMENT_ITERATION_CHANNEL,
    isRefinementIterationEvent,
    handler
  );
}
