import { performance } from 'node:perf_hooks';
import { setTimeout } from 'node:timers/promises';

import type { BackendTarget } from '../config/types.js';
import { ErrorCode, logger, McpError } from './errors.js';
import {
  coerceMcpError,
  isRetryable,
  resolveRetrySettings,
  type RetrySettings,
} from './llm-runtime-classify.js';
import { publishLlmRequest } from './telemetry.js';

type AttemptOutcome =
  | { type: 'success'; content: string }
  | { type: 'retry'; delayMs: number; error: McpError }
  | { type: 'fail'; error: McpError };

function elapsedMs(startPerf: number): string {
  return (performance.now() - startPerf).toFixed(2);
}

function calculateDelay(attempt: number, settings: RetrySettings): number {
  const exponentialDelay = settings.baseDelayMs * Math.pow(2, attempt);
  return Math.min(exponentialDelay, settings.maxDelayMs);
}

function ensureWithinTotalTimeout(
  startTime: number,
  settings: RetrySettings
): void {
  if (Date.now() - startTime <= settings.totalTimeoutMs) return;
  throw new McpError(
    ErrorCode.E_TIMEOUT,
    `Total retry timeout exceeded (${settings.totalTimeoutMs}ms)`
  );
}

function resolveDelay(
  attempt: number,
  settings: RetrySettings,
  startTime: number
): number | null {
  if (attempt >= settings.maxRetries) return null;
  const delayMs = calculateDelay(attempt, settings);
  if (Date.now() - startTime + delayMs > settings.totalTimeoutMs) {
    logger.warn('Retry loop would exceed total timeout, aborting');
    return null;
  }
  return delayMs;
}

async function waitForRetry(
  delayMs: number,
  signal: AbortSignal | undefined
): Promise<void> {
  try {
    await setTimeout(delayMs, undefined, { signal, ref: false });
  } catch (error) {
    if (signal?.aborted) {
      throw new McpError(
        ErrorCode.E_TIMEOUT,
        'Request aborted during retry backoff'
      );
    }
    throw error;
  }
}

async function attemptGeneration(
  target: BackendTarget,
  requestFn: () => Promise<string>,
  settings: RetrySettings,
  startTime: number,
  attempt: number
): Promise<AttemptOutcome> {
  try {
    const content = await requestFn();
    if (!content) {
      return {
        type: 'fail',
        error: new McpError(
          ErrorCode.E_LLM_FAILED,
          `${target} returned an empty response`
        ),
      };
    }
    return { type: 'success', content };
  } catch (error) {
    const mcpError = coerceMcpError(error, target);
    if (!isRetryable(mcpError)) return { type: 'fail', error: mcpError };
    const delayMs = resolveDelay(attempt, settings, startTime);
    if (delayMs === null) return { type: 'fail', error: mcpError };
    return { type: 'retry', delayMs, error: mcpError };
  }
}

function publishOutcome(
  target: BackendTarget,
  model: string,
  attempts: number,
  startPerf: number,
  error?: McpError
): void {
  const status = error?.details?.status;
  publishLlmRequest({
    target,
    model,
    attempts,
    durationMs: performance.now() - startPerf,
    ok: error === undefined,
    ...(error ? { errorCode: error.code } : {}),
    ...(typeof status === 'number' ? { status } : {}),
  });
}

/**
 * Runs one model request with retries for rate limits, 5xx responses and
 * transient network errors. Throws a classified McpError once attempts or
 * the total timeout run out.
 */
export async function runGeneration(
  target: BackendTarget,
  model: string,
  requestFn: () => Promise<string>,
  signal?: AbortSignal
): Promise<string> {
  const settings = resolveRetrySettings();
  const startTime = Date.now();
  const startPerf = performance.now();
  let attempts = 0;

  try {
    for (let attempt = 0; attempt <= settings.maxRetries; attempt++) {
      ensureWithinTotalTimeout(startTime, settings);
      signal?.throwIfAborted();
      attempts = attempt + 1;

      const outcome = await attemptGeneration(
        target,
        requestFn,
        settings,
        startTime,
        attempt
      );
      if (outcome.type === 'success') {
        logger.debug(
          `LLM generation (${target}) took ${elapsedMs(startPerf)}ms`
        );
        publishOutcome(target, model, attempts, startPerf);
        return outcome.content;
      }
      if (outcome.type === 'fail') throw outcome.error;

      logger.warn(
        { delayMs: Math.round(outcome.delayMs), reason: outcome.error.message },
        `Retry ${attempt + 1}/${settings.maxRetries + 1} scheduled`
      );
      await waitForRetry(outcome.delayMs, signal);
    }

    throw new McpError(
      ErrorCode.E_LLM_FAILED,
      `LLM request failed (${target}): retries exhausted`
    );
  } catch (error) {
    const mcpError = coerceMcpError(error, target);
    publishOutcome(target, model, attempts, startPerf, mcpError);
    throw mcpError;
  }
}
