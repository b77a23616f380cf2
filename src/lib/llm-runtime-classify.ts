import axios from 'axios';

import { config } from '../config/env.js';
import type {
  BackendTarget,
  ErrorCodeType,
  SafeErrorDetails,
} from '../config/types.js';
import { ErrorCode, getErrorMessage, McpError } from './errors.js';

interface HttpStatusClassification {
  code: ErrorCodeType;
  messageTemplate: (target: BackendTarget, status: number) => string;
  recoveryHint: string;
}

const AUTH_FAILURE_CLASSIFICATION: HttpStatusClassification = {
  code: ErrorCode.E_LLM_AUTH_FAILED,
  messageTemplate: (target, status) =>
    `Authentication failed for ${target} (HTTP ${status})`,
  recoveryHint: 'Check the LLM_API_KEY environment variable',
};

const SERVICE_UNAVAILABLE_CLASSIFICATION: HttpStatusClassification = {
  code: ErrorCode.E_LLM_FAILED,
  messageTemplate: (target, status) =>
    `${target} service unavailable (HTTP ${status})`,
  recoveryHint: 'Service temporarily unavailable; retry later',
};

const HTTP_STATUS_CLASSIFICATION = new Map<number, HttpStatusClassification>([
  [
    429,
    {
      code: ErrorCode.E_LLM_RATE_LIMITED,
      messageTemplate: (target) => `Rate limited by ${target} (HTTP 429)`,
      recoveryHint:
        'Retry with exponential backoff or reduce request frequency',
    },
  ],
  [401, AUTH_FAILURE_CLASSIFICATION],
  [403, AUTH_FAILURE_CLASSIFICATION],
  [
    404,
    {
      code: ErrorCode.E_LLM_FAILED,
      messageTemplate: (target, status) =>
        `${target} endpoint or model not found (HTTP ${status})`,
      recoveryHint:
        'Check LLM_BASE_URL and that LLM_MODEL is pulled on the backend',
    },
  ],
  [500, SERVICE_UNAVAILABLE_CLASSIFICATION],
  [502, SERVICE_UNAVAILABLE_CLASSIFICATION],
  [503, SERVICE_UNAVAILABLE_CLASSIFICATION],
  [504, SERVICE_UNAVAILABLE_CLASSIFICATION],
]);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND']);

export const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
export const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
]);
export const NON_RETRYABLE_CODES = new Set<ErrorCodeType>([
  ErrorCode.E_LLM_AUTH_FAILED,
  ErrorCode.E_INVALID_INPUT,
]);

export interface RetrySettings {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  totalTimeoutMs: number;
}

export function resolveRetrySettings(): RetrySettings {
  return {
    maxRetries: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    maxDelayMs: config.RETRY_MAX_DELAY_MS,
    totalTimeoutMs: config.RETRY_TOTAL_TIMEOUT_MS,
  };
}

function readProperty(value: object, key: string): unknown {
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

// axios keeps the status on the response; the openai SDK puts it on the error.
export function getSafeErrorDetails(error: unknown): SafeErrorDetails {
  if (axios.isAxiosError(error)) {
    return {
      ...(error.response ? { status: error.response.status } : {}),
      ...(error.code ? { code: error.code } : {}),
    };
  }
  if (typeof error !== 'object' || error === null) return {};
  const status = readProperty(error, 'status');
  const code = readProperty(error, 'code');
  return {
    ...(typeof status === 'number' ? { status } : {}),
    ...(typeof code === 'string' ? { code } : {}),
  };
}

function classifyByHttpStatus(
  target: BackendTarget,
  details: SafeErrorDetails
): McpError | null {
  if (details.status === undefined) return null;
  const classification = HTTP_STATUS_CLASSIFICATION.get(details.status);
  if (!classification) return null;

  return new McpError(
    classification.code,
    classification.messageTemplate(target, details.status),
    {
      details: { target, ...details },
      recoveryHint: classification.recoveryHint,
    }
  );
}

function classifyByErrorCode(
  target: BackendTarget,
  details: SafeErrorDetails
): McpError | null {
  const { code } = details;
  if (!code) return null;

  if (TIMEOUT_CODES.has(code)) {
    return new McpError(ErrorCode.E_TIMEOUT, `${target} request timed out`, {
      details: { target, ...details },
    });
  }
  if (UNREACHABLE_CODES.has(code)) {
    return new McpError(
      ErrorCode.E_LLM_FAILED,
      `${target} is unreachable (${code})`,
      {
        details: { target, ...details },
        recoveryHint: 'Start the backend or check LLM_BASE_URL',
      }
    );
  }
  return null;
}

export function coerceMcpError(
  error: unknown,
  target: BackendTarget
): McpError {
  if (error instanceof McpError) return error;

  const details = getSafeErrorDetails(error);
  return (
    classifyByHttpStatus(target, details) ??
    classifyByErrorCode(target, details) ??
    new McpError(
      ErrorCode.E_LLM_FAILED,
      `LLM request failed (${target}): ${getErrorMessage(error)}`,
      {
        details: { target, ...details },
        recoveryHint: 'See backend logs or retry the request',
      }
    )
  );
}

export function isRetryable(error: McpError): boolean {
  if (NON_RETRYABLE_CODES.has(error.code)) return false;
  if (error.code === ErrorCode.E_LLM_RATE_LIMITED) return true;

  const status = error.details?.status;
  if (typeof status === 'number') return RETRYABLE_STATUS.has(status);
  const code = error.details?.code;
  return typeof code === 'string' && RETRYABLE_NETWORK_CODES.has(code);
}
