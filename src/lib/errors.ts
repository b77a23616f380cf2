import { inspect } from 'node:util';

import pino from 'pino';
import type { ZodError } from 'zod';

import { config } from '../config/env.js';
import {
  type ContentBlock,
  ErrorCode,
  type ErrorCodeType,
  type ErrorResponse,
  type McpErrorOptions,
  type SuccessResponse,
} from '../config/types.js';

// stdout belongs to the MCP stdio transport
const stderrDestination = pino.destination({ fd: 2 });

export const logger = pino(
  {
    level: config.DEBUG ? 'debug' : 'info',
    base: { pid: process.pid },
  },
  stderrDestination
);

export class McpError extends Error {
  readonly code: ErrorCodeType;
  readonly context?: string;
  readonly details?: Record<string, unknown>;
  readonly recoveryHint?: string;

  constructor(
    code: ErrorCodeType,
    message: string,
    options: McpErrorOptions = {}
  ) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.context = options.context;
    this.details = options.details;
    this.recoveryHint = options.recoveryHint;
  }

  [inspect.custom](): string {
    const hint = this.recoveryHint ? ` (Hint: ${this.recoveryHint})` : '';
    const details = this.details ? ` ${JSON.stringify(this.details)}` : '';
    return `McpError[${this.code}]: ${this.message}${hint}${details}`;
  }
}

export function createSuccessResponse<T extends Record<string, unknown>>(
  text: string,
  structured: T
): SuccessResponse<T> {
  return {
    content: [{ type: 'text', text }],
    structuredContent: structured,
  };
}

interface StructuredErrorPayload {
  code: ErrorCodeType;
  message: string;
  context?: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
}

const DEFAULT_RECOVERY_HINTS: Partial<Record<ErrorCodeType, string>> = {
  E_INVALID_INPUT: 'Check the input parameters and try again.',
  E_LLM_FAILED:
    'Retry the request. If the issue persists, check that the model backend is running.',
  E_LLM_RATE_LIMITED:
    'Wait a few seconds and retry. Consider reducing request frequency.',
  E_LLM_AUTH_FAILED: 'Verify LLM_API_KEY is correct for the configured backend.',
  E_TIMEOUT:
    'The request timed out. Try fewer iterations or increase LLM_TIMEOUT_MS.',
};

const CONTEXT_MAX_LENGTH = 200;

function sanitizeErrorContext(context?: string): string | undefined {
  if (!context) return undefined;

  const redacted = context.replace(
    /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
    'Bearer [REDACTED]'
  );
  return redacted.length > CONTEXT_MAX_LENGTH
    ? `${redacted.slice(0, CONTEXT_MAX_LENGTH)}...`
    : redacted;
}

function resolveSafeContext(context?: string): string | undefined {
  return config.INCLUDE_ERROR_CONTEXT
    ? sanitizeErrorContext(context)
    : undefined;
}

function formatZodIssues(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

function isZodError(error: unknown): error is ZodError {
  return typeof error === 'object' && error !== null && 'issues' in error;
}

function buildZodStructuredError(
  error: ZodError,
  context?: string
): StructuredErrorPayload {
  const safeContext = resolveSafeContext(context);
  return {
    code: ErrorCode.E_INVALID_INPUT,
    message: `Invalid params: ${formatZodIssues(error)}`,
    ...(safeContext ? { context: safeContext } : {}),
    details: { issues: error.issues },
    recoveryHint: DEFAULT_RECOVERY_HINTS[ErrorCode.E_INVALID_INPUT],
  };
}

function resolveRecoveryHint(error: McpError | null): string | undefined {
  if (error?.recoveryHint) return error.recoveryHint;
  if (error) return DEFAULT_RECOVERY_HINTS[error.code];
  return undefined;
}

function buildGenericStructuredError(
  error: unknown,
  fallbackCode: ErrorCodeType,
  context?: string
): StructuredErrorPayload {
  const mcpError = error instanceof McpError ? error : null;
  const payload: StructuredErrorPayload = {
    code: mcpError?.code ?? fallbackCode,
    message:
      mcpError?.message ??
      (error instanceof Error ? error.message : 'Unknown error'),
  };

  const safeContext = resolveSafeContext(context);
  if (safeContext) payload.context = safeContext;
  if (mcpError?.details) payload.details = mcpError.details;
  const recoveryHint = resolveRecoveryHint(mcpError);
  if (recoveryHint) payload.recoveryHint = recoveryHint;
  return payload;
}

export function createErrorResponse(
  error: unknown,
  fallbackCode: ErrorCodeType = ErrorCode.E_LLM_FAILED,
  context?: string
): ErrorResponse {
  const structuredError = isZodError(error)
    ? buildZodStructuredError(error, context)
    : buildGenericStructuredError(error, fallbackCode, context);
  return {
    content: [{ type: 'text', text: `Error: ${structuredError.message}` }],
    structuredContent: {
      ok: false,
      error: structuredError,
    },
    isError: true,
  };
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { ErrorCode };
