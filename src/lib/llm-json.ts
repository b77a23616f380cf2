// Parses a JSON object out of model output that may be fenced, wrapped in
// commentary, or contain unescaped line breaks inside strings.
import {
  LLM_ERROR_PREVIEW_CHARS,
  LLM_MAX_RESPONSE_LENGTH,
} from '../config/constants.js';
import type { ErrorCodeType } from '../config/types.js';
import { getErrorMessage, logger, McpError } from './errors.js';
import {
  escapeControlCharsInStrings,
  extractFirstJsonObject,
} from './llm-json/scan.js';

const CODE_BLOCK_START_RE = /^\s*```(?:json)?\s*/i;
const CODE_BLOCK_END_RE = /\s*```\s*$/;

interface ParseFailureDetail {
  stage: string;
  message: string;
}

type ParseAttempt<T> =
  | { success: true; value: T }
  | { success: false; error: ParseFailureDetail };

interface Candidate {
  stage: string;
  payload: string;
}

export interface JsonParseOptions {
  errorCode: ErrorCodeType;
  maxPreviewChars?: number;
  maxInputLength?: number;
  debugLabel?: string;
}

export function stripCodeBlockMarkers(text: string): string {
  return text
    .replace(CODE_BLOCK_START_RE, '')
    .replace(CODE_BLOCK_END_RE, '')
    .trim();
}

function enforceMaxInputLength(
  text: string,
  maxInputLength: number,
  errorCode: ErrorCodeType
): void {
  if (text.length <= maxInputLength) return;

  throw new McpError(
    errorCode,
    `LLM response too large: ${text.length} chars (max: ${maxInputLength})`,
    { details: { responseLength: text.length, maxLength: maxInputLength } }
  );
}

function tryParseJson<T>(
  candidate: Candidate,
  parse: (value: unknown) => T,
  debugLabel: string
): ParseAttempt<T> {
  try {
    const value = parse(JSON.parse(candidate.payload));
    logger.debug(`${debugLabel}: parsed JSON (${candidate.stage})`);
    return { success: true, value };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.debug(`${debugLabel}: ${candidate.stage} parse failed: ${message}`);
    return { success: false, error: { stage: candidate.stage, message } };
  }
}

function collectCandidates(text: string): Candidate[] {
  const candidates: Candidate[] = [];
  if (text.startsWith('{')) candidates.push({ stage: 'raw', payload: text });

  const stripped = stripCodeBlockMarkers(text);
  if (stripped !== text && stripped.startsWith('{')) {
    candidates.push({ stage: 'stripped markers', payload: stripped });
  }

  const extracted = extractFirstJsonObject(text);
  if (extracted) {
    candidates.push({ stage: 'extracted object', payload: extracted });
    const repaired = escapeControlCharsInStrings(extracted);
    if (repaired !== extracted) {
      candidates.push({ stage: 'repaired object', payload: repaired });
    }
  }

  return candidates;
}

function throwParseFailure(
  text: string,
  options: Required<Omit<JsonParseOptions, 'debugLabel'>>,
  debugLabel: string,
  failure: ParseFailureDetail | null
): never {
  logger.debug(
    { preview: text.slice(0, options.maxPreviewChars) },
    `${debugLabel}: raw response preview`
  );
  throw new McpError(
    options.errorCode,
    `Failed to parse ${debugLabel} as JSON`,
    {
      details: {
        parseFailed: true,
        ...(failure
          ? {
              parseErrorStage: failure.stage,
              parseErrorMessage: failure.message,
            }
          : { parseErrorStage: 'no JSON object found' }),
      },
    }
  );
}

export function parseJsonFromLlmResponse<T>(
  llmResponseText: string,
  parse: (value: unknown) => T,
  options: JsonParseOptions
): T {
  const resolved = {
    errorCode: options.errorCode,
    maxPreviewChars: options.maxPreviewChars ?? LLM_ERROR_PREVIEW_CHARS,
    maxInputLength: options.maxInputLength ?? LLM_MAX_RESPONSE_LENGTH,
  };
  const debugLabel = options.debugLabel ?? 'LLM response';
  enforceMaxInputLength(
    llmResponseText,
    resolved.maxInputLength,
    resolved.errorCode
  );

  const text = llmResponseText.trim();
  let lastError: ParseFailureDetail | null = null;
  for (const candidate of collectCandidates(text)) {
    const attempt = tryParseJson(candidate, parse, debugLabel);
    if (attempt.success) return attempt.value;
    lastError = attempt.error;
  }

  return throwParseFailure(text, resolved, debugLabel, lastError);
}
