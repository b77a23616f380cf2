import {
  DELIVERY_BOUNDS,
  NUDGE_SUFFIX,
  QUERY_PLACEHOLDER,
} from '../../config/constants.js';
import {
  DEFAULT_ROLE,
  DEFAULT_TASK_TYPE,
  MATH_ACTION_PATTERN,
} from '../../config/patterns.js';
import type {
  ConfigurationMetadata,
  DraftConfiguration,
  FinalConfiguration,
} from '../../config/types.js';
import { getErrorMessage, logger } from '../errors.js';
import { getDefaultCatalog, type TemplateCatalog } from './catalog.js';
import { ensureQueryPlaceholder } from './composer.js';
import { validateParameters } from './parameters.js';

/**
 * Decides whether a math prompt was rewritten into an instruction that would
 * make the model re-run the calculation on itself. Matching prompts are
 * replaced by the original query.
 */
export type RecursionGuard = (prompt: string) => boolean;

export const containsMathActionVerb: RecursionGuard = (prompt) =>
  MATH_ACTION_PATTERN.test(prompt);

export interface FinalizeOptions {
  catalog?: TemplateCatalog;
  isRecursiveMathPrompt?: RecursionGuard;
  now?: () => Date;
}

const NUDGE_TEXT = NUDGE_SUFFIX.trim();

export function stripNudge(text: string): string {
  return text.split(NUDGE_TEXT).join('');
}

export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

function clampUnit(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function clampCount(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.trunc(value));
}

function cleanFinalPrompt(
  candidate: string,
  taskType: string,
  originalQuery: string,
  isRecursiveMathPrompt: RecursionGuard
): string {
  let prompt = candidate;
  if (taskType === 'math' && isRecursiveMathPrompt(prompt)) {
    logger.debug(
      'Math prompt rewritten into an instruction; using original query'
    );
    prompt = originalQuery.trim();
  }

  prompt = normalizeWhitespace(stripNudge(prompt));
  if (!prompt || prompt.includes(QUERY_PLACEHOLDER)) {
    return normalizeWhitespace(originalQuery);
  }
  return prompt;
}

/**
 * Turns a possibly incomplete draft into a configuration that is safe to hand
 * to a model: required fields are filled, parameters are clamped to delivery
 * bounds and the final prompt is cleaned. Never throws; if cleaning fails the
 * original query is used as the final prompt.
 */
export function finalizeConfiguration(
  draft: DraftConfiguration,
  originalQuery: string,
  options: FinalizeOptions = {}
): FinalConfiguration {
  const catalog = options.catalog ?? getDefaultCatalog();
  const isRecursiveMathPrompt =
    options.isRecursiveMathPrompt ?? containsMathActionVerb;
  const now = options.now ?? (() => new Date());

  const taskType = draft.taskType ?? DEFAULT_TASK_TYPE;
  const metadata: ConfigurationMetadata = draft.metadata ?? {
    originalQuery,
    validationPerformed: true,
    generatedAt: now().toISOString(),
  };

  const base = {
    role: draft.role ?? DEFAULT_ROLE,
    taskType,
    technique: draft.technique ?? null,
    template: ensureQueryPlaceholder(draft.template ?? QUERY_PLACEHOLDER),
    parameters: validateParameters(
      draft.parameters,
      DELIVERY_BOUNDS,
      catalog.taskParameters(DEFAULT_TASK_TYPE)
    ),
    iterationsUsed: clampCount(draft.iterationsUsed),
    finalQuality: clampUnit(draft.finalQuality),
    ...(draft.reasoning !== undefined ? { reasoning: draft.reasoning } : {}),
    ...(draft.state !== undefined ? { state: draft.state } : {}),
    metadata,
  };

  try {
    return {
      ...base,
      finalPrompt: cleanFinalPrompt(
        draft.finalPrompt ?? originalQuery,
        taskType,
        originalQuery,
        isRecursiveMathPrompt
      ),
    };
  } catch (error) {
    logger.warn(
      { reason: getErrorMessage(error) },
      'Final prompt cleanup failed; using original query'
    );
    return { ...base, finalPrompt: originalQuery };
  }
}
