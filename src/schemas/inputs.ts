import { z } from 'zod';

import { MAX_PROMPT_LENGTH } from '../config/constants.js';
import { PROMPT_TECHNIQUES } from '../config/types.js';
import { PARAMETER_PRESET_NAMES } from '../lib/refinement.js';

const querySchema = z
  .string()
  .superRefine((value, ctx) => {
    if (value.length > MAX_PROMPT_LENGTH * 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: MAX_PROMPT_LENGTH * 2,
        type: 'string',
        inclusive: true,
        message: `Query with excessive whitespace rejected (${value.length} characters). Maximum allowed: ${MAX_PROMPT_LENGTH * 2}`,
      });
      return;
    }

    const trimmed = value.trim();
    if (trimmed.length < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        minimum: 1,
        type: 'string',
        inclusive: true,
        message: 'Query is empty or contains only whitespace.',
      });
      return;
    }

    if (trimmed.length > MAX_PROMPT_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: MAX_PROMPT_LENGTH,
        type: 'string',
        inclusive: true,
        message: `Query exceeds maximum length of ${MAX_PROMPT_LENGTH} characters (${trimmed.length} provided).`,
      });
    }
  })
  .transform((value) => value.trim())
  .describe('The user query to configure a prompt for');

const techniqueSchema = z
  .enum(PROMPT_TECHNIQUES)
  .describe(
    'Pin a prompting technique instead of detecting one: zero_shot | few_shot | chain_of_thought | self_consistency | tree_of_thought | role_playing | structured_output | socratic | guided_conversation'
  );

// Values are coerced and clamped later, so any scalar is accepted here.
const parameterValueSchema = z.union([z.number(), z.string()]);

const parametersSchema = z
  .object({
    temperature: parameterValueSchema.optional(),
    num_ctx: parameterValueSchema.optional(),
    num_predict: parameterValueSchema.optional(),
  })
  .strict()
  .describe('Generation parameter overrides: temperature, num_ctx, num_predict');

export const RefinePromptInputSchema = z
  .object({
    query: querySchema,
    minIterations: z
      .number()
      .int()
      .min(0)
      .max(20)
      .optional()
      .describe('Passes to run before convergence is allowed'),
    maxIterations: z
      .number()
      .int()
      .min(1)
      .max(20)
      .optional()
      .describe('Hard cap on analysis passes'),
    qualityThreshold: z
      .number()
      .min(0)
      .max(1)
      .optional()
      .describe('Quality score (0-1) that ends refinement early'),
    technique: techniqueSchema.optional(),
    parameters: parametersSchema.optional(),
  })
  .strict();

export const SelectConfigurationInputSchema = z
  .object({
    query: querySchema,
    technique: techniqueSchema.optional(),
  })
  .strict();

export const ValidateParametersInputSchema = z
  .object({
    parameters: parametersSchema.default({}),
    preset: z
      .enum(PARAMETER_PRESET_NAMES)
      .optional()
      .describe('Named preset used as the base before overrides are applied'),
    bounds: z
      .enum(['analysis', 'delivery'])
      .optional()
      .default('analysis')
      .describe(
        'analysis (default): general validator bounds; delivery: stricter bounds for final generation'
      ),
  })
  .strict();

export type RefinePromptInput = z.input<typeof RefinePromptInputSchema>;
export type SelectConfigurationInput = z.input<
  typeof SelectConfigurationInputSchema
>;
export type ValidateParametersInput = z.input<
  typeof ValidateParametersInputSchema
>;
