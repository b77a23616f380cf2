import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .optional()
  .default('false')
  .transform((v) => v === 'true');

const numberString = (
  def: number,
  min = 0
): z.ZodType<number, z.ZodTypeDef, string | undefined> =>
  z
    .string()
    .optional()
    .default(String(def))
    .transform((v) => parseInt(v, 10))
    .refine((n) => Number.isFinite(n) && n >= min, {
      message: `Must be >= ${min}`,
    });

const envSchema = z.object({
  DEBUG: booleanString,
  INCLUDE_ERROR_CONTEXT: booleanString,

  LLM_TARGET: z.enum(['ollama', 'open-webui']).optional().default('ollama'),
  LLM_MODEL: z.string().min(1).optional().default('llama3.2:latest'),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_TIMEOUT_MS: numberString(30000, 1000),

  MAX_PROMPT_LENGTH: numberString(10000, 1),

  RETRY_MAX_ATTEMPTS: numberString(2, 0),
  RETRY_BASE_DELAY_MS: numberString(1000, 100),
  RETRY_MAX_DELAY_MS: numberString(10000, 1000),
  RETRY_TOTAL_TIMEOUT_MS: numberString(120000, 10000),

  REFINE_MIN_ITERATIONS: numberString(3, 0),
  REFINE_MAX_ITERATIONS: numberString(5, 1),
});

export type EnvConfig = z.infer<typeof envSchema>;

export const config = envSchema.parse(process.env);
