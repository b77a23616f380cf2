import { z } from 'zod';

import {
  ANALYSIS_BOUNDS,
  PARAMETER_DEFAULTS,
  type ParameterBounds,
} from '../../config/constants.js';
import type {
  GenerationParameters,
  ParameterInput,
  ParameterName,
} from '../../config/types.js';
import { logger } from '../errors.js';

const PARAMETER_NAMES: readonly ParameterName[] = [
  'temperature',
  'num_ctx',
  'num_predict',
];

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER_RE = /^[+-]?\d+$/;

const RealSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(DECIMAL_RE).transform(Number),
]);

// Fractional numbers truncate toward zero; fractional strings are rejected.
const IntegerSchema = z.union([
  z.number().finite().transform(Math.trunc),
  z
    .string()
    .trim()
    .regex(INTEGER_RE)
    .transform((value) => Number.parseInt(value, 10)),
]);

const PARSERS: Record<
  ParameterName,
  z.ZodType<number, z.ZodTypeDef, unknown>
> = {
  temperature: RealSchema,
  num_ctx: IntegerSchema,
  num_predict: IntegerSchema,
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function resolveParameter(
  name: ParameterName,
  raw: unknown,
  bounds: ParameterBounds,
  fallbacks: GenerationParameters
): number {
  const { min, max } = bounds[name];
  // Fallbacks may come from an injected catalog, so they are bounded too.
  const fallback = clamp(fallbacks[name], min, max);
  if (raw === undefined) return fallback;

  const parsed = PARSERS[name].safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { parameter: name, value: raw, fallback },
      'Unparsable parameter; using default'
    );
    return fallback;
  }

  const clamped = clamp(parsed.data, min, max);
  if (clamped !== parsed.data) {
    logger.warn(
      { parameter: name, value: parsed.data, clamped },
      'Parameter out of range; clamped'
    );
  }
  return clamped;
}

/**
 * Coerces each generation parameter to its numeric kind and clamps it into
 * the given bounds. Missing or unparsable values take the fallback, itself
 * clamped into the bounds. Never throws, and validating an already validated
 * set is a no-op.
 */
export function validateParameters(
  params: ParameterInput | undefined,
  bounds: ParameterBounds = ANALYSIS_BOUNDS,
  fallbacks: GenerationParameters = PARAMETER_DEFAULTS
): GenerationParameters {
  const input = params ?? {};
  const resolve = (name: ParameterName): number =>
    resolveParameter(name, input[name], bounds, fallbacks);
  return {
    temperature: resolve('temperature'),
    num_ctx: resolve('num_ctx'),
    num_predict: resolve('num_predict'),
  };
}

// Key-by-key overlay; undefined overrides leave the base value in place.
export function mergeParameters(
  base: ParameterInput,
  overrides?: ParameterInput,
  bounds: ParameterBounds = ANALYSIS_BOUNDS
): GenerationParameters {
  const merged: ParameterInput = { ...base };
  if (overrides) {
    for (const name of PARAMETER_NAMES) {
      const value = overrides[name];
      if (value !== undefined) merged[name] = value;
    }
  }
  return validateParameters(merged, bounds);
}

export function pickParameters(
  source: Readonly<Record<string, unknown>> | undefined
): ParameterInput | undefined {
  if (!source) return undefined;
  const picked: ParameterInput = {};
  let found = false;
  for (const name of PARAMETER_NAMES) {
    if (Object.hasOwn(source, name)) {
      picked[name] = source[name];
      found = true;
    }
  }
  return found ? picked : undefined;
}
