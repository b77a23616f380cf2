import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { ErrorCode, McpError } from '../src/lib/errors.js';
import {
  parseJsonFromLlmResponse,
  stripCodeBlockMarkers,
} from '../src/lib/llm-json.js';
import {
  escapeControlCharsInStrings,
  extractFirstJsonObject,
} from '../src/lib/llm-json/scan.js';

const ScoreSchema = z.object({
  quality_score: z.number(),
  improved_prompt: z.string().optional(),
});

const parseScore = (value: unknown): z.infer<typeof ScoreSchema> =>
  ScoreSchema.parse(value);

const options = { errorCode: ErrorCode.E_LLM_FAILED };

describe('parseJsonFromLlmResponse', () => {
  it('parses a bare object', () => {
    expect(parseJsonFromLlmResponse('{"quality_score":0.4}', parseScore, options)).toEqual({
      quality_score: 0.4,
    });
  });

  it('parses an object inside a json fence', () => {
    const payload = '```json\n{"quality_score":0.6}\n```';
    expect(parseJsonFromLlmResponse(payload, parseScore, options).quality_score).toBe(0.6);
  });

  it('parses an object surrounded by commentary', () => {
    const payload = 'Here is my rating: {"quality_score":0.8} Hope it helps!';
    expect(parseJsonFromLlmResponse(payload, parseScore, options).quality_score).toBe(0.8);
  });

  it('ignores braces inside string values', () => {
    const payload =
      'Result: {"quality_score":0.7,"improved_prompt":"Use {braces} carefully"} end';
    expect(parseJsonFromLlmResponse(payload, parseScore, options).improved_prompt).toBe(
      'Use {braces} carefully'
    );
  });

  it('repairs unescaped line breaks in strings', () => {
    const payload = '{"quality_score":0.5,"improved_prompt":"First\nSecond"}';
    expect(parseJsonFromLlmResponse(payload, parseScore, options).improved_prompt).toBe(
      'First\nSecond'
    );
  });

  it('throws the configured code when the validator rejects every candidate', () => {
    expect(() =>
      parseJsonFromLlmResponse('{"quality_score":"high"}', parseScore, options)
    ).toThrow(McpError);

    try {
      parseJsonFromLlmResponse('{"quality_score":"high"}', parseScore, options);
    } catch (error) {
      expect(error).toBeInstanceOf(McpError);
      if (!(error instanceof McpError)) return;
      expect(error.code).toBe(ErrorCode.E_LLM_FAILED);
      expect(error.details).toMatchObject({ parseFailed: true, parseErrorStage: 'extracted object' });
    }
  });

  it('reports when no object is present at all', () => {
    try {
      parseJsonFromLlmResponse('no json here', parseScore, options);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof McpError)) throw error;
      expect(error.details).toEqual({
        parseFailed: true,
        parseErrorStage: 'no JSON object found',
      });
    }
  });

  it('rejects payloads longer than maxInputLength', () => {
    expect(() =>
      parseJsonFromLlmResponse('{"quality_score":1}', parseScore, {
        ...options,
        maxInputLength: 5,
      })
    ).toThrow(/LLM response too large/);
  });
});

describe('stripCodeBlockMarkers', () => {
  it('removes an untagged fence', () => {
    expect(stripCodeBlockMarkers('```\n{"a":1}\n```')).toBe('{"a":1}');
  });
});

describe('extractFirstJsonObject', () => {
  it('returns the first balanced object', () => {
    expect(extractFirstJsonObject('x {"a":{"b":1}} {"c":2}')).toBe('{"a":{"b":1}}');
  });

  it('returns null for an unterminated object', () => {
    expect(extractFirstJsonObject('{"a":1')).toBeNull();
  });
});

describe('escapeControlCharsInStrings', () => {
  it('escapes only characters inside strings', () => {
    expect(escapeControlCharsInStrings('{\n"a":"x\ty"\n}')).toBe('{\n"a":"x\\ty"\n}');
  });
});
