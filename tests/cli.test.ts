import { afterEach, describe, expect, it, vi } from 'vitest';

import { applyEnvOverrides, parseCli, parseConcurrency } from '../src/cli/config.js';
import { createBootstrapLogger, formatBootstrapLine } from '../src/cli/logger.js';
import { formatResearchSummary } from '../src/cli/output.js';
import { createRunSignal, interruptRun } from '../src/cli/shutdown.js';

describe('parseCli', () => {
  it('maps kebab-case flags onto values', () => {
    expect(
      parseCli([
        '--llm-target',
        'open-webui',
        '--no-debug',
        '--research',
        '--output-dir',
        'out',
        '--concurrency',
        '4',
      ])
    ).toEqual({
      help: false,
      version: false,
      research: true,
      debug: false,
      llmTarget: 'open-webui',
      outputDir: 'out',
      concurrency: '4',
    });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCli(['--provider', 'x'])).toThrow();
  });
});

describe('parseConcurrency', () => {
  it('accepts positive integers', () => {
    expect(parseConcurrency('3')).toBe(3);
    expect(parseConcurrency(undefined)).toBeUndefined();
  });

  it('rejects zero and non-numbers', () => {
    expect(() => parseConcurrency('0')).toThrow('Invalid --concurrency: 0');
    expect(() => parseConcurrency('two')).toThrow('Invalid --concurrency: two');
  });
});

describe('applyEnvOverrides', () => {
  const saved = process.env.LLM_MODEL;

  afterEach(() => {
    if (saved === undefined) delete process.env.LLM_MODEL;
    else process.env.LLM_MODEL = saved;
  });

  it('writes overrides into the environment', () => {
    applyEnvOverrides({ help: false, version: false, research: false, llmModel: 'test-model' });
    expect(process.env.LLM_MODEL).toBe('test-model');
  });

  it('rejects an unknown target', () => {
    expect(() =>
      applyEnvOverrides({ help: false, version: false, research: false, llmTarget: 'gpt' })
    ).toThrow('Invalid --llm-target: gpt');
  });

  it('rejects a non-numeric timeout', () => {
    expect(() =>
      applyEnvOverrides({ help: false, version: false, research: false, llmTimeoutMs: '5s' })
    ).toThrow('Invalid --llm-timeout-ms: 5s');
  });
});

describe('bootstrap logger', () => {
  it('prefixes the level and appends the payload', () => {
    expect(formatBootstrapLine('warn', { attempt: 2 }, 'Retrying')).toBe(
      '[refinery] warn: Retrying { attempt: 2 }'
    );
    expect(formatBootstrapLine('info', 'ready')).toBe('[refinery] info: ready');
    expect(formatBootstrapLine('error', undefined, 'failed')).toBe('[refinery] error: failed');
  });

  it('writes debug lines only when enabled', () => {
    const lines: string[] = [];
    const quiet = createBootstrapLogger((line) => lines.push(line), () => false);
    quiet.debug('hidden');
    quiet.info('shown');

    const verbose = createBootstrapLogger((line) => lines.push(line), () => true);
    verbose.debug('visible');

    expect(lines).toEqual(['[refinery] info: shown', '[refinery] debug: visible']);
  });
});

describe('formatResearchSummary', () => {
  it('lists every artifact path', () => {
    expect(
      formatResearchSummary({
        reportPath: 'out/report.md',
        analysisPath: 'out/analysis.json',
        rawResultsPath: 'out/raw_results.json',
      })
    ).toBe(
      [
        'Research artifacts:',
        '  report:   out/report.md',
        '  analysis: out/analysis.json',
        '  raw:      out/raw_results.json',
      ].join('\n')
    );
  });
});

describe('interruptRun', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('aborts the research run once', () => {
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    const signal = createRunSignal();

    expect(interruptRun('SIGINT')).toBe(true);
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toEqual(new Error('Research run interrupted by SIGINT'));
    expect(interruptRun('SIGINT')).toBe(false);
  });
});
