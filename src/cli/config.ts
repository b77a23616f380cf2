import { parseArgs } from 'node:util';

import { writeCliOutput } from './output.js';

const CLI_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
  debug: { type: 'boolean' },
  'include-error-context': { type: 'boolean' },
  'llm-target': { type: 'string' },
  'llm-model': { type: 'string' },
  'llm-base-url': { type: 'string' },
  'llm-timeout-ms': { type: 'string' },
  'max-prompt-length': { type: 'string' },
  research: { type: 'boolean' },
  'output-dir': { type: 'string' },
  concurrency: { type: 'string' },
} as const;

const LLM_TARGETS = new Set(['ollama', 'open-webui']);

export interface CliValues {
  help: boolean;
  version: boolean;
  research: boolean;
  debug?: boolean;
  includeErrorContext?: boolean;
  llmTarget?: string;
  llmModel?: string;
  llmBaseUrl?: string;
  llmTimeoutMs?: string;
  maxPromptLength?: string;
  outputDir?: string;
  concurrency?: string;
}

const BOOLEAN_FLAGS = [
  ['debug', 'debug'],
  ['include-error-context', 'includeErrorContext'],
] as const;

const STRING_FLAGS = [
  ['llm-target', 'llmTarget'],
  ['llm-model', 'llmModel'],
  ['llm-base-url', 'llmBaseUrl'],
  ['llm-timeout-ms', 'llmTimeoutMs'],
  ['max-prompt-length', 'maxPromptLength'],
  ['output-dir', 'outputDir'],
  ['concurrency', 'concurrency'],
] as const;

export function parseCli(args: string[] = process.argv.slice(2)): CliValues {
  const { values } = parseArgs({
    args,
    options: CLI_OPTIONS,
    strict: true,
    allowPositionals: false,
    allowNegative: true,
  });

  const cli: CliValues = {
    help: values.help === true,
    version: values.version === true,
    research: values.research === true,
  };

  for (const [flag, key] of BOOLEAN_FLAGS) {
    const value = values[flag];
    if (typeof value === 'boolean') {
      cli[key] = value;
    }
  }

  for (const [flag, key] of STRING_FLAGS) {
    const value = values[flag];
    if (typeof value === 'string') {
      cli[key] = value;
    }
  }

  return cli;
}

function applyBooleanEnv(name: string, value: boolean | undefined): void {
  if (typeof value !== 'boolean') return;
  process.env[name] = value ? 'true' : 'false';
}

function applyStringEnv(name: string, value: string | undefined): void {
  if (value === undefined) return;
  process.env[name] = value;
}

function applyEnumEnv(
  name: string,
  value: string | undefined,
  allowed: Set<string>,
  flag: string
): void {
  if (value === undefined) return;
  if (!allowed.has(value)) {
    throw new Error(`Invalid ${flag}: ${value}`);
  }
  process.env[name] = value;
}

function applyNumberEnv(
  name: string,
  value: string | undefined,
  flag: string
): void {
  if (value === undefined) return;
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid ${flag}: ${value}`);
  }
  process.env[name] = value;
}

// Must run before anything imports config/env.js, which reads process.env once.
export function applyEnvOverrides(values: CliValues): void {
  applyBooleanEnv('DEBUG', values.debug);
  applyBooleanEnv('INCLUDE_ERROR_CONTEXT', values.includeErrorContext);
  applyEnumEnv('LLM_TARGET', values.llmTarget, LLM_TARGETS, '--llm-target');
  applyStringEnv('LLM_MODEL', values.llmModel);
  applyStringEnv('LLM_BASE_URL', values.llmBaseUrl);
  applyNumberEnv('LLM_TIMEOUT_MS', values.llmTimeoutMs, '--llm-timeout-ms');
  applyNumberEnv(
    'MAX_PROMPT_LENGTH',
    values.maxPromptLength,
    '--max-prompt-length'
  );
}

export function parseConcurrency(
  value: string | undefined
): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[1-9]\d*$/.test(value)) {
    throw new Error(`Invalid --concurrency: ${value}`);
  }
  return Number.parseInt(value, 10);
}

export function printHelp(): void {
  writeCliOutput(`Usage: prompt-refinery-mcp [options]

Options:
  -h, --help                    Show help text
  -v, --version                 Print version
  --debug / --no-debug          Override DEBUG
  --include-error-context       Override INCLUDE_ERROR_CONTEXT
  --no-include-error-context
  --llm-target <target>         ollama | open-webui
  --llm-model <name>            Override LLM_MODEL
  --llm-base-url <url>          Override LLM_BASE_URL
  --llm-timeout-ms <number>     Override LLM_TIMEOUT_MS
  --max-prompt-length <number>  Override MAX_PROMPT_LENGTH

Research mode:
  --research                    Run the configuration experiment instead of the server
  --output-dir <path>           Directory for experiment artifacts (default: ./research-output)
  --concurrency <number>        Parallel refinement runs (default: 2)

Environment variables:
  LLM_TARGET                    ollama (default) or open-webui
  LLM_API_KEY                   Required for open-webui
  LLM_MODEL                     Model name (default: llama3.2:latest)

CLI flags override environment variables.`);
}
