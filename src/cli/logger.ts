import { inspect } from 'node:util';

import { writeStderr } from './output.js';

type LogFn = (payload: unknown, msg?: string) => void;
type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

function formatPayload(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  return inspect(payload, { depth: 4, colors: false, breakLength: 120 });
}

export function formatBootstrapLine(
  level: LogLevel,
  payload: unknown,
  msg?: string
): string {
  const prefix = `[refinery] ${level}:`;
  if (msg === undefined) return `${prefix} ${formatPayload(payload)}`;
  if (payload === undefined) return `${prefix} ${msg}`;
  return `${prefix} ${msg} ${formatPayload(payload)}`;
}

/**
 * Logger used before pino is loaded. The pino logger reads config/env.js, so
 * it can only be imported after CLI flags have been written into the
 * environment.
 */
export function createBootstrapLogger(
  write: (line: string) => void = writeStderr,
  debugEnabled: () => boolean = () => process.env.DEBUG === 'true'
): Logger {
  const at =
    (level: LogLevel): LogFn =>
    (payload, msg) => {
      write(formatBootstrapLine(level, payload, msg));
    };
  return {
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    debug: (payload, msg) => {
      if (debugEnabled()) write(formatBootstrapLine('debug', payload, msg));
    },
  };
}

let logger: Logger = createBootstrapLogger();

export function getLogger(): Logger {
  return logger;
}

export async function initLogger(): Promise<void> {
  const { logger: pinoLogger } = await import('../lib/errors.js');
  logger = pinoLogger;
}
