import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { getLogger } from './logger.js';

const SHUTDOWN_DELAY_MS = 500;
const SIGNALS = ['SIGHUP', 'SIGINT', 'SIGTERM'] as const;

let server: McpServer | null = null;
let runController: AbortController | null = null;
let shuttingDown = false;

export function setServer(instance: McpServer | null): void {
  server = instance;
}

/** Signal for a research run; the first termination signal aborts it. */
export function createRunSignal(): AbortSignal {
  runController = new AbortController();
  return runController.signal;
}

/**
 * Aborts the active research run. Returns false when there is nothing left
 * to abort, in which case the caller should shut down instead.
 */
export function interruptRun(reason: string): boolean {
  if (!runController || runController.signal.aborted) return false;
  getLogger().warn({ reason }, 'Interrupting research run');
  runController.abort(new Error(`Research run interrupted by ${reason}`));
  return true;
}

function handleSignal(signal: string): void {
  // A second signal during a research run exits without waiting.
  if (interruptRun(signal)) return;
  void shutdown(signal);
}

function startForcedShutdownTimer(): NodeJS.Timeout {
  return setTimeout(() => {
    getLogger().error(
      { delayMs: SHUTDOWN_DELAY_MS },
      'MCP server did not close in time; exiting'
    );
    process.exit(1);
  }, SHUTDOWN_DELAY_MS);
}

async function closeServer(): Promise<boolean> {
  if (!server?.isConnected()) return true;
  try {
    await server.close();
    return true;
  } catch (closeError) {
    getLogger().error({ err: closeError }, 'Failed to close MCP server');
    return false;
  }
}

export function registerProcessHandlers(): void {
  for (const signal of SIGNALS) {
    process.on(signal, () => {
      handleSignal(signal);
    });
  }

  process.once('uncaughtException', (err) => {
    void shutdown('uncaughtException', err);
  });
  process.once('unhandledRejection', (err) => {
    void shutdown('unhandledRejection', err);
  });
}

export async function shutdown(reason: string, err?: unknown): Promise<void> {
  const logger = getLogger();
  if (shuttingDown) {
    logger.error({ reason }, 'Shutdown already in progress; exiting');
    process.exit(1);
    return;
  }

  shuttingDown = true;
  if (err) {
    logger.error({ err, reason }, 'Stopping after error');
  } else {
    logger.info({ reason }, 'Stopping');
  }
  runController?.abort(new Error(`Stopped by ${reason}`));

  const timeout = startForcedShutdownTimer();
  let exitCode = err ? 1 : 0;
  if (!(await closeServer())) exitCode = 1;

  clearTimeout(timeout);
  process.exit(exitCode);
}
