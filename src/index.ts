#!/usr/bin/env node
import {
  applyEnvOverrides,
  parseCli,
  parseConcurrency,
  printHelp,
} from './cli/config.js';
import { initLogger } from './cli/logger.js';
import { formatResearchSummary, writeCliOutput } from './cli/output.js';
import {
  createRunSignal,
  registerProcessHandlers,
  setServer,
  shutdown,
} from './cli/shutdown.js';
import { configureTelemetry } from './cli/telemetry.js';

// Modules that read config/env.js are imported only after CLI overrides apply.
async function runServer(): Promise<void> {
  const { createServer, startServer, validateModelClient } = await import(
    './server.js'
  );
  await validateModelClient();
  const server = createServer();
  setServer(server);
  await startServer(server);
}

async function runResearchMode(
  outputDir: string | undefined,
  concurrency: number | undefined
): Promise<void> {
  const { runResearch } = await import('./research.js');
  const signal = createRunSignal();
  try {
    const artifacts = await runResearch({ outputDir, concurrency, signal });
    writeCliOutput(formatResearchSummary(artifacts));
  } catch (error) {
    if (!signal.aborted) throw error;
    writeCliOutput('Research run interrupted; no report written');
    process.exitCode = 130;
  }
}

async function main(): Promise<void> {
  const cli = parseCli();
  if (cli.help) {
    printHelp();
    return;
  }
  if (cli.version) {
    const { SERVER_VERSION } = await import('./config/constants.js');
    writeCliOutput(SERVER_VERSION);
    return;
  }

  applyEnvOverrides(cli);
  const concurrency = parseConcurrency(cli.concurrency);
  await initLogger();
  const stopTelemetry = await configureTelemetry();

  registerProcessHandlers();
  if (cli.research) {
    try {
      await runResearchMode(cli.outputDir, concurrency);
    } finally {
      stopTelemetry();
    }
    return;
  }

  await runServer();
}

main().catch((err: unknown) => {
  void shutdown('startup', err);
});
