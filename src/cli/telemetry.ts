import { getLogger } from './logger.js';

export async function configureTelemetry(): Promise<() => void> {
  const { config } = await import('../config/env.js');
  if (!config.DEBUG) return () => {};

  const logger = getLogger();
  const telemetry = await import('../lib/telemetry.js');
  const unsubscribeLlm = telemetry.subscribeLlmRequests((event) => {
    logger.debug({ event }, 'LLM request');
  });
  const unsubscribeIterations = telemetry.subscribeRefinementIterations(
    (event) => {
      logger.debug({ event }, 'Refinement pass');
    }
  );

  return () => {
    unsubscribeLlm();
    unsubscribeIterations();
  };
}
