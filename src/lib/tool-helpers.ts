import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ServerNotification,
  ServerRequest,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './errors.js';

export type ToolExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export function extractQueryFromInput(input: unknown): string | undefined {
  if (typeof input !== 'object' || input === null) return undefined;
  if (!('query' in input)) return undefined;
  const { query } = input;
  return typeof query === 'string' ? query : undefined;
}

export async function sendProgress(
  extra: ToolExtra,
  progress: number,
  total: number | undefined,
  message?: string
): Promise<void> {
  const token = extra._meta?.progressToken;
  if (token === undefined) return;
  try {
    await extra.sendNotification({
      method: 'notifications/progress',
      params: {
        progressToken: token,
        progress,
        ...(total !== undefined ? { total } : {}),
        ...(message ? { message } : {}),
      },
    });
  } catch (error) {
    logger.debug({ err: error }, 'Failed to send progress notification');
  }
}
