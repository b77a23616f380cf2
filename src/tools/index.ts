import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ToolRegistrar } from '../config/types.js';
import { registerRefinePromptTool } from './refine-prompt.js';
import { registerSelectConfigurationTool } from './select-configuration.js';
import { registerValidateParametersTool } from './validate-parameters.js';

const TOOL_REGISTRARS: readonly ToolRegistrar[] = [
  registerRefinePromptTool,
  registerSelectConfigurationTool,
  registerValidateParametersTool,
] as const;

export function registerAllTools(server: McpServer): void {
  for (const registrar of TOOL_REGISTRARS) {
    registrar(server);
  }
}
