/**
 * Tool registry (canonical).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { ToolArgs, ToolContext, ToolDefinitions, ToolName, ToolObservation } from './types.js';
import { getEmailDetails, listRecentEmails, searchEmails } from '../domains/email/runtime/tools.js';
import type { AppLogger } from '../utils/observability/index.js';
import { createLogger } from '../utils/observability/index.js';
import { errorMessage, isFatalError } from '../utils/errors.js';

/**
 * All tool definitions, keyed by name.
 */
const toolDefinitions: ToolDefinitions = {
  list_recent_emails: listRecentEmails,
  search_emails: searchEmails,
  get_email_details: getEmailDetails,
};

export const TOOL_NAMES: ToolName[] = ['list_recent_emails', 'search_emails', 'get_email_details'];

/**
 * Tool definitions for the backend, in a stable order.
 */
export const TOOLS: Tool[] = TOOL_NAMES.map((name) => toolDefinitions[name].tool);

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolDefinitions, name);
}

function runTool<N extends ToolName>(
  name: N,
  input: Record<string, unknown>,
  context: ToolContext
): Promise<string> {
  const definition: ToolDefinitions[N] = toolDefinitions[name];
  const args: ToolArgs[N] = definition.parse(input);
  return definition.handler(args, context);
}

/**
 * Execute a tool by name.
 *
 * Unknown names, argument errors and provider failures come back as error
 * observations so the backend can recover. Fatal errors are rethrown.
 */
export async function executeTool(
  name: string,
  input: Record<string, unknown>,
  context: ToolContext,
  logger: AppLogger = createLogger({ domain: 'tools' })
): Promise<ToolObservation> {
  if (!isToolName(name)) {
    logger.warn('tool_unknown', { toolName: name });
    return {
      content: `Unknown tool: ${name}. Available tools: ${TOOL_NAMES.join(', ')}`,
      isError: true,
    };
  }

  logger.info('tool_call_received', { toolName: name, inputKeys: Object.keys(input) });

  try {
    const content = await runTool(name, input, context);
    return { content, isError: false };
  } catch (error) {
    if (isFatalError(error)) {
      throw error;
    }
    logger.error('tool_execution_failed', { toolName: name, error: errorMessage(error) });
    return { content: `Error: ${errorMessage(error)}`, isError: true };
  }
}

export type { ToolArgs, ToolContext, ToolDefinition, ToolName, ToolObservation } from './types.js';
