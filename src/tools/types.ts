/**
 * Tool type definitions (canonical location).
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { MailClient } from '../domains/email/types.js';
import type { RecentWindow } from '../domains/email/runtime/recent-window.js';

/**
 * Context passed to tool handlers. Scoped to one agent turn.
 */
export interface ToolContext {
  mail: MailClient;
  /** Index snapshot that get_email_details resolves against */
  recent: RecentWindow;
}

/**
 * Parsed arguments of every tool, keyed by tool name.
 */
export interface ToolArgs {
  list_recent_emails: { count: number };
  search_emails: { query: string; count: number };
  get_email_details: { emailIndex: number };
}

export type ToolName = keyof ToolArgs;

/**
 * Turns backend-supplied input into typed arguments.
 * @throws ToolArgumentError
 */
export type ToolArgsParser<A> = (input: Record<string, unknown>) => A;

/**
 * Handler function type for tool execution. Results are plain text.
 */
export type ToolHandler<A> = (args: A, context: ToolContext) => Promise<string>;

/**
 * Pairs a tool definition with its parser and handler.
 */
export interface ToolDefinition<A> {
  tool: Tool;
  parse: ToolArgsParser<A>;
  handler: ToolHandler<A>;
}

export type ToolDefinitions = { [N in ToolName]: ToolDefinition<ToolArgs[N]> };

/**
 * Text result of one tool call, as fed back to the backend.
 */
export interface ToolObservation {
  content: string;
  isError: boolean;
}
