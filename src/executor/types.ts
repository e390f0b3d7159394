/**
 * Agent Type Definitions
 *
 * Inputs and outputs of one agent turn. Collaborators are passed in
 * explicitly; nothing here is global.
 */

import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import type { MailClient } from '../domains/email/types.js';
import type { TextGenerationBackend, TokenUsage } from '../llm/types.js';
import type { AppLogger } from '../utils/observability/index.js';

/** Iteration budget: backend calls per turn. */
export const DEFAULT_MAX_ITERATIONS = 10;

/** Total tool-result characters kept in the context. */
export const DEFAULT_MAX_OBSERVATION_CHARS = 24000;

export interface AgentTurnDeps {
  backend: TextGenerationBackend;
  mail: MailClient;
  logger?: AppLogger;
}

export interface AgentTurnOptions {
  /** Defaults to the email agent prompt for today */
  systemPrompt?: string;
  maxIterations?: number;
  maxObservationChars?: number;
  /** Prior turns, oldest first */
  history?: MessageParam[];
}

/**
 * One executed tool call, for observability.
 */
export interface ToolCallRecord {
  id: string;
  name: string;
  input: Record<string, unknown>;
  isError: boolean;
}

export interface AgentTurnResult {
  text: string;
  toolCalls: ToolCallRecord[];
  /** Backend calls made, including the final one */
  iterations: number;
  tokenUsage: TokenUsage;
}
