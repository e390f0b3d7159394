/**
 * Type definitions for the text-generation backend.
 *
 * The agent loop only sees this interface; the Anthropic adapter lives in
 * services/anthropic. Message context uses the Messages API shapes.
 */

import type { MessageParam, Tool } from '@anthropic-ai/sdk/resources/messages';

/**
 * A tool invocation requested by the backend.
 */
export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface TokenUsage {
  input: number;
  output: number;
}

export interface GenerationRequest {
  system: string;
  tools: Tool[];
  messages: MessageParam[];
}

/**
 * Either a tool-use decision or the final answer.
 */
export type GenerationResult =
  | { kind: 'tool_use'; text: string; toolCalls: ToolCall[]; usage: TokenUsage }
  | { kind: 'final'; text: string; usage: TokenUsage };

export interface TextGenerationBackend {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
