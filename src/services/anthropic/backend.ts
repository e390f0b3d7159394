/**
 * Anthropic Messages API adapter for the agent loop.
 */

import type {
  Message,
  MessageCreateParamsNonStreaming,
  TextBlock,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';
import type {
  GenerationRequest,
  GenerationResult,
  TextGenerationBackend,
  ToolCall,
} from '../../llm/types.js';
import type { AppLogger } from '../../utils/observability/index.js';
import { createLogger } from '../../utils/observability/index.js';

/**
 * The part of the Anthropic client the backend calls. `Anthropic` satisfies it.
 */
export interface MessagesClient {
  messages: {
    create(params: MessageCreateParamsNonStreaming): Promise<Message>;
  };
}

export interface AnthropicBackendOptions {
  model: string;
  maxTokens: number;
  logger?: AppLogger;
}

function toInput(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

export class AnthropicBackend implements TextGenerationBackend {
  private readonly logger: AppLogger;

  constructor(
    private readonly client: MessagesClient,
    private readonly options: AnthropicBackendOptions
  ) {
    this.logger = (options.logger ?? createLogger()).child({ domain: 'anthropic' });
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const response = await this.client.messages.create({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      system: request.system,
      tools: request.tools,
      messages: request.messages,
    });

    const usage = {
      input: response.usage?.input_tokens ?? 0,
      output: response.usage?.output_tokens ?? 0,
    };

    const text = response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('\n');

    const toolCalls: ToolCall[] = response.content
      .filter((block): block is ToolUseBlock => block.type === 'tool_use')
      .map((block) => ({ id: block.id, name: block.name, input: toInput(block.input) }));

    this.logger.debug('generation_completed', {
      stopReason: response.stop_reason,
      toolCallCount: toolCalls.length,
      usage,
    });

    if (response.stop_reason === 'tool_use' && toolCalls.length > 0) {
      return { kind: 'tool_use', text, toolCalls, usage };
    }
    return { kind: 'final', text, usage };
  }
}
