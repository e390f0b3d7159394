/**
 * Tool Executor
 *
 * The agent loop for one user utterance:
 * 1. Send the context to the backend with the email tools enabled
 * 2. If the backend requests tools, run them one at a time and feed the results back
 * 3. Repeat until the backend returns a final answer or the iteration budget runs out
 */

import type {
  ContentBlockParam,
  MessageParam,
  ToolResultBlockParam,
} from '@anthropic-ai/sdk/resources/messages';

import { buildEmailAgentPrompt } from '../agents/email/prompt.js';
import { RecentWindow } from '../domains/email/runtime/recent-window.js';
import { TOOLS, executeTool } from '../tools/index.js';
import type { ToolContext } from '../tools/types.js';
import type { ToolCall } from '../llm/types.js';
import { AgentNonConvergenceError } from '../utils/errors.js';
import { createLogger, createTurnId, withLogContext } from '../utils/observability/index.js';
import { enforceObservationBudget } from './context-budget.js';
import type { ObservationEntry } from './context-budget.js';
import {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_OBSERVATION_CHARS,
} from './types.js';
import type {
  AgentTurnDeps,
  AgentTurnOptions,
  AgentTurnResult,
  ToolCallRecord,
} from './types.js';

/**
 * One backend step that requested tools, with the observations it produced.
 */
interface ToolStep {
  assistant: ContentBlockParam[];
  observations: ObservationEntry[];
}

function assistantContent(text: string, toolCalls: ToolCall[]): ContentBlockParam[] {
  const blocks: ContentBlockParam[] = [];
  if (text) {
    blocks.push({ type: 'text', text });
  }
  for (const call of toolCalls) {
    blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input });
  }
  return blocks;
}

function toolResultBlock(entry: ObservationEntry): ToolResultBlockParam {
  return {
    type: 'tool_result',
    tool_use_id: entry.toolUseId,
    content: entry.content,
    ...(entry.isError ? { is_error: true } : {}),
  };
}

/**
 * Context for the next backend call: history, the utterance, then every tool step so far.
 */
export function buildMessages(
  history: readonly MessageParam[],
  utterance: string,
  steps: readonly ToolStep[]
): MessageParam[] {
  const messages: MessageParam[] = [...history, { role: 'user', content: utterance }];
  for (const step of steps) {
    messages.push({ role: 'assistant', content: step.assistant });
    messages.push({ role: 'user', content: step.observations.map(toolResultBlock) });
  }
  return messages;
}

/**
 * Run one agent turn.
 *
 * @returns The final answer with the tool calls made and token usage
 * @throws AgentNonConvergenceError after maxIterations backend calls without a final answer
 * @throws CredentialsUnavailableError (and other fatal errors) from tool dispatch
 */
export async function runAgentTurn(
  utterance: string,
  deps: AgentTurnDeps,
  options: AgentTurnOptions = {}
): Promise<AgentTurnResult> {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const maxObservationChars = options.maxObservationChars ?? DEFAULT_MAX_OBSERVATION_CHARS;
  const system = options.systemPrompt ?? buildEmailAgentPrompt();
  const history = options.history ?? [];

  return withLogContext({ turnId: createTurnId(), domain: 'agent' }, async () => {
    const logger = deps.logger ?? createLogger();
    const toolContext: ToolContext = { mail: deps.mail, recent: new RecentWindow() };

    const toolCalls: ToolCallRecord[] = [];
    let steps: ToolStep[] = [];
    let totalInputTokens = 0;
    let totalOutputTokens = 0;

    logger.info('agent_turn_started', { utterance, historyLength: history.length });

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      const result = await deps.backend.generate({
        system,
        tools: TOOLS,
        messages: buildMessages(history, utterance, steps),
      });

      totalInputTokens += result.usage.input;
      totalOutputTokens += result.usage.output;

      if (result.kind === 'final') {
        logger.info('agent_turn_completed', {
          iterations: iteration,
          toolCallCount: toolCalls.length,
          usage: { input: totalInputTokens, output: totalOutputTokens },
        });
        return {
          text: result.text,
          toolCalls,
          iterations: iteration,
          tokenUsage: { input: totalInputTokens, output: totalOutputTokens },
        };
      }

      // Sequential: a listing must capture the recent window before a details call reads it
      const observations: ObservationEntry[] = [];
      for (const call of result.toolCalls) {
        const observation = await executeTool(call.name, call.input, toolContext, logger);
        observations.push({ toolUseId: call.id, content: observation.content, isError: observation.isError });
        toolCalls.push({ id: call.id, name: call.name, input: call.input, isError: observation.isError });
      }

      steps.push({ assistant: assistantContent(result.text, result.toolCalls), observations });
      const budgeted = enforceObservationBudget(steps.map((step) => step.observations), maxObservationChars);
      steps = steps.map((step, i) => ({ assistant: step.assistant, observations: budgeted[i] }));

      logger.debug('agent_step_completed', { iteration, toolCallCount: result.toolCalls.length });
    }

    logger.warn('agent_loop_limit_reached', { iterations: maxIterations, toolCallCount: toolCalls.length });
    throw new AgentNonConvergenceError(maxIterations);
  });
}
