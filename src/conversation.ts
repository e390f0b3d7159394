/**
 * Conversation history management.
 *
 * Holds the completed turns of one CLI session, in memory, and replays the
 * most recent ones as backend context. Failed turns are never recorded.
 */

import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import { runAgentTurn } from './executor/tool-executor.js';
import type { AgentTurnDeps, AgentTurnOptions, AgentTurnResult } from './executor/types.js';

export const DEFAULT_HISTORY_TURNS = 10;

export interface ConversationTurn {
  utterance: string;
  reply: string;
  toolNames: string[];
}

export class Conversation {
  private readonly turns: ConversationTurn[] = [];

  constructor(
    private readonly deps: AgentTurnDeps,
    private readonly options: Omit<AgentTurnOptions, 'history'> & { historyTurns?: number } = {}
  ) {}

  /**
   * Completed turns, oldest first.
   */
  getTurns(): readonly ConversationTurn[] {
    return this.turns;
  }

  /**
   * Replayable context: the last `historyTurns` turns as user/assistant pairs.
   */
  getHistory(): MessageParam[] {
    const limit = this.options.historyTurns ?? DEFAULT_HISTORY_TURNS;
    if (limit <= 0) return [];
    return this.turns.slice(-limit).flatMap((turn): MessageParam[] => [
      { role: 'user', content: turn.utterance },
      { role: 'assistant', content: turn.reply },
    ]);
  }

  /**
   * Run one turn with the replayed history and record it on success.
   */
  async send(utterance: string): Promise<AgentTurnResult> {
    const { historyTurns: _historyTurns, ...turnOptions } = this.options;
    const result = await runAgentTurn(utterance, this.deps, { ...turnOptions, history: this.getHistory() });
    this.turns.push({
      utterance,
      // The Messages API rejects empty assistant content
      reply: result.text || '(no answer)',
      toolNames: result.toolCalls.map((call) => call.name),
    });
    return result;
  }

  clear(): void {
    this.turns.length = 0;
  }
}
