/**
 * Unit tests for the Anthropic Messages adapter.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  clearMockState,
  createMixedResponse,
  createTextResponse,
  createToolUseResponse,
  getCreateCalls,
  setMockResponses,
} from '../../mocks/anthropic.js';

import { AnthropicBackend } from '../../../src/services/anthropic/backend.js';
import { createAnthropicClient } from '../../../src/services/anthropic/client.js';
import { TOOLS } from '../../../src/tools/index.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('createAnthropicClient', () => {
  it('requires an API key', () => {
    expect(() => createAnthropicClient(undefined)).toThrow(ConfigError);
    expect(() => createAnthropicClient('')).toThrow('ANTHROPIC_API_KEY is required');
  });
});

describe('AnthropicBackend', () => {
  let backend: AnthropicBackend;

  beforeEach(() => {
    clearMockState();
    backend = new AnthropicBackend(createAnthropicClient('test-api-key'), {
      model: 'test-model',
      maxTokens: 1024,
    });
  });

  it('sends the system prompt, tools and messages', async () => {
    setMockResponses([createTextResponse('Hi')]);

    await backend.generate({
      system: 'system prompt',
      tools: TOOLS,
      messages: [{ role: 'user', content: 'hello' }],
    });

    const calls = getCreateCalls();
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      model: 'test-model',
      max_tokens: 1024,
      system: 'system prompt',
      messages: [{ role: 'user', content: 'hello' }],
    });
    expect(calls[0].tools).toBe(TOOLS);
  });

  it('returns a final answer for a text response', async () => {
    setMockResponses([createTextResponse('You have 3 unread emails.')]);

    const result = await backend.generate({ system: 's', tools: [], messages: [{ role: 'user', content: 'q' }] });

    expect(result).toEqual({
      kind: 'final',
      text: 'You have 3 unread emails.',
      usage: { input: 10, output: 5 },
    });
  });

  it('returns tool calls for a tool_use response', async () => {
    setMockResponses([createToolUseResponse('search_emails', { query: 'is:unread' }, 'toolu_1')]);

    const result = await backend.generate({ system: 's', tools: TOOLS, messages: [{ role: 'user', content: 'q' }] });

    expect(result).toEqual({
      kind: 'tool_use',
      text: '',
      toolCalls: [{ id: 'toolu_1', name: 'search_emails', input: { query: 'is:unread' } }],
      usage: { input: 10, output: 5 },
    });
  });

  it('keeps the text that accompanies tool calls', async () => {
    setMockResponses([createMixedResponse('Searching now.', 'list_recent_emails', { count: 3 }, 'toolu_2')]);

    const result = await backend.generate({ system: 's', tools: TOOLS, messages: [{ role: 'user', content: 'q' }] });

    expect(result.kind).toBe('tool_use');
    expect(result.text).toBe('Searching now.');
  });

  it('treats tool_use without tool blocks as a final answer', async () => {
    setMockResponses([{
      content: [{ type: 'text', text: 'Nothing to call.' }],
      stop_reason: 'tool_use',
      usage: { input_tokens: 7, output_tokens: 3 },
    }]);

    const result = await backend.generate({ system: 's', tools: TOOLS, messages: [{ role: 'user', content: 'q' }] });

    expect(result).toEqual({ kind: 'final', text: 'Nothing to call.', usage: { input: 7, output: 3 } });
  });

  it('propagates a failed request', async () => {
    await expect(
      backend.generate({ system: 's', tools: [], messages: [{ role: 'user', content: 'q' }] })
    ).rejects.toThrow('No queued response for messages.create');
    expect(getCreateCalls()).toHaveLength(1);
  });

  it('joins several text blocks with newlines', async () => {
    setMockResponses([{
      content: [{ type: 'text', text: 'First.' }, { type: 'text', text: 'Second.' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 1, output_tokens: 1 },
    }]);

    const result = await backend.generate({ system: 's', tools: [], messages: [{ role: 'user', content: 'q' }] });

    expect(result.text).toBe('First.\nSecond.');
  });
});
