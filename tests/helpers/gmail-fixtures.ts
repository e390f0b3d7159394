/**
 * Gmail API stand-ins: payload builders and an in-memory GmailApi.
 */

import type { gmail_v1 } from 'googleapis';
import type { GmailApi } from '../../src/domains/email/types.js';

export function encodeBody(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

export interface MessageFixture {
  id: string;
  threadId?: string;
  headers?: Record<string, string>;
  body?: string;
  labelIds?: string[];
}

/**
 * A format=full message with a single text/plain payload.
 */
export function buildMessage(fixture: MessageFixture): gmail_v1.Schema$Message {
  return {
    id: fixture.id,
    threadId: fixture.threadId ?? `thread-${fixture.id}`,
    labelIds: fixture.labelIds ?? ['INBOX'],
    payload: {
      mimeType: 'text/plain',
      headers: Object.entries(fixture.headers ?? {}).map(([name, value]) => ({ name, value })),
      body: { data: encodeBody(fixture.body ?? '') },
    },
  };
}

/**
 * Error shaped like a gaxios HTTP failure.
 */
export function httpError(status: number, message = `Request failed with status ${status}`): Error & { code: number; status: number } {
  return Object.assign(new Error(message), { code: status, status });
}

export interface FakeGmailOptions {
  messages: gmail_v1.Schema$Message[];
  /** Per-id latency for messages.get, to shuffle completion order */
  delays?: Record<string, number>;
  /** Errors thrown by successive calls, consumed in order */
  listErrors?: Error[];
  getErrors?: Record<string, Error[]>;
}

export class FakeGmailApi implements GmailApi {
  readonly listCalls: gmail_v1.Params$Resource$Users$Messages$List[] = [];
  readonly getCalls: gmail_v1.Params$Resource$Users$Messages$Get[] = [];

  readonly users: GmailApi['users'];

  constructor(private readonly options: FakeGmailOptions) {
    this.users = {
      messages: {
        list: async (params) => {
          this.listCalls.push(params);
          const error = this.options.listErrors?.shift();
          if (error) throw error;
          const max = params.maxResults ?? 100;
          const messages = this.options.messages
            .slice(0, max)
            .map((message) => ({ id: message.id, threadId: message.threadId }));
          return { data: { messages, resultSizeEstimate: messages.length } };
        },
        get: async (params) => {
          this.getCalls.push(params);
          const id = params.id ?? '';
          const error = this.options.getErrors?.[id]?.shift();
          if (error) throw error;
          const delay = this.options.delays?.[id] ?? 0;
          if (delay > 0) {
            await new Promise((resolve) => setTimeout(resolve, delay));
          }
          const message = this.options.messages.find((m) => m.id === id);
          if (!message) throw httpError(404, 'Requested entity was not found.');
          return { data: message };
        },
      },
    };
  }
}
