/**
 * @fileoverview Gmail mail client.
 *
 * Every operation first asks the Google auth session for a client; the
 * session hands back its cached client while the token is valid. Transient
 * failures are retried and API errors are mapped onto the application
 * taxonomy.
 */

import type { gmail_v1 } from 'googleapis';
import type { OAuthClient } from '../../google-core/types.js';
import { statusOf, withRetry } from '../../google-core/providers/retry.js';
import { MessageNotFoundError, ProviderError, errorMessage } from '../../../utils/errors.js';
import type { AppError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { createLogger } from '../../../utils/observability/index.js';
import { normalizeMessage } from '../normalizer.js';
import type { Email, GmailApi, MailClient, MessageRef } from '../types.js';

/** Authorized-client source; `GoogleAuthSession` satisfies it. */
export interface AuthSession<C extends OAuthClient> {
  authenticate(): Promise<C>;
}

export interface GmailMailClientOptions<C extends OAuthClient> {
  session: AuthSession<C>;
  /** Build the API surface for an authorized client, e.g. `google.gmail({ version: 'v1', auth })` */
  createApi: (auth: C) => GmailApi;
  retryDelayMs?: number;
  logger?: AppLogger;
}

function isInvalidIdError(error: unknown): boolean {
  return statusOf(error) === 400 && errorMessage(error).includes('Invalid id value');
}

/**
 * Convert a Gmail API failure into a ProviderError.
 */
function toProviderError(error: unknown, operation: string): AppError {
  return new ProviderError(`Gmail ${operation} failed: ${errorMessage(error)}`, statusOf(error));
}

export class GmailMailClient<C extends OAuthClient> implements MailClient {
  private readonly session: AuthSession<C>;
  private readonly createApi: (auth: C) => GmailApi;
  private readonly retryDelayMs: number | undefined;
  private readonly logger: AppLogger;

  private api: { auth: C; gmail: GmailApi } | null = null;

  constructor(options: GmailMailClientOptions<C>) {
    this.session = options.session;
    this.createApi = options.createApi;
    this.retryDelayMs = options.retryDelayMs;
    this.logger = (options.logger ?? createLogger()).child({ domain: 'gmail' });
  }

  async authenticate(): Promise<void> {
    await this.gmail();
  }

  async listMessages(query: string, maxResults: number): Promise<MessageRef[]> {
    const gmail = await this.gmail();

    try {
      const response = await withRetry(() => gmail.users.messages.list({
        userId: 'me',
        maxResults,
        ...(query ? { q: query } : {}),
      }), { operation: 'messages.list', retryDelayMs: this.retryDelayMs, logger: this.logger });

      const refs: MessageRef[] = [];
      for (const message of response.data.messages ?? []) {
        if (!message.id) continue; // boundary: skip messages without an id
        refs.push(message.threadId ? { id: message.id, threadId: message.threadId } : { id: message.id });
      }

      this.logger.debug('gmail_list', { operation: 'messages.list', count: refs.length, hasQuery: Boolean(query) });
      return refs;
    } catch (error) {
      throw toProviderError(error, 'list');
    }
  }

  async getMessage(id: string): Promise<Email> {
    const gmail = await this.gmail();

    let data: gmail_v1.Schema$Message;
    try {
      const response = await withRetry(() => gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'full',
      }), { operation: 'messages.get', retryDelayMs: this.retryDelayMs, logger: this.logger });
      data = response.data;
    } catch (error) {
      if (statusOf(error) === 404 || isInvalidIdError(error)) {
        throw new MessageNotFoundError(id);
      }
      throw toProviderError(error, 'get');
    }

    // Boundary: require id from API response
    if (!data.id) {
      throw new ProviderError(`Gmail API returned message without id for id=${id}`);
    }

    return normalizeMessage(data);
  }

  async getRecentEmails(count: number): Promise<Email[]> {
    const refs = await this.listMessages('', count);
    // Promise.all keeps listing order regardless of completion order
    return Promise.all(refs.map((ref) => this.getMessage(ref.id)));
  }

  private async gmail(): Promise<GmailApi> {
    const auth = await this.session.authenticate();
    if (!this.api || this.api.auth !== auth) {
      this.api = { auth, gmail: this.createApi(auth) };
    }
    return this.api.gmail;
  }
}
