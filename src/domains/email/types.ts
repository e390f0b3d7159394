/**
 * @fileoverview Email domain type definitions.
 */

import type { gmail_v1 } from 'googleapis';

/** Normalized Gmail message. Immutable; created by the normalizer only. */
export interface Email {
  readonly id: string;
  readonly threadId: string;
  readonly subject: string;
  readonly sender: string;
  readonly recipient: string;
  /** Plain text, at most {@link MAX_BODY_CHARS} characters */
  readonly body: string;
  /** Date header as the provider sent it */
  readonly date: string;
  readonly labels: readonly string[];
}

/** Lightweight reference returned by list operations. */
export interface MessageRef {
  id: string;
  threadId?: string;
}

/**
 * Read-only mailbox operations. Implementations authenticate on demand.
 */
export interface MailClient {
  /**
   * Ensure valid credentials (load, refresh or interactive grant).
   * @throws CredentialsUnavailableError if the grant is needed and impossible
   */
  authenticate(): Promise<void>;

  /**
   * List message references. An empty query lists the inbox in provider order.
   * @throws ProviderError
   */
  listMessages(query: string, maxResults: number): Promise<MessageRef[]>;

  /**
   * Fetch and normalize one message.
   * @throws MessageNotFoundError if the provider does not know the id
   * @throws ProviderError
   */
  getMessage(id: string): Promise<Email>;

  /**
   * The `count` most recent messages, in listing order.
   */
  getRecentEmails(count: number): Promise<Email[]>;
}

/**
 * The slice of `gmail_v1.Gmail` the client uses.
 */
export interface GmailApi {
  users: {
    messages: {
      list(params: gmail_v1.Params$Resource$Users$Messages$List): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
      get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }>;
    };
  };
}
