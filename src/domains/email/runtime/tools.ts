/**
 * Email tools (Gmail, read-only).
 */

import type { ToolArgs, ToolDefinition } from '../../../tools/types.js';
import { clampCount, optionalInteger, requireInteger, requireString } from '../../../tools/utils.js';
import {
  renderDetails,
  renderIndexNotFound,
  renderRecentList,
  renderSearchResults,
} from './render.js';

export const DEFAULT_COUNT = 5;
export const MAX_RECENT_COUNT = 20;
export const MAX_SEARCH_COUNT = 10;

export const listRecentEmails: ToolDefinition<ToolArgs['list_recent_emails']> = {
  tool: {
    name: 'list_recent_emails',
    description: `List the most recent emails in the Gmail inbox, newest first.

Returns a numbered summary per email (sender, subject, date, body preview).
The numbers can be passed to get_email_details as email_index when this is the
first listing in the conversation turn.`,
    input_schema: {
      type: 'object' as const,
      properties: {
        count: {
          type: 'integer',
          description: `Number of emails to list (1-${MAX_RECENT_COUNT}, default ${DEFAULT_COUNT})`,
        },
      },
    },
  },
  parse: (input) => ({
    count: clampCount(optionalInteger('list_recent_emails', input, 'count', DEFAULT_COUNT), MAX_RECENT_COUNT),
  }),
  handler: async ({ count }, { mail, recent }) => {
    const emails = await mail.getRecentEmails(count);
    recent.capture(emails.map((email) => email.id));
    return renderRecentList(emails);
  },
};

export const searchEmails: ToolDefinition<ToolArgs['search_emails']> = {
  tool: {
    name: 'search_emails',
    description: `Search emails in Gmail. Supports full Gmail search syntax.

Results are numbered; the numbers can be passed to get_email_details as
email_index when this is the first listing in the conversation turn.

Common search operators:
- from:sender@example.com - Emails from specific sender
- to:recipient@example.com - Emails to specific recipient
- subject:keyword - Search in subject line
- is:unread - Only unread emails
- has:attachment - Emails with attachments
- newer_than:7d - Last 7 days (also: 1d, 1m, 1y)
- after:2024/01/01 - After specific date
- label:work - Emails with specific label

Combine operators: "from:billing newer_than:1m subject:invoice"`,
    input_schema: {
      type: 'object' as const,
      properties: {
        query: {
          type: 'string',
          description: 'Gmail search query using Gmail search syntax',
        },
        count: {
          type: 'integer',
          description: `Maximum number of results (1-${MAX_SEARCH_COUNT}, default ${DEFAULT_COUNT})`,
        },
      },
      required: ['query'],
    },
  },
  parse: (input) => ({
    query: requireString('search_emails', input, 'query'),
    count: clampCount(optionalInteger('search_emails', input, 'count', DEFAULT_COUNT), MAX_SEARCH_COUNT),
  }),
  handler: async ({ query, count }, { mail, recent }) => {
    const refs = await mail.listMessages(query, count);
    const emails = await Promise.all(refs.map((ref) => mail.getMessage(ref.id)));
    recent.capture(emails.map((email) => email.id));
    return renderSearchResults(query, emails);
  },
};

export const getEmailDetails: ToolDefinition<ToolArgs['get_email_details']> = {
  tool: {
    name: 'get_email_details',
    description: `Get the full content of one email (sender, recipient, subject, date, labels, body).

email_index is the 1-based number shown by the FIRST list_recent_emails or
search_emails result in this conversation turn. Later listings in the same turn
do not renumber it. Without an earlier listing it refers to the
${MAX_RECENT_COUNT} most recent inbox emails.`,
    input_schema: {
      type: 'object' as const,
      properties: {
        email_index: {
          type: 'integer',
          description: '1-based index of the email in the first listing of this turn',
        },
      },
      required: ['email_index'],
    },
  },
  parse: (input) => ({
    emailIndex: requireInteger('get_email_details', input, 'email_index'),
  }),
  handler: async ({ emailIndex }, { mail, recent }) => {
    const result = await recent.lookup(emailIndex, mail);
    if (!result.found) {
      return renderIndexNotFound(emailIndex, result.size);
    }
    return renderDetails(result.email);
  },
};
