/**
 * @fileoverview Text rendering for email tool results.
 */

import type { Email } from '../types.js';
import { truncateChars } from '../normalizer.js';

/** Preview length in characters. */
export const PREVIEW_CHARS = 100;

/**
 * The first PREVIEW_CHARS characters of the body, flattened onto one line;
 * '...' marks a cut.
 */
export function renderPreview(body: string): string {
  const head = truncateChars(body, PREVIEW_CHARS);
  const flat = head.replace(/\s+/g, ' ').trim();
  return head.length < body.length ? `${flat}...` : flat;
}

function renderSummary(email: Email, position: number): string {
  return [
    `${position}. From: ${email.sender}`,
    `   Subject: ${email.subject}`,
    `   Date: ${email.date}`,
    `   Preview: ${renderPreview(email.body)}`,
  ].join('\n');
}

/**
 * Numbered summary blocks under a heading, separated by blank lines.
 */
export function renderSummaries(heading: string, emails: readonly Email[]): string {
  const blocks = emails.map((email, i) => renderSummary(email, i + 1));
  return `${heading}\n\n${blocks.join('\n\n')}`;
}

export function renderRecentList(emails: readonly Email[]): string {
  if (emails.length === 0) return 'No emails found.';
  return renderSummaries(`Found ${emails.length} recent emails:`, emails);
}

export function renderSearchResults(query: string, emails: readonly Email[]): string {
  if (emails.length === 0) return `No emails found for query: ${query}`;
  return renderSummaries(`Found ${emails.length} emails matching '${query}':`, emails);
}

export function renderDetails(email: Email): string {
  return [
    'Email Details:',
    `From: ${email.sender}`,
    `To: ${email.recipient}`,
    `Subject: ${email.subject}`,
    `Date: ${email.date}`,
    `Labels: ${email.labels.join(', ')}`,
    '',
    'Body:',
    email.body,
  ].join('\n');
}

export function renderIndexNotFound(index: number, size: number): string {
  if (size === 0) {
    return `Email index ${index} not found. No recent emails are available.`;
  }
  return `Email index ${index} not found. Available: 1-${size}`;
}
