/**
 * @fileoverview Gmail message normalizer.
 *
 * Pure conversion of a `users.messages.get` (format=full) payload into an
 * {@link Email}. Never throws: missing or malformed parts fall back to
 * placeholders or an empty body.
 */

import type { gmail_v1 } from 'googleapis';
import type { Email } from './types.js';

/** Maximum body length in characters (code points). */
export const MAX_BODY_CHARS = 1000;

export const NO_SUBJECT = 'No Subject';
export const UNKNOWN = 'Unknown';

/**
 * Header map keyed by lower-cased name; the last occurrence of a name wins.
 */
export function headerMap(headers: gmail_v1.Schema$MessagePartHeader[] | undefined): Map<string, string> {
  const map = new Map<string, string>();
  for (const header of headers ?? []) {
    if (header.name) {
      map.set(header.name.toLowerCase(), header.value ?? '');
    }
  }
  return map;
}

/** base64url as Gmail sends it; padding and the standard alphabet are tolerated. */
const BASE64_PATTERN = /^[A-Za-z0-9_+/-]*={0,2}$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a transport-encoded body. Data that is not base64 or not valid
 * UTF-8 yields an empty string.
 */
export function decodeBody(data: string | null | undefined): string {
  if (!data) return '';
  if (!BASE64_PATTERN.test(data) || data.replace(/=+$/, '').length % 4 === 1) {
    return '';
  }
  try {
    return utf8.decode(Buffer.from(data, 'base64url'));
  } catch {
    return '';
  }
}

/**
 * First text/plain body in depth-first order.
 */
export function extractPlainText(part: gmail_v1.Schema$MessagePart | undefined): string {
  if (!part) return '';

  if (part.mimeType === 'text/plain' && part.body?.data) {
    return decodeBody(part.body.data);
  }

  for (const child of part.parts ?? []) {
    const text = extractPlainText(child);
    if (text) return text;
  }

  return '';
}

/**
 * First `max` characters of a string, counted in code points so a surrogate
 * pair is never split.
 */
export function truncateChars(text: string, max: number): string {
  if (text.length <= max) return text;
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join('');
}

export function normalizeMessage(raw: gmail_v1.Schema$Message): Email {
  const headers = headerMap(raw.payload?.headers ?? undefined);

  return Object.freeze({
    id: raw.id ?? '',
    threadId: raw.threadId ?? '',
    subject: headers.get('subject') ?? NO_SUBJECT,
    sender: headers.get('from') ?? UNKNOWN,
    recipient: headers.get('to') ?? UNKNOWN,
    body: truncateChars(extractPlainText(raw.payload ?? undefined), MAX_BODY_CHARS),
    date: headers.get('date') ?? UNKNOWN,
    labels: Object.freeze([...(raw.labelIds ?? [])]),
  });
}
