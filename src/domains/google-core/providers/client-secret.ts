/**
 * @fileoverview Reader for Google's downloaded OAuth client-secret file.
 *
 * The file has either an `installed` (desktop app) or `web` section:
 *   { "installed": { "client_id": "...", "client_secret": "...", "redirect_uris": [...] } }
 */

import { readFile } from 'fs/promises';
import { CredentialsUnavailableError } from '../../../utils/errors.js';

export interface ClientSecret {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the client identity from parsed client-secret JSON.
 * @returns null if neither section carries a client id and secret
 */
export function parseClientSecret(value: unknown): ClientSecret | null {
  if (!isRecord(value)) return null;
  const section = isRecord(value.installed) ? value.installed : isRecord(value.web) ? value.web : null;
  if (!section) return null;

  const { client_id: clientId, client_secret: clientSecret, redirect_uris: redirectUris } = section;
  if (typeof clientId !== 'string' || !clientId || typeof clientSecret !== 'string' || !clientSecret) {
    return null;
  }

  return {
    clientId,
    clientSecret,
    redirectUris: Array.isArray(redirectUris)
      ? redirectUris.filter((uri): uri is string => typeof uri === 'string')
      : [],
  };
}

/**
 * Load the client-secret file.
 * @throws CredentialsUnavailableError if the file is missing, unreadable or malformed
 */
export async function loadClientSecret(path: string): Promise<ClientSecret> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch {
    throw new CredentialsUnavailableError(`OAuth client-secret file not found: ${path}`, path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CredentialsUnavailableError(`OAuth client-secret file is not valid JSON: ${path}`, path);
  }

  const secret = parseClientSecret(parsed);
  if (!secret) {
    throw new CredentialsUnavailableError(
      `OAuth client-secret file has no "installed" or "web" client_id/client_secret: ${path}`,
      path
    );
  }
  return secret;
}
