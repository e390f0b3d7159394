/**
 * @fileoverview JSON file token store.
 *
 * Layout on disk (snake_case, as Google's tooling writes it):
 *   { access_token, refresh_token?, expiry, scope?, token_type?, client_id?, client_secret? }
 *
 * `expiry` is an ISO-8601 timestamp. Files written by google-auth-library
 * (`expiry_date` in epoch ms) are read as well. Writes go through a temp file
 * and a rename so a crash never leaves a half-written token behind.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { StoredCredential, TokenStore } from './types.js';
import type { AppLogger } from '../../utils/observability/index.js';
import { createLogger } from '../../utils/observability/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isNotFound(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Parse the token file contents.
 * @returns The credential, or null if the shape is not usable.
 */
export function parseTokenFile(value: unknown): StoredCredential | null {
  if (!isRecord(value)) return null;

  const accessToken = optionalString(value.access_token);
  if (!accessToken) return null;

  let expiresAt: number;
  if (typeof value.expiry === 'string') {
    expiresAt = Date.parse(value.expiry);
  } else if (typeof value.expiry_date === 'number') {
    expiresAt = value.expiry_date;
  } else {
    return null;
  }
  if (!Number.isFinite(expiresAt)) return null;

  return {
    accessToken,
    refreshToken: optionalString(value.refresh_token),
    expiresAt,
    scope: optionalString(value.scope),
    tokenType: optionalString(value.token_type),
    clientId: optionalString(value.client_id),
    clientSecret: optionalString(value.client_secret),
  };
}

/**
 * Serialize a credential to the on-disk layout.
 */
export function serializeTokenFile(credential: StoredCredential): Record<string, string> {
  const file: Record<string, string> = {
    access_token: credential.accessToken,
    expiry: new Date(credential.expiresAt).toISOString(),
  };
  if (credential.refreshToken) file.refresh_token = credential.refreshToken;
  if (credential.scope) file.scope = credential.scope;
  if (credential.tokenType) file.token_type = credential.tokenType;
  if (credential.clientId) file.client_id = credential.clientId;
  if (credential.clientSecret) file.client_secret = credential.clientSecret;
  return file;
}

export class FileTokenStore implements TokenStore {
  private readonly logger: AppLogger;

  constructor(
    private readonly filePath: string,
    logger?: AppLogger
  ) {
    this.logger = (logger ?? createLogger()).child({ domain: 'token-store' });
  }

  async load(): Promise<StoredCredential | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('token_file_unreadable', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const credential = parseTokenFile(parsed);
    if (!credential) {
      this.logger.warn('token_file_invalid', { path: this.filePath });
    }
    return credential;
  }

  async save(credential: StoredCredential): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(serializeTokenFile(credential), null, 2)}\n`, {
      encoding: 'utf-8',
      mode: 0o600,
    });
    await rename(tempPath, this.filePath);
    this.logger.debug('token_file_saved', { path: this.filePath });
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
