import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadClientSecret, parseClientSecret } from '../../../src/domains/google-core/providers/client-secret.js';
import { CredentialsUnavailableError } from '../../../src/utils/errors.js';

describe('parseClientSecret', () => {
  it('reads the installed section', () => {
    expect(parseClientSecret({
      installed: { client_id: 'test-client-id', client_secret: 'test-secret', redirect_uris: ['http://localhost'] },
    })).toEqual({ clientId: 'test-client-id', clientSecret: 'test-secret', redirectUris: ['http://localhost'] });
  });

  it('reads the web section', () => {
    expect(parseClientSecret({
      web: { client_id: 'test-client-id', client_secret: 'test-secret' },
    })).toEqual({ clientId: 'test-client-id', clientSecret: 'test-secret', redirectUris: [] });
  });

  it('prefers installed over web', () => {
    const secret = parseClientSecret({
      installed: { client_id: 'desktop-id', client_secret: 'test-secret' },
      web: { client_id: 'web-id', client_secret: 'test-secret' },
    });
    expect(secret?.clientId).toBe('desktop-id');
  });

  it('drops non-string redirect URIs', () => {
    const secret = parseClientSecret({
      installed: { client_id: 'test-client-id', client_secret: 'test-secret', redirect_uris: ['http://localhost', 42] },
    });
    expect(secret?.redirectUris).toEqual(['http://localhost']);
  });

  it.each([
    ['null', null],
    ['an array', []],
    ['no section', { other: {} }],
    ['a missing secret', { installed: { client_id: 'test-client-id' } }],
    ['an empty id', { installed: { client_id: '', client_secret: 'test-secret' } }],
  ])('returns null for %s', (_label, value) => {
    expect(parseClientSecret(value)).toBeNull();
  });
});

describe('loadClientSecret', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inbox-agent-secret-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads a valid file', async () => {
    const file = path.join(tempDir, 'credentials.json');
    fs.writeFileSync(file, JSON.stringify({ installed: { client_id: 'test-client-id', client_secret: 'test-secret' } }));

    await expect(loadClientSecret(file)).resolves.toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      redirectUris: [],
    });
  });

  it('throws CredentialsUnavailableError for a missing file', async () => {
    const file = path.join(tempDir, 'missing.json');

    const error = await loadClientSecret(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CredentialsUnavailableError);
    expect(error).toMatchObject({
      message: `OAuth client-secret file not found: ${file}`,
      credentialsPath: file,
    });
  });

  it('throws CredentialsUnavailableError for invalid JSON', async () => {
    const file = path.join(tempDir, 'credentials.json');
    fs.writeFileSync(file, '{not json');

    await expect(loadClientSecret(file)).rejects.toThrow(`OAuth client-secret file is not valid JSON: ${file}`);
  });
});
