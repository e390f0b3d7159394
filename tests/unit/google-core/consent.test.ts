/**
 * Unit tests for the loopback OAuth consent flow.
 */

import request from 'supertest';
import { describe, it, expect, vi } from 'vitest';
import { CALLBACK_PATH, LoopbackConsentFlow, createCallbackApp } from '../../../src/domains/google-core/providers/consent.js';
import { GMAIL_READONLY_SCOPE } from '../../../src/domains/google-core/types.js';
import { AuthorizationError } from '../../../src/utils/errors.js';
import { FakeOAuthClient } from '../../helpers/fakes.js';

describe('createCallbackApp', () => {
  it('reports the authorization code', async () => {
    const onResult = vi.fn();
    const app = createCallbackApp(onResult);

    const response = await request(app).get(`${CALLBACK_PATH}?code=test-code`);

    expect(response.status).toBe(200);
    expect(response.text).toContain('<h2>Authorization complete</h2>');
    expect(onResult).toHaveBeenCalledWith({ ok: true, code: 'test-code' });
  });

  it('reports a provider error', async () => {
    const onResult = vi.fn();
    const app = createCallbackApp(onResult);

    const response = await request(app).get(`${CALLBACK_PATH}?error=access_denied`);

    expect(response.status).toBe(400);
    expect(response.text).toContain('<h2>Authorization failed: access_denied</h2>');
    expect(onResult).toHaveBeenCalledWith({ ok: false, error: 'access_denied' });
  });

  it('rejects a callback without a code and keeps waiting', async () => {
    const onResult = vi.fn();
    const app = createCallbackApp(onResult);

    const response = await request(app).get(CALLBACK_PATH);

    expect(response.status).toBe(400);
    expect(response.text).toContain('<h2>Missing authorization code</h2>');
    expect(onResult).not.toHaveBeenCalled();
  });

  it('escapes the error text in the page', async () => {
    const app = createCallbackApp(vi.fn());

    const response = await request(app).get(`${CALLBACK_PATH}?error=${encodeURIComponent('<b>x</b>')}`);

    expect(response.text).toContain('<h2>Authorization failed: &lt;b&gt;x&lt;/b&gt;</h2>');
  });

  it('answers 404 for other paths', async () => {
    const onResult = vi.fn();
    const response = await request(createCallbackApp(onResult)).get('/');

    expect(response.status).toBe(404);
    expect(onResult).not.toHaveBeenCalled();
  });
});

describe('LoopbackConsentFlow', () => {
  /**
   * Simulate the browser: follow the redirect_uri in the consent URL.
   */
  function browserRedirect(query: string): (url: string) => void {
    return (url) => {
      const redirectUri = new URL(url).searchParams.get('redirect_uri');
      fetch(`${redirectUri}?${query}`).catch(() => undefined);
    };
  }

  it('exchanges the code received on the loopback callback', async () => {
    const client = new FakeOAuthClient(
      { clientId: 'test-client-id', clientSecret: 'test-secret' },
      { exchange: async (code) => ({ access_token: `access-for-${code}`, refresh_token: 'test-refresh' }) }
    );
    const flow = new LoopbackConsentFlow({ onAuthUrl: browserRedirect('code=test-code') });

    const tokens = await flow.authorize(client);

    expect(tokens).toEqual({ access_token: 'access-for-test-code', refresh_token: 'test-refresh' });
    expect(client.authUrlOptions).toHaveLength(1);
    const [options] = client.authUrlOptions;
    expect(options.access_type).toBe('offline');
    expect(options.prompt).toBe('consent');
    expect(options.scope).toEqual([GMAIL_READONLY_SCOPE]);
    expect(options.redirect_uri).toMatch(/^http:\/\/127\.0\.0\.1:\d+\/oauth2callback$/);
    expect(client.tokenRequests).toEqual([{ code: 'test-code', redirect_uri: options.redirect_uri }]);
  });

  it('fails with AuthorizationError when the user declines', async () => {
    const client = new FakeOAuthClient({ clientId: 'test-client-id', clientSecret: 'test-secret' });
    const flow = new LoopbackConsentFlow({ onAuthUrl: browserRedirect('error=access_denied') });

    const error = await flow.authorize(client).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({ message: 'Authorization was declined: access_denied' });
    expect(client.tokenRequests).toEqual([]);
  });

  it('fails with AuthorizationError when no callback arrives in time', async () => {
    const client = new FakeOAuthClient({ clientId: 'test-client-id', clientSecret: 'test-secret' });
    const flow = new LoopbackConsentFlow({ timeoutMs: 50, onAuthUrl: () => undefined });

    await expect(flow.authorize(client)).rejects.toThrow('No authorization received within 0s');
  });

  it('propagates a failed code exchange', async () => {
    const client = new FakeOAuthClient({ clientId: 'test-client-id', clientSecret: 'test-secret' });
    const flow = new LoopbackConsentFlow({ onAuthUrl: browserRedirect('code=test-code') });

    await expect(flow.authorize(client)).rejects.toThrow('invalid_code');
  });
});
