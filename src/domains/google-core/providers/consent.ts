/**
 * @fileoverview Loopback consent flow for the OAuth authorization-code grant.
 *
 * Flow:
 * 1. Start a local express server on 127.0.0.1 (ephemeral port by default)
 * 2. Print the Google consent URL, with the loopback address as redirect_uri
 * 3. Google redirects the browser to /oauth2callback?code=...
 * 4. Exchange the code for tokens and shut the server down
 */

import express from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { AppLogger } from '../../../utils/observability/index.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AuthorizationError } from '../../../utils/errors.js';
import { GMAIL_READONLY_SCOPE } from '../types.js';
import type { ConsentFlow, OAuthClient, OAuthTokens } from '../types.js';

export const CALLBACK_PATH = '/oauth2callback';

/** How long to wait for the browser redirect. */
const CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

export type CallbackResult =
  | { ok: true; code: string }
  | { ok: false; error: string };

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function resultHtml(message: string): string {
  return `<!DOCTYPE html><html><body><h2>${escapeHtml(message)}</h2><p>You can close this tab.</p></body></html>`;
}

/**
 * Express app that receives the OAuth redirect and reports the outcome once.
 */
export function createCallbackApp(onResult: (result: CallbackResult) => void): express.Application {
  const app = express();

  app.get(CALLBACK_PATH, (req, res) => {
    const { code, error } = req.query;

    if (typeof error === 'string' && error) {
      res.status(400).send(resultHtml(`Authorization failed: ${error}`));
      onResult({ ok: false, error });
      return;
    }

    if (typeof code !== 'string' || !code) {
      res.status(400).send(resultHtml('Missing authorization code'));
      return;
    }

    res.send(resultHtml('Authorization complete'));
    onResult({ ok: true, code });
  });

  return app;
}

export interface LoopbackConsentFlowOptions {
  /** 0 picks a free port */
  port?: number;
  scopes?: string[];
  timeoutMs?: number;
  /** Called with the consent URL the user has to open */
  onAuthUrl: (url: string) => void;
  logger?: AppLogger;
}

export class LoopbackConsentFlow implements ConsentFlow {
  private readonly port: number;
  private readonly scopes: string[];
  private readonly timeoutMs: number;
  private readonly onAuthUrl: (url: string) => void;
  private readonly logger: AppLogger;

  constructor(options: LoopbackConsentFlowOptions) {
    this.port = options.port ?? 0;
    this.scopes = options.scopes ?? [GMAIL_READONLY_SCOPE];
    this.timeoutMs = options.timeoutMs ?? CONSENT_TIMEOUT_MS;
    this.onAuthUrl = options.onAuthUrl;
    this.logger = (options.logger ?? createLogger()).child({ domain: 'oauth-consent' });
  }

  async authorize(client: OAuthClient): Promise<OAuthTokens> {
    let settle: (result: CallbackResult) => void = () => undefined;
    const received = new Promise<CallbackResult>((resolve) => {
      settle = resolve;
    });

    const server = await this.listen(createCallbackApp((result) => settle(result)));
    try {
      const { port } = this.addressOf(server);
      const redirectUri = `http://127.0.0.1:${port}${CALLBACK_PATH}`;

      const authUrl = client.generateAuthUrl({
        access_type: 'offline', // Get refresh token
        scope: this.scopes,
        prompt: 'consent', // Force consent to always get refresh token
        redirect_uri: redirectUri,
      });
      this.logger.info('oauth_consent_waiting', { port });
      this.onAuthUrl(authUrl);

      const result = await this.withTimeout(received);
      if (!result.ok) {
        throw new AuthorizationError(`Authorization was declined: ${result.error}`);
      }

      const { tokens } = await client.getToken({ code: result.code, redirect_uri: redirectUri });
      return tokens;
    } finally {
      await this.close(server);
    }
  }

  private listen(app: express.Application): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = app.listen(this.port, '127.0.0.1');
      server.once('listening', () => resolve(server));
      server.once('error', reject);
    });
  }

  private addressOf(server: Server): AddressInfo {
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new AuthorizationError('Loopback server has no TCP address');
    }
    return address;
  }

  private withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new AuthorizationError(`No authorization received within ${Math.round(this.timeoutMs / 1000)}s`)),
        this.timeoutMs
      );
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }

  private close(server: Server): Promise<void> {
    return new Promise((resolve) => {
      server.closeAllConnections();
      server.close(() => resolve());
    });
  }
}
