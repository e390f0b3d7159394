/**
 * @fileoverview Google OAuth session.
 *
 * Owns the single credential set of the CLI user:
 * load from the token store → use while valid → refresh when expiring →
 * fall back to the interactive grant when nothing usable is left.
 * Every change is persisted before the client is handed out.
 */

import type { StoredCredential, TokenStore } from '../../../services/credentials/index.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AuthorizationError, errorMessage } from '../../../utils/errors.js';
import { loadClientSecret } from './client-secret.js';
import type { ClientIdentity, ConsentFlow, OAuthClient, OAuthTokens } from '../types.js';

/** Token refresh threshold: refresh if expiring within 5 minutes. */
export const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

/** Lifetime assumed when the provider omits expiry_date. */
const DEFAULT_TOKEN_LIFETIME_MS = 3600000;

export interface GoogleAuthSessionOptions<C extends OAuthClient> {
  store: TokenStore;
  /** Path of Google's client-secret JSON, needed for the grant */
  credentialsPath: string;
  createClient: (identity: ClientIdentity) => C;
  consent: ConsentFlow;
  logger?: AppLogger;
  now?: () => number;
}

export class GoogleAuthSession<C extends OAuthClient> {
  private readonly store: TokenStore;
  private readonly credentialsPath: string;
  private readonly createClient: (identity: ClientIdentity) => C;
  private readonly consent: ConsentFlow;
  private readonly logger: AppLogger;
  private readonly now: () => number;

  private current: { credential: StoredCredential; client: C } | null = null;
  private inFlight: Promise<C> | null = null;

  constructor(options: GoogleAuthSessionOptions<C>) {
    this.store = options.store;
    this.credentialsPath = options.credentialsPath;
    this.createClient = options.createClient;
    this.consent = options.consent;
    this.logger = (options.logger ?? createLogger()).child({ domain: 'google-auth' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Get an authorized client, refreshing or re-granting as needed.
   * Concurrent callers share one in-flight authentication.
   *
   * @throws CredentialsUnavailableError if the grant is needed and the client-secret file is unusable
   * @throws AuthorizationError if the grant does not complete
   */
  authenticate(): Promise<C> {
    if (this.current && this.isFresh(this.current.credential)) {
      return Promise.resolve(this.current.client);
    }
    if (!this.inFlight) {
      this.inFlight = this.resolveClient().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Forget the cached client and the persisted token.
   */
  async signOut(): Promise<void> {
    this.current = null;
    await this.store.clear();
  }

  private isFresh(credential: StoredCredential): boolean {
    return credential.expiresAt > this.now() + REFRESH_THRESHOLD_MS;
  }

  private async resolveClient(): Promise<C> {
    const stored = this.current?.credential ?? await this.store.load();

    if (stored && this.isFresh(stored)) {
      this.logger.debug('token_loaded', { expiresAt: stored.expiresAt });
      return this.activate(stored, await this.identityFor(stored));
    }

    if (stored?.refreshToken) {
      try {
        const identity = await this.identityFor(stored);
        const refreshed = await this.refresh(stored, identity);
        await this.store.save(refreshed);
        this.logger.info('token_refreshed', { expiresAt: refreshed.expiresAt });
        return this.activate(refreshed, identity);
      } catch (error) {
        this.logger.warn('token_refresh_failed', { error: errorMessage(error) });
      }
    }

    return this.grant();
  }

  /**
   * Client identity for a stored token: the one recorded with it, else the client-secret file.
   */
  private async identityFor(credential: StoredCredential): Promise<ClientIdentity> {
    if (credential.clientId && credential.clientSecret) {
      return { clientId: credential.clientId, clientSecret: credential.clientSecret };
    }
    const secret = await loadClientSecret(this.credentialsPath);
    return { clientId: secret.clientId, clientSecret: secret.clientSecret };
  }

  private async refresh(stored: StoredCredential, identity: ClientIdentity): Promise<StoredCredential> {
    const client = this.createClient(identity);
    client.setCredentials({ refresh_token: stored.refreshToken });
    const { credentials } = await client.refreshAccessToken();

    if (!credentials.access_token) {
      throw new Error('Failed to refresh access token');
    }

    return {
      ...this.toCredential(credentials, identity),
      refreshToken: credentials.refresh_token || stored.refreshToken,
      scope: credentials.scope || stored.scope,
    };
  }

  private async grant(): Promise<C> {
    const secret = await loadClientSecret(this.credentialsPath);
    const identity: ClientIdentity = {
      clientId: secret.clientId,
      clientSecret: secret.clientSecret,
      redirectUri: secret.redirectUris[0],
    };

    this.logger.info('oauth_grant_started');
    const tokens = await this.consent.authorize(this.createClient(identity));
    if (!tokens.access_token) {
      throw new AuthorizationError('Authorization completed without an access token');
    }

    const credential = this.toCredential(tokens, identity);
    await this.store.save(credential);
    this.logger.info('oauth_grant_completed', { hasRefreshToken: Boolean(credential.refreshToken) });
    return this.activate(credential, identity);
  }

  private toCredential(tokens: OAuthTokens, identity: ClientIdentity): StoredCredential {
    return {
      accessToken: tokens.access_token || '',
      refreshToken: tokens.refresh_token || undefined,
      expiresAt: tokens.expiry_date || this.now() + DEFAULT_TOKEN_LIFETIME_MS,
      scope: tokens.scope || undefined,
      tokenType: tokens.token_type || undefined,
      clientId: identity.clientId,
      clientSecret: identity.clientSecret,
    };
  }

  private activate(credential: StoredCredential, identity: ClientIdentity): C {
    const client = this.createClient(identity);
    client.setCredentials({
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiresAt,
      token_type: credential.tokenType,
    });
    this.current = { credential, client };
    return client;
  }
}
