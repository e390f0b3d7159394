/**
 * @fileoverview Google-core shared type definitions.
 *
 * Structural views of the googleapis OAuth2 client. `google.auth.OAuth2`
 * satisfies {@link OAuthClient}; tests pass a fake.
 */

/** Read-only Gmail scope; the agent never modifies the mailbox. */
export const GMAIL_READONLY_SCOPE = 'https://www.googleapis.com/auth/gmail.readonly';

/** Token fields as google-auth-library reports them. */
export interface OAuthTokens {
  access_token?: string | null;
  refresh_token?: string | null;
  expiry_date?: number | null;
  scope?: string;
  token_type?: string | null;
}

export type AuthUrlOptions = {
  access_type: 'offline' | 'online';
  scope: string[];
  prompt?: string;
  redirect_uri?: string;
};

export interface OAuthClient {
  setCredentials(tokens: OAuthTokens): void;
  refreshAccessToken(): Promise<{ credentials: OAuthTokens }>;
  generateAuthUrl(options: AuthUrlOptions): string;
  getToken(options: { code: string; redirect_uri?: string }): Promise<{ tokens: OAuthTokens }>;
}

/** OAuth client id/secret pair, from the client-secret file or a stored token. */
export interface ClientIdentity {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

/**
 * Interactive authorization-code grant.
 */
export interface ConsentFlow {
  /**
   * Obtain user consent and exchange the code for tokens.
   * @throws AuthorizationError if the user declines or the flow times out
   */
  authorize(client: OAuthClient): Promise<OAuthTokens>;
}
