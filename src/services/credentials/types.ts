/**
 * @fileoverview Token store interface for the Gmail OAuth credentials.
 *
 * A single-user CLI keeps one credential set. Implementations persist it;
 * the auth session decides when it is loaded, refreshed or replaced.
 */

/**
 * OAuth credential persisted between runs.
 */
export interface StoredCredential {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number; // Unix timestamp in milliseconds
  scope?: string;
  tokenType?: string;
  /** OAuth client that minted the token, so refresh works without the client-secret file */
  clientId?: string;
  clientSecret?: string;
}

/**
 * Interface for token storage backends.
 */
export interface TokenStore {
  /**
   * Load the stored credential.
   * @returns Credential, or null if nothing usable is stored.
   */
  load(): Promise<StoredCredential | null>;

  /**
   * Persist a credential, replacing whatever was stored.
   */
  save(credential: StoredCredential): Promise<void>;

  /**
   * Remove the stored credential. No-op if none exists.
   */
  clear(): Promise<void>;
}
