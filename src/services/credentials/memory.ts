/**
 * @fileoverview In-memory token store.
 *
 * Data is lost on process restart. Selected with GMAIL_TOKEN_PATH=:memory:
 * and used by tests.
 */

import type { StoredCredential, TokenStore } from './types.js';

export class MemoryTokenStore implements TokenStore {
  private credential: StoredCredential | null;

  /** Number of save() calls, for assertions on persistence. */
  saveCount = 0;

  constructor(initial: StoredCredential | null = null) {
    this.credential = initial;
  }

  async load(): Promise<StoredCredential | null> {
    return this.credential ? { ...this.credential } : null;
  }

  async save(credential: StoredCredential): Promise<void> {
    this.saveCount++;
    this.credential = { ...credential };
  }

  async clear(): Promise<void> {
    this.credential = null;
  }
}
