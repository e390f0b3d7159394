/**
 * @fileoverview Token store factory.
 */

import type { TokenStore } from './types.js';
import { FileTokenStore } from './file.js';
import { MemoryTokenStore } from './memory.js';
import type { AppLogger } from '../../utils/observability/index.js';

export type { TokenStore, StoredCredential } from './types.js';
export { FileTokenStore } from './file.js';
export { MemoryTokenStore } from './memory.js';

/**
 * Create the token store for a configured path.
 * The special path ':memory:' keeps tokens for the lifetime of the process only.
 */
export function createTokenStore(tokenPath: string, logger?: AppLogger): TokenStore {
  if (tokenPath === ':memory:') {
    return new MemoryTokenStore();
  }
  return new FileTokenStore(tokenPath, logger);
}
