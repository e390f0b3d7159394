/**
 * Anthropic client factory.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ConfigError } from '../../utils/errors.js';

/**
 * Create the Anthropic client for a configured API key.
 * @throws ConfigError if the key is missing
 */
export function createAnthropicClient(apiKey: string | undefined): Anthropic {
  if (!apiKey) {
    throw new ConfigError(['ANTHROPIC_API_KEY is required']);
  }
  return new Anthropic({ apiKey });
}
