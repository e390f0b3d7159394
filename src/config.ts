/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are read and validated here. The CLI entry point
 * loads `.env` through dotenv before calling {@link loadConfig}; everything
 * else receives the resulting object (or the pieces it needs) explicitly.
 *
 * @see .env.example for the supported variables
 */

import { ConfigError } from './utils/errors.js';
import { isLogLevel } from './utils/observability/index.js';
import type { LogLevel } from './utils/observability/index.js';

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Config helpers: required vs optional intent
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(env: Env, key: string): string | undefined {
  return env[key] || undefined;
}

/** Read an optional string env var with a default. */
function optional(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/** Read an optional integer env var with a default. NaN is caught by validateConfig. */
function optionalInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  return raw ? Number(raw) : defaultValue;
}

export interface AppConfig {
  anthropicApiKey: string | undefined;

  agent: {
    modelId: string;
    maxTokens: number;
    maxIterations: number;
    maxObservationChars: number;
    historyTurns: number;
  };

  /** Gmail OAuth files */
  gmail: {
    credentialsPath: string;
    tokenPath: string;
    callbackPort: number;
  };

  logging: {
    level: string;
    filePath: string | undefined;
  };
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    anthropicApiKey: required(env, 'ANTHROPIC_API_KEY'),

    agent: {
      modelId: optional(env, 'AGENT_MODEL_ID', 'claude-3-5-haiku-latest'),
      maxTokens: optionalInt(env, 'AGENT_MAX_TOKENS', 2048),
      maxIterations: optionalInt(env, 'AGENT_MAX_ITERATIONS', 10),
      maxObservationChars: optionalInt(env, 'AGENT_MAX_OBSERVATION_CHARS', 24000),
      historyTurns: optionalInt(env, 'AGENT_HISTORY_TURNS', 10),
    },

    gmail: {
      credentialsPath: optional(env, 'GMAIL_CREDENTIALS_PATH', 'credentials.json'),
      tokenPath: optional(env, 'GMAIL_TOKEN_PATH', 'token.json'),
      callbackPort: optionalInt(env, 'OAUTH_CALLBACK_PORT', 0),
    },

    logging: {
      level: optional(env, 'LOG_LEVEL', 'warn'),
      filePath: env.APP_LOG_FILE || undefined,
    },
  };
}

function isIntInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Validate critical configuration at startup.
 * Collects every problem and throws a single ConfigError.
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];

  if (!config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  const { agent, gmail, logging } = config;
  if (!isIntInRange(agent.maxTokens, 256, 64000)) {
    errors.push(`AGENT_MAX_TOKENS must be an integer 256-64000, got ${agent.maxTokens}`);
  }
  if (!isIntInRange(agent.maxIterations, 1, 50)) {
    errors.push(`AGENT_MAX_ITERATIONS must be an integer 1-50, got ${agent.maxIterations}`);
  }
  if (!isIntInRange(agent.maxObservationChars, 1000, Number.MAX_SAFE_INTEGER)) {
    errors.push(`AGENT_MAX_OBSERVATION_CHARS must be an integer >= 1000, got ${agent.maxObservationChars}`);
  }
  if (!isIntInRange(agent.historyTurns, 0, 100)) {
    errors.push(`AGENT_HISTORY_TURNS must be an integer 0-100, got ${agent.historyTurns}`);
  }
  if (!isIntInRange(gmail.callbackPort, 0, 65535)) {
    errors.push(`OAUTH_CALLBACK_PORT must be 0-65535, got ${gmail.callbackPort}`);
  }
  if (!isLogLevel(logging.level)) {
    errors.push(`LOG_LEVEL must be one of debug, info, warn, error, got ${logging.level}`);
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

/**
 * Narrow the configured log level after validation.
 */
export function logLevelOf(config: AppConfig): LogLevel {
  return isLogLevel(config.logging.level) ? config.logging.level : 'warn';
}
