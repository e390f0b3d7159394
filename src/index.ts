#!/usr/bin/env node
/**
 * @fileoverview CLI entry point for the inbox agent.
 *
 * Composition root: reads configuration, wires the Google OAuth session,
 * Gmail client, Anthropic backend and conversation, then hands control to
 * the command dispatcher.
 */

import 'dotenv/config';
import * as readline from 'readline';
import { google } from 'googleapis';
import { runCli } from './cli.js';
import type { ChatSession, CliIO } from './cli.js';
import { loadConfig, logLevelOf, validateConfig } from './config.js';
import { Conversation } from './conversation.js';
import { GoogleAuthSession } from './domains/google-core/providers/auth.js';
import { LoopbackConsentFlow } from './domains/google-core/providers/consent.js';
import { GmailMailClient } from './domains/email/providers/gmail.js';
import { AnthropicBackend } from './services/anthropic/backend.js';
import { createAnthropicClient } from './services/anthropic/client.js';
import { createTokenStore } from './services/credentials/index.js';
import { errorMessage } from './utils/errors.js';
import { configureLogging, createLogger, createSessionId } from './utils/observability/index.js';
import { VERSION } from './version.js';

/**
 * Terminal IO. The readline interface is created on first prompt so
 * one-shot commands never hold stdin open.
 */
function createTerminalIO(): CliIO & { close(): void } {
  let rl: readline.Interface | null = null;
  let closed = false;

  return {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    prompt: (question) => {
      if (closed) return Promise.resolve(null);
      if (!rl) {
        rl = readline.createInterface({ input: process.stdin, output: process.stdout });
        rl.once('close', () => {
          closed = true;
        });
      }
      const active = rl;
      return new Promise((resolve) => {
        const onClose = (): void => resolve(null);
        active.once('close', onClose);
        active.question(question, (answer) => {
          active.off('close', onClose);
          resolve(answer);
        });
      });
    },
    close: () => {
      rl?.close();
    },
  };
}

async function createSession(io: CliIO): Promise<ChatSession> {
  const config = loadConfig();
  validateConfig(config);
  configureLogging({ level: logLevelOf(config), filePath: config.logging.filePath });

  const logger = createLogger({ sessionId: createSessionId() });

  const auth = new GoogleAuthSession({
    store: createTokenStore(config.gmail.tokenPath, logger),
    credentialsPath: config.gmail.credentialsPath,
    createClient: (identity) => new google.auth.OAuth2(identity.clientId, identity.clientSecret, identity.redirectUri),
    consent: new LoopbackConsentFlow({
      port: config.gmail.callbackPort,
      onAuthUrl: (url) => {
        io.stderr('Open this URL in your browser to authorize read-only Gmail access:');
        io.stderr(`  ${url}`);
      },
      logger,
    }),
    logger,
  });

  const mail = new GmailMailClient({
    session: auth,
    createApi: (client) => google.gmail({ version: 'v1', auth: client }),
    logger,
  });

  const backend = new AnthropicBackend(createAnthropicClient(config.anthropicApiKey), {
    model: config.agent.modelId,
    maxTokens: config.agent.maxTokens,
    logger,
  });

  const conversation = new Conversation(
    { backend, mail, logger },
    {
      maxIterations: config.agent.maxIterations,
      maxObservationChars: config.agent.maxObservationChars,
      historyTurns: config.agent.historyTurns,
    }
  );

  return {
    authenticate: () => mail.authenticate(),
    send: (utterance) => conversation.send(utterance),
  };
}

async function main(): Promise<void> {
  const io = createTerminalIO();
  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      io,
      version: VERSION,
      createSession: () => createSession(io),
    });
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
