/**
 * @fileoverview Command dispatch for the inbox agent CLI.
 *
 * Commands:
 *   chat [message...] [-i|--interactive]   ask one question, or start a session
 *   setup                                   print setup instructions
 *   version                                 print the version
 *
 * A bare message (no command) is treated as `chat <message>`.
 * Answers go to stdout; status and errors go to stderr.
 */

import type { AgentTurnResult } from './executor/types.js';
import {
  AgentNonConvergenceError,
  AuthorizationError,
  ConfigError,
  CredentialsUnavailableError,
  errorMessage,
  isFatalError,
} from './utils/errors.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Resolves null at end of input */
  prompt(question: string): Promise<string | null>;
}

/**
 * A ready chat session: authenticated mail access plus conversation state.
 */
export interface ChatSession {
  authenticate(): Promise<void>;
  send(utterance: string): Promise<AgentTurnResult>;
}

export interface CliDeps {
  io: CliIO;
  version: string;
  /** @throws ConfigError */
  createSession(): Promise<ChatSession>;
}

export type CliCommand =
  | { kind: 'chat'; message: string | undefined; interactive: boolean }
  | { kind: 'setup' }
  | { kind: 'version' }
  | { kind: 'help' }
  | { kind: 'invalid'; error: string };

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

export const USAGE = `Usage: inbox-agent [command]

Commands:
  chat [message] [-i, --interactive]  Ask about your inbox (interactive when no message is given)
  setup                               Show setup instructions
  version                             Show version information

A message without a command runs chat, e.g. inbox-agent "Show me my recent emails"`;

export const SETUP_TEXT = `Inbox Agent Setup

1. Anthropic API key:
   export ANTHROPIC_API_KEY="your-api-key"   (or put it in .env)

2. Gmail API:
   - Go to Google Cloud Console and create or select a project
   - Enable the Gmail API
   - Create OAuth2 credentials (Desktop application)
   - Download them as credentials.json into the working directory
     (or point GMAIL_CREDENTIALS_PATH at the file)

3. First run opens a consent URL; the token is saved to token.json
   (GMAIL_TOKEN_PATH) and refreshed automatically afterwards.

Example queries:
   - "List my recent emails"
   - "Find emails about the quarterly report"
   - "What did the last email from my bank say?"`;

const GMAIL_SETUP_HINT = `Gmail setup required:
1. Go to Google Cloud Console
2. Enable the Gmail API
3. Create OAuth2 credentials (Desktop application)
4. Download them as credentials.json`;

/**
 * Parse argv (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const [first, ...rest] = argv;

  if (first === 'setup' || first === 'version') {
    return rest.length === 0 ? { kind: first } : { kind: 'invalid', error: `${first} takes no arguments` };
  }
  if (first === 'help' || first === '--help' || first === '-h') {
    return { kind: 'help' };
  }

  const chatArgs = first === 'chat' ? rest : argv;
  let interactive = false;
  const words: string[] = [];
  for (const arg of chatArgs) {
    if (arg === '-i' || arg === '--interactive') {
      interactive = true;
    } else if (arg.startsWith('-') && arg.length > 1) {
      return { kind: 'invalid', error: `Unknown option: ${arg}` };
    } else {
      words.push(arg);
    }
  }

  const message = words.join(' ').trim();
  return { kind: 'chat', message: message || undefined, interactive };
}

/**
 * Report an error that ends the session. Returns the exit code.
 */
function reportFatal(io: CliIO, error: unknown): number {
  if (error instanceof ConfigError) {
    io.stderr(`Configuration error: ${error.message}`);
    io.stderr('Run "inbox-agent setup" for instructions.');
  } else if (error instanceof CredentialsUnavailableError) {
    io.stderr(`Error: ${error.message}`);
    io.stderr(GMAIL_SETUP_HINT);
  } else if (error instanceof AuthorizationError) {
    io.stderr(`Authentication error: ${error.message}`);
  } else {
    io.stderr(`Error: ${errorMessage(error)}`);
  }
  return 1;
}

function describeTurnFailure(error: unknown): string {
  if (error instanceof AgentNonConvergenceError) {
    return `The agent could not reach an answer within ${error.iterations} steps. Try a more specific question.`;
  }
  return `Error: ${errorMessage(error)}`;
}

async function interactiveMode(session: ChatSession, io: CliIO): Promise<number> {
  io.stderr('Inbox Agent interactive mode. Type "quit", "exit" or press Ctrl+D to leave.');

  for (;;) {
    const line = await io.prompt('You: ');
    if (line === null) {
      io.stderr('Goodbye!');
      return 0;
    }

    const utterance = line.trim();
    if (!utterance) continue;
    if (EXIT_WORDS.has(utterance.toLowerCase())) {
      io.stderr('Goodbye!');
      return 0;
    }

    try {
      const result = await session.send(utterance);
      io.stdout(`Agent: ${result.text}\n`);
    } catch (error) {
      if (isFatalError(error)) {
        return reportFatal(io, error);
      }
      io.stderr(describeTurnFailure(error));
    }
  }
}

async function singleMessage(session: ChatSession, io: CliIO, message: string): Promise<number> {
  try {
    const result = await session.send(message);
    io.stdout(result.text);
    return 0;
  } catch (error) {
    if (isFatalError(error)) {
      return reportFatal(io, error);
    }
    io.stderr(describeTurnFailure(error));
    return 1;
  }
}

/**
 * Run the CLI. Returns the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { io } = deps;
  const command = parseArgs(argv);

  switch (command.kind) {
    case 'help':
      io.stdout(USAGE);
      return 0;
    case 'setup':
      io.stdout(SETUP_TEXT);
      return 0;
    case 'version':
      io.stdout(`Inbox Agent v${deps.version}`);
      return 0;
    case 'invalid':
      io.stderr(command.error);
      io.stderr(USAGE);
      return 2;
    case 'chat':
      break;
  }

  let session: ChatSession;
  try {
    session = await deps.createSession();
    await session.authenticate();
  } catch (error) {
    return reportFatal(io, error);
  }
  io.stderr('Gmail agent initialized.');

  if (command.interactive || !command.message) {
    return interactiveMode(session, io);
  }
  return singleMessage(session, io, command.message);
}
