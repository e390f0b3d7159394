export type * from './types.js';

export {
  createTurnId,
  createSessionId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
} from './logger.js';

export {
  redactEmailAddress,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
