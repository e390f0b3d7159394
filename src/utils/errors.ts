/**
 * @fileoverview Application error taxonomy.
 *
 * Every error the agent can raise on purpose extends AppError:
 * - recoverable errors are turned into tool observations within a turn
 * - non-recoverable errors abort the turn (or the whole session)
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * The interactive grant is required but the client-secret file is missing
 * or unusable. Fatal for the session.
 */
export class CredentialsUnavailableError extends AppError {
  constructor(message: string, public readonly credentialsPath: string) {
    super(message, 'CREDENTIALS_UNAVAILABLE', false, { credentialsPath });
    this.name = 'CredentialsUnavailableError';
  }
}

/**
 * The interactive OAuth grant did not complete (declined, timed out, or the
 * code exchange returned no access token). Fatal for the session.
 */
export class AuthorizationError extends AppError {
  constructor(message: string) {
    super(message, 'AUTHORIZATION_FAILED', false);
    this.name = 'AuthorizationError';
  }
}

/**
 * Network or API failure from the mail provider.
 */
export class ProviderError extends AppError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'PROVIDER_ERROR', true, status === undefined ? undefined : { status });
    this.name = 'ProviderError';
  }
}

/**
 * The provider does not know the requested message id.
 */
export class MessageNotFoundError extends AppError {
  constructor(public readonly messageId: string) {
    super(`Message not found: ${messageId}`, 'MESSAGE_NOT_FOUND', true, { messageId });
    this.name = 'MessageNotFoundError';
  }
}

/**
 * Backend-supplied tool arguments failed validation.
 */
export class ToolArgumentError extends AppError {
  constructor(public readonly toolName: string, message: string) {
    super(message, 'TOOL_ARGUMENT_ERROR', true, { toolName });
    this.name = 'ToolArgumentError';
  }
}

/**
 * The agent used its whole iteration budget without a final answer.
 */
export class AgentNonConvergenceError extends AppError {
  constructor(public readonly iterations: number) {
    super(
      `Agent did not converge within ${iterations} iterations`,
      'AGENT_NON_CONVERGENCE',
      false,
      { iterations }
    );
    this.name = 'AgentNonConvergenceError';
  }
}

/**
 * Startup configuration is missing or out of range.
 */
export class ConfigError extends AppError {
  constructor(public readonly problems: string[]) {
    super(
      `Configuration validation failed:\n  - ${problems.join('\n  - ')}`,
      'CONFIG_INVALID',
      false,
      { problems }
    );
    this.name = 'ConfigError';
  }
}

/**
 * Errors that must abort the session instead of becoming an observation.
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof CredentialsUnavailableError ||
    error instanceof AuthorizationError ||
    error instanceof ConfigError
  );
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
