import { captureException } from '@sentry/node';

import { logger } from '../logger';
import { isDryRun } from './helpers';

/**
 * Custom error class that describes client configuration errors
 */
export class ConfigurationError extends Error {
  public constructor(message?: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when more than one release channel matches the current branch
 */
export class AmbiguousChannelMatchError extends ConfigurationError {
  public constructor(
    public readonly branch: string,
    public readonly ruleNames: string[]
  ) {
    super(
      `Branch "${branch}" matches more than one release channel: ${ruleNames
        .map(name => `"${name}"`)
        .join(', ')}. Make the "match" patterns in the "branches" configuration mutually exclusive.`
    );
  }
}

/**
 * Raised when no release channel matches the current branch
 */
export class NotAReleaseBranchError extends ConfigurationError {
  public constructor(public readonly branch: string) {
    super(
      `Branch "${branch}" does not match any release channel in the "branches" configuration.`
    );
  }
}

/**
 * A commit message that cannot be classified at all: empty, or malformed at
 * the encoding level.
 */
export class ParseError extends Error {
  public constructor(
    message: string,
    public readonly sha?: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Two prereleases of the same version with different tokens
 */
export class IncomparableVersionsError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'IncomparableVersionsError';
  }
}

/**
 * Writes an error or message to "error" log if in dry-mode, throws an error
 * otherwise
 *
 * @param error Error object or error message
 * @param errorLogger Optional logger to use
 */
export function reportError(
  error: Error | string,
  errorLogger: { error: (...message: string[]) => void } = logger
): void {
  if (!isDryRun()) {
    throw error instanceof Error ? error : new Error(error);
  }
  const errorStr = typeof error === 'string' ? error : String(error);
  errorLogger.error(`[dry-run] ${errorStr}`);
}

/**
 * Processes an uncaught exception on the global level
 *
 * Sends the error to Sentry if Sentry SDK is configured. Configuration
 * errors are the user's to fix and are only logged.
 * It is expected that the program is terminated soon after
 * this function is called.
 *
 * @param e Error (exception) object to handle
 */
export function handleGlobalError(e: unknown): void {
  if (!(e instanceof ConfigurationError)) {
    captureException(e);
  }
  logger.error(e instanceof Error ? e.message : String(e));
  if (e instanceof Error && !(e instanceof ConfigurationError) && e.stack) {
    logger.debug(e.stack);
  }
  process.exitCode = 1;
}
