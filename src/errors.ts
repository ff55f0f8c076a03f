import { ExitCode } from './types';

export class GistIndexError extends Error {
  constructor(message: string, readonly exitCode: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends GistIndexError {
  constructor(message: string) {
    super(message, ExitCode.MissingConfig);
  }
}

/**
 * The subject user or the destination gist does not exist, or the token
 * cannot see it. GitHub answers 404 in both cases.
 */
export class NotFoundError extends GistIndexError {
  constructor(readonly subject: 'user' | 'gist', readonly id: string) {
    super(
      subject === 'user'
        ? `User '${id}' not found or gists unavailable.`
        : `INDEX_GIST_ID '${id}' not found or token lacks access to that gist.`,
      subject === 'user' ? ExitCode.UserNotFound : ExitCode.GistNotFound
    );
  }
}

export class HttpError extends GistIndexError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, ExitCode.Unhandled, options);
  }
}

/**
 * Connection error, timeout or 5xx. Retried inside requestWithRetry and only
 * surfaces once the attempts run out.
 */
export class TransientFailure extends HttpError {}

export class UpdateFailure extends GistIndexError {
  constructor(readonly status: number | undefined, cause: unknown) {
    super(`Failed to update index gist: ${describeError(cause)}`, ExitCode.UpdateFailed, { cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof HttpError) {
    return `HTTP error (${error.status ?? 'HTTP'}): ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
